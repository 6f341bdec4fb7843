/**
 * Chunk generation
 *
 * Every entry gets one bit, dynamic-import targets included. A module's
 * bitset is the set of entries that reach it through any import edge;
 * modules with equal bitsets share a chunk.
 */

import { BitSet } from './bitset';
import { Chunk } from './chunk';
import type { ChunkId } from './chunk';
import { ChunkGraph } from './chunkGraph';
import { isNormalModule } from '../graph/module';
import type { LinkStageOutput } from '../link/linkStage';
import type { ModuleId } from '../symbols/symbolTable';

export function computeReachability(link: LinkStageOutput): Array<BitSet | undefined> {
  const bits: Array<BitSet | undefined> = link.modules.map(() => undefined);

  link.entries.forEach((entry, index) => {
    const stack: ModuleId[] = [entry.id];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const module = link.modules[id];
      if (!isNormalModule(module)) continue;

      let moduleBits = bits[id];
      if (!moduleBits) {
        moduleBits = new BitSet(link.entries.length);
        bits[id] = moduleBits;
      }
      if (moduleBits.hasBit(index)) continue;
      moduleBits.setBit(index);

      for (const record of module.importRecords) stack.push(record.resolvedModule);
      if (link.runtimeIncluded && link.metas[id].runtimeHelpers.size > 0) {
        stack.push(link.runtimeId);
      }
    }
  });

  return bits;
}

export function generateChunks(link: LinkStageOutput): ChunkGraph {
  const bits = computeReachability(link);
  const ordered = link.modules
    .filter(module => isNormalModule(module) && bits[module.id] !== undefined && link.metas[module.id].execOrder >= 0)
    .sort((a, b) => link.metas[a.id].execOrder - link.metas[b.id].execOrder);

  const chunks: Chunk[] = [];
  const byKey = new Map<string, Chunk>();
  const moduleToChunk = new Map<ModuleId, ChunkId>();
  for (const module of ordered) {
    const moduleBits = bits[module.id];
    if (!moduleBits) continue;
    const key = moduleBits.toKey();
    let chunk = byKey.get(key);
    if (!chunk) {
      chunk = new Chunk(chunks.length, moduleBits);
      chunks.push(chunk);
      byKey.set(key, chunk);
    }
    chunk.modules.push(module.id);
    moduleToChunk.set(module.id, chunk.id);
  }

  const entryToChunk = new Map<ModuleId, ChunkId>();
  for (const entry of link.entries) {
    if (entryToChunk.has(entry.id)) continue;
    const owner = moduleToChunk.get(entry.id);
    if (owner === undefined) continue;
    let chunk = chunks[owner];
    if (chunk.isEntry) {
      chunk = new Chunk(chunks.length, chunk.bits);
      chunk.isFacade = true;
      chunks.push(chunk);
    }
    chunk.setEntry(entry);
    entryToChunk.set(entry.id, chunk.id);
  }

  return new ChunkGraph(chunks, moduleToChunk, entryToChunk);
}
