/**
 * Cross-chunk links
 *
 * Every symbol a chunk reads that lives in another chunk becomes an import
 * of that chunk and an export of the owner. Export aliases are picked once
 * canonical names exist.
 */

import { ImportKind } from '../../compiler/interfaces/ImportKind';
import { ExportsKind, WrapKind } from '../../compiler/interfaces/ModuleKinds';
import { InternalError } from '../../errors/errors';
import { isNormalModule } from '../graph/module';
import type { LinkStageOutput } from '../link/linkStage';
import { symbolKey } from '../symbols/symbolTable';
import type { SymbolRef } from '../symbols/symbolTable';
import type { Chunk } from './chunk';
import type { ChunkGraph } from './chunkGraph';

/**
 * Names an entry chunk exports for its entry module, empty for wrapped
 * CommonJS entries which export their value as `default`
 */
export function entryExports(link: LinkStageOutput, chunk: Chunk): ReadonlyMap<string, SymbolRef> {
  if (chunk.entryModule === undefined) return new Map();
  const meta = link.metas[chunk.entryModule];
  if (meta.exportsKind !== ExportsKind.Esm) return new Map();
  return meta.resolvedExports;
}

function referencedSymbols(link: LinkStageOutput, chunk: Chunk): SymbolRef[] {
  const refs: SymbolRef[] = [];
  for (const id of chunk.modules) refs.push(...link.metas[id].referencedSymbols);
  if (chunk.entryModule !== undefined) {
    const meta = link.metas[chunk.entryModule];
    if (meta.wrapperRef && meta.wrapKind !== WrapKind.None) refs.push(meta.wrapperRef);
    refs.push(...entryExports(link, chunk).values());
  }
  return refs;
}

export function computeCrossChunkLinks(link: LinkStageOutput, graph: ChunkGraph): void {
  for (const chunk of graph.chunks) {
    if (chunk.isFacade && chunk.entryModule !== undefined) {
      const owner = graph.chunkOf(chunk.entryModule);
      if (owner) chunk.importsFrom(owner.id);
    }
    for (const id of chunk.modules) {
      const module = link.modules[id];
      if (!isNormalModule(module)) continue;
      // Side effects of a static dependency in another chunk still have to run first
      for (const record of module.importRecords) {
        if (record.kind !== ImportKind.Import) continue;
        const owner = graph.chunkOf(record.resolvedModule);
        if (owner && owner.id !== chunk.id) chunk.importsFrom(owner.id);
      }
    }

    for (const ref of referencedSymbols(link, chunk)) {
      const storage = link.symbols.storageRef(ref);
      const owner = graph.chunkOf(storage.module);
      if (!owner) {
        throw new InternalError(
          `symbol "${link.symbols.originalName(storage)}" is referenced by chunk #${chunk.id} but owned by no chunk`,
        );
      }
      if (owner.id === chunk.id) continue;
      chunk.addImport(owner.id, storage);
      owner.markExported(storage);
    }
  }
}

/**
 * Picks the name each chunk exports its shared symbols under and copies it
 * onto the importing side. Runs after every chunk has canonical names.
 */
export function assignExportAliases(link: LinkStageOutput, graph: ChunkGraph): void {
  for (const chunk of graph.chunks) {
    if (chunk.exportsToOtherChunks.size === 0) continue;
    const exported = entryExports(link, chunk);
    const used = new Set(exported.keys());
    const entryNameOf = new Map<string, string>();
    for (const [name, ref] of exported) {
      const key = symbolKey(link.symbols.canonicalRef(ref));
      if (!entryNameOf.has(key)) entryNameOf.set(key, name);
    }

    for (const [key, item] of chunk.exportsToOtherChunks) {
      const existing = entryNameOf.get(key);
      if (existing !== undefined) {
        item.alias = existing;
        continue;
      }
      const name = link.symbols.canonicalNameFor(item.ref, chunk.canonicalNames);
      let alias = name;
      for (let counter = 1; used.has(alias); counter++) alias = `${name}$${counter}`;
      used.add(alias);
      item.alias = alias;
    }
  }

  for (const chunk of graph.chunks) {
    for (const [from, items] of chunk.importsFromOtherChunks) {
      const owner = graph.get(from);
      for (const item of items) item.exportAlias = owner.exportAliasOf(item.importRef);
    }
  }
}
