/**
 * Canonical names
 *
 * Each chunk is one scope. Names of globals the chunk's code reads, nested
 * bindings and reserved words are taken first; root symbols then get their
 * original name or the first free `name$N`, in module order then import order.
 */

import { WrapKind } from '../../compiler/interfaces/ModuleKinds';
import { reservedNameList } from '../../utils/utils';
import { isNormalModule } from '../graph/module';
import type { LinkStageOutput } from '../link/linkStage';
import { isSameSymbol, symbolKey } from '../symbols/symbolTable';
import type { SymbolRef } from '../symbols/symbolTable';
import type { Chunk } from './chunk';

export class Renamer {
  private readonly used: Set<string>;
  private readonly names = new Map<string, string>();

  constructor(reserved: Iterable<string>) {
    this.used = new Set(reserved);
  }

  reserve(name: string): void {
    this.used.add(name);
  }

  /** Names `root` unless it already has a name, returns the name */
  assign(root: SymbolRef, originalName: string): string {
    const key = symbolKey(root);
    const existing = this.names.get(key);
    if (existing !== undefined) return existing;

    let candidate = originalName;
    for (let counter = 1; this.used.has(candidate); counter++) candidate = `${originalName}$${counter}`;
    this.used.add(candidate);
    this.names.set(key, candidate);
    return candidate;
  }

  get canonicalNames(): ReadonlyMap<string, string> {
    return this.names;
  }
}

export function deconflictChunk(link: LinkStageOutput, chunk: Chunk): void {
  const { symbols } = link;
  const renamer = new Renamer(reservedNameList());

  for (const id of chunk.modules) {
    const module = link.modules[id];
    if (!isNormalModule(module)) continue;
    for (const name of module.scan.unresolvedNames) renamer.reserve(name);
    for (const name of module.scan.nestedNames) renamer.reserve(name);
    // Top-level bindings of a CommonJS module live inside its closure
    if (link.metas[id].wrapKind === WrapKind.Cjs) {
      const wrapperRef = link.metas[id].wrapperRef;
      for (const ref of symbols.symbolsOf(id)) {
        if (!wrapperRef || !isSameSymbol(ref, wrapperRef)) renamer.reserve(symbols.originalName(ref));
      }
    }
  }

  for (const id of chunk.modules) {
    const meta = link.metas[id];
    if (meta.wrapKind === WrapKind.Cjs) {
      if (meta.wrapperRef) renamer.assign(meta.wrapperRef, symbols.originalName(meta.wrapperRef));
      continue;
    }
    for (const ref of symbols.symbolsOf(id)) {
      const info = symbols.get(ref);
      if (info.link || info.namespaceAlias) continue;
      renamer.assign(ref, info.name);
    }
  }

  for (const items of chunk.importsFromOtherChunks.values()) {
    for (const item of items) {
      const root = symbols.canonicalRef(item.importRef);
      renamer.assign(root, symbols.originalName(root));
    }
  }

  chunk.setCanonicalNames(renamer.canonicalNames);
}

