import { InternalError } from '../../errors/errors';
import type { FileNameTemplate } from '../../config/fileNameTemplate';
import type { EntryPoint } from '../graph/module';
import { symbolKey } from '../symbols/symbolTable';
import type { ModuleId, SymbolRef } from '../symbols/symbolTable';
import type { BitSet } from './bitset';

export type ChunkId = number;

export interface CrossChunkImportItem {
  /** Root symbol owned by the exporting chunk */
  readonly importRef: SymbolRef;
  /** Name the exporting chunk exports it under, set once aliases are assigned */
  exportAlias?: string;
}

export interface CrossChunkExport {
  readonly ref: SymbolRef;
  alias?: string;
}

/**
 * One emitted file. Membership is decided by the chunk generator, names by
 * the deconflicter; rendering only reads.
 */
export class Chunk {
  readonly modules: ModuleId[] = [];
  entryModule?: ModuleId;
  name?: string;
  isDynamicEntry = false;
  /** Entry chunk without modules of its own, re-exports its entry from the owning chunk */
  isFacade = false;
  preliminaryFilename?: string;
  readonly importsFromOtherChunks = new Map<ChunkId, CrossChunkImportItem[]>();
  readonly exportsToOtherChunks = new Map<string, CrossChunkExport>();
  private _canonicalNames?: ReadonlyMap<string, string>;

  constructor(public readonly id: ChunkId, public readonly bits: BitSet) {}

  get isEntry(): boolean {
    return this.entryModule !== undefined;
  }

  get canonicalNames(): ReadonlyMap<string, string> {
    if (!this._canonicalNames) throw new InternalError(`chunk #${this.id} has not been deconflicted`);
    return this._canonicalNames;
  }

  setCanonicalNames(names: ReadonlyMap<string, string>): void {
    if (this._canonicalNames) throw new InternalError(`canonical names of chunk #${this.id} are already assigned`);
    this._canonicalNames = names;
  }

  setEntry(entry: EntryPoint): void {
    this.entryModule = entry.id;
    this.name = entry.name;
    this.isDynamicEntry = entry.kind === 'dynamic';
  }

  /** Ensures an import statement from `from` exists, even with no bindings */
  importsFrom(from: ChunkId): CrossChunkImportItem[] {
    let items = this.importsFromOtherChunks.get(from);
    if (!items) {
      items = [];
      this.importsFromOtherChunks.set(from, items);
    }
    return items;
  }

  addImport(from: ChunkId, ref: SymbolRef): void {
    const items = this.importsFrom(from);
    if (!items.some(item => item.importRef.module === ref.module && item.importRef.symbol === ref.symbol)) {
      items.push({ importRef: ref });
    }
  }

  markExported(ref: SymbolRef): void {
    const key = symbolKey(ref);
    if (!this.exportsToOtherChunks.has(key)) this.exportsToOtherChunks.set(key, { ref });
  }

  exportAliasOf(ref: SymbolRef): string {
    const alias = this.exportsToOtherChunks.get(symbolKey(ref))?.alias;
    if (alias === undefined) throw new InternalError(`symbol ${symbolKey(ref)} is not exported by chunk #${this.id}`);
    return alias;
  }

  renderFileName(template: FileNameTemplate): string {
    return template.render({ name: this.name });
  }
}
