/**
 * Symbol table
 *
 * One arena of symbols per module. Linking merges symbols across modules
 * (an import binding becomes a link to the exported symbol) and marks
 * bindings of CommonJS or external modules as property reads on the
 * module object. Chunks never own symbols, they only name them.
 */

import { InternalError } from '../../errors/errors';

export type ModuleId = number;

export interface SymbolRef {
  readonly module: ModuleId;
  readonly symbol: number;
}

/** The symbol is read as `<namespace>.<property>` */
export interface NamespaceAlias {
  readonly namespaceRef: SymbolRef;
  readonly property: string;
}

export interface SymbolInfo {
  readonly name: string;
  link?: SymbolRef;
  namespaceAlias?: NamespaceAlias;
}

export function symbolKey(ref: SymbolRef): string {
  return `${ref.module}:${ref.symbol}`;
}

export function isSameSymbol(a: SymbolRef, b: SymbolRef): boolean {
  return a.module === b.module && a.symbol === b.symbol;
}

export class SymbolTable {
  private readonly tables: SymbolInfo[][] = [];
  private frozen = false;

  declare(module: ModuleId, name: string): SymbolRef {
    this.assertMutable('declare');
    let table = this.tables[module];
    if (!table) {
      table = [];
      this.tables[module] = table;
    }
    table.push({ name });
    return Object.freeze({ module, symbol: table.length - 1 });
  }

  get(ref: SymbolRef): SymbolInfo {
    const info = this.tables[ref.module]?.[ref.symbol];
    if (!info) throw new InternalError(`symbol ${symbolKey(ref)} is not declared`);
    return info;
  }

  originalName(ref: SymbolRef): string {
    return this.get(ref).name;
  }

  /** Symbols of a module in declaration order */
  symbolsOf(module: ModuleId): SymbolRef[] {
    const table = this.tables[module] ?? [];
    return table.map((_, symbol) => ({ module, symbol }));
  }

  /**
   * Makes `from` an alias of `to`. Returns false when the link would close a
   * loop, which only happens for circular re-exports.
   */
  link(from: SymbolRef, to: SymbolRef): boolean {
    this.assertMutable('link');
    const target = this.canonicalRef(to);
    if (isSameSymbol(target, from)) return false;
    this.get(from).link = target;
    return true;
  }

  setNamespaceAlias(ref: SymbolRef, alias: NamespaceAlias): void {
    this.assertMutable('setNamespaceAlias');
    this.get(ref).namespaceAlias = alias;
  }

  canonicalRef(ref: SymbolRef): SymbolRef {
    let current = ref;
    let steps = 0;
    for (let info = this.get(current); info.link; info = this.get(current)) {
      current = info.link;
      if (++steps > 10_000) throw new InternalError(`symbol links of ${symbolKey(ref)} form a cycle`);
    }
    return current;
  }

  namespaceAliasOf(ref: SymbolRef): NamespaceAlias | undefined {
    return this.get(this.canonicalRef(ref)).namespaceAlias;
  }

  /**
   * The symbol owning the storage `ref` reads: its root, or the module
   * object of a namespace alias.
   */
  storageRef(ref: SymbolRef): SymbolRef {
    const root = this.canonicalRef(ref);
    const alias = this.get(root).namespaceAlias;
    return alias ? this.canonicalRef(alias.namespaceRef) : root;
  }

  canonicalNameFor(ref: SymbolRef, names: ReadonlyMap<string, string>): string {
    const root = this.canonicalRef(ref);
    const name = names.get(symbolKey(root));
    if (name === undefined) {
      throw new InternalError(
        `symbol "${this.originalName(root)}" (${symbolKey(root)}) has no canonical name in this chunk`,
      );
    }
    return name;
  }

  /** Linking is over, nothing may declare or merge symbols anymore */
  freeze(): void {
    this.frozen = true;
  }

  private assertMutable(operation: string) {
    if (this.frozen) throw new InternalError(`${operation} called on a frozen symbol table`);
  }
}
