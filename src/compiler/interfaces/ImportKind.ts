import type { ModuleId, SymbolRef } from '../../core/symbols/symbolTable';

export enum ImportKind {
  /** ESM import ... from '...' or export ... from '...' */
  Import = 1,
  /** Dynamic import() */
  DynamicImport = 2,
  /** CommonJS require() */
  Require = 3,
}

/**
 * Static edges are the ones that decide which modules share a chunk,
 * a dynamic import only makes its target reachable through its own entry.
 */
export function isStaticImport(kind: ImportKind): boolean {
  return kind === ImportKind.Import || kind === ImportKind.Require;
}

export function formatImportKind(kind: ImportKind): string {
  switch (kind) {
    case ImportKind.Import:
      return 'import-statement';
    case ImportKind.DynamicImport:
      return 'dynamic-import';
    case ImportKind.Require:
      return 'require-call';
  }
}

export interface ImportRecord {
  readonly moduleRequest: string;
  readonly kind: ImportKind;
  readonly resolvedModule: ModuleId;
  /** Symbol holding the imported module object, e.g. `import_react` */
  readonly namespaceRef: SymbolRef;
  readonly containsImportStar: boolean;
  readonly containsImportDefault: boolean;
}

/**
 * An import edge as seen by the scanner, before its target is known
 */
export class RawImportRecord {
  containsImportStar = false;
  containsImportDefault = false;

  constructor(
    public readonly moduleRequest: string,
    public readonly kind: ImportKind,
    public readonly namespaceRef: SymbolRef,
  ) {}

  intoImportRecord(resolvedModule: ModuleId): ImportRecord {
    return Object.freeze({
      moduleRequest: this.moduleRequest,
      kind: this.kind,
      resolvedModule,
      namespaceRef: this.namespaceRef,
      containsImportStar: this.containsImportStar,
      containsImportDefault: this.containsImportDefault,
    });
  }
}
