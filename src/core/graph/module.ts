import type { ImportRecord } from '../../compiler/interfaces/ImportKind';
import type { ModuleScan } from '../parser/parser';
import type { ModuleId } from '../symbols/symbolTable';

export interface NormalModule {
  readonly kind: 'normal';
  readonly id: ModuleId;
  /** Resolved path, `\0`-prefixed for virtual modules */
  readonly path: string;
  /** Path relative to cwd, shown in output comments */
  readonly prettyPath: string;
  readonly source: string;
  readonly scan: ModuleScan;
  /** Same order and indices as `scan.rawImportRecords` */
  readonly importRecords: ReadonlyArray<ImportRecord>;
}

/**
 * A request left to the host at runtime: built-ins, `external` packages and
 * dynamic imports that could not be resolved
 */
export interface ExternalModule {
  readonly kind: 'external';
  readonly id: ModuleId;
  /** The request text */
  readonly path: string;
  readonly prettyPath: string;
}

export type Module = NormalModule | ExternalModule;

export function isNormalModule(module: Module | undefined): module is NormalModule {
  return module?.kind === 'normal';
}

export interface EntryPoint {
  readonly id: ModuleId;
  /** Logical chunk name */
  readonly name: string;
  readonly kind: 'user' | 'dynamic';
}
