/**
 * How a module exposes its exports
 */
export enum ExportsKind {
  /** No module syntax at all, decided at link time */
  None = 0,
  Esm = 1,
  CommonJs = 2,
}

/**
 * Interop wrapper emitted around a module body
 */
export enum WrapKind {
  None = 0,
  /** `var init_x = __esm(() => { ... })` */
  Esm = 1,
  /** `var require_x = __commonJS((exports, module) => { ... })` */
  Cjs = 2,
}

export type OutputFormat = 'esm' | 'cjs' | 'app';
