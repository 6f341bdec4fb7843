// Extensions that decide the module format on their own
export const ESM_EXTENSIONS = ['.mjs']; // Extensions that are always ESM
export const CJS_EXTENSIONS = ['.cjs']; // Extensions that are always CommonJS

export const TS_ESM_EXTENSIONS = ['.mts']; // TypeScript ESM
export const TS_CJS_EXTENSIONS = ['.cts']; // TypeScript CommonJS

// Order in which the resolver probes extension-less requests
export const RESOLVE_EXTENSIONS = ['.js', '.mjs', '.cjs', '.jsx', '.ts', '.tsx', '.mts', '.cts', '.json'];

/**
 * Check if a file extension indicates ESM module
 */
export function isESMExtension(ext: string): boolean {
  return ESM_EXTENSIONS.includes(ext) || TS_ESM_EXTENSIONS.includes(ext);
}

/**
 * Check if a file extension indicates CommonJS module
 */
export function isCJSExtension(ext: string): boolean {
  return CJS_EXTENSIONS.includes(ext) || TS_CJS_EXTENSIONS.includes(ext);
}
