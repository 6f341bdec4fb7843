import * as path from 'path';
import reservedNames from '../config/reservedNames.json';

export function reservedNameList(): ReadonlyArray<string> {
  return reservedNames;
}

/**
 * Turns any text into something usable as an identifier, `2d-utils` → `_2d_utils`
 */
export function legitimizeIdentifier(text: string): string {
  let result = text.replace(/[^\w$]/g, '_');
  if (result === '') result = '_';
  if (/^\d/.test(result)) result = '_' + result;
  return result;
}

/**
 * Base file name without its extension, as an identifier
 */
export function fileStem(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return legitimizeIdentifier(ext ? base.slice(0, -ext.length) : base);
}

/**
 * Path shown in output comments and summaries, relative to cwd with posix separators
 */
export function prettyPath(filePath: string, cwd: string): string {
  if (filePath.startsWith('\0')) return filePath.slice(1);
  if (!path.isAbsolute(filePath)) return filePath;
  return path.relative(cwd, filePath).split(path.sep).join('/');
}

/**
 * Import specifier from one output file to another, `./chunk.js`, `../b.js`
 */
export function relativeChunkPath(fromFileName: string, toFileName: string): string {
  const relative = path.posix.relative(path.posix.dirname(fromFileName), toFileName);
  return relative.startsWith('../') || relative.startsWith('./') ? relative : `./${relative}`;
}

export function propertyAccess(property: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(property) ? `.${property}` : `[${JSON.stringify(property)}]`;
}

export function propertyKey(property: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(property) ? property : JSON.stringify(property);
}
