import Concat from 'concat-with-sourcemaps';
import offsetLines from 'offset-sourcemap-lines';

export interface SourceMapJson {
  version: number;
  file?: string;
  sources: string[];
  sourcesContent?: Array<string | null>;
  names: string[];
  mappings: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validates a source map read as JSON or returned by a library
 */
export function parseSourceMap(input: unknown): SourceMapJson {
  const value: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  if (typeof value !== 'object' || value === null) throw new Error('Source map is not an object');
  const version: unknown = Reflect.get(value, 'version');
  const sources: unknown = Reflect.get(value, 'sources');
  const names: unknown = Reflect.get(value, 'names');
  const mappings: unknown = Reflect.get(value, 'mappings');
  const file: unknown = Reflect.get(value, 'file');
  const sourcesContent: unknown = Reflect.get(value, 'sourcesContent');
  if (typeof version !== 'number' || !isStringArray(sources) || typeof mappings !== 'string') {
    throw new Error('Source map is missing version, sources or mappings');
  }
  const map: SourceMapJson = { version, sources, names: isStringArray(names) ? names : [], mappings };
  if (typeof file === 'string') map.file = file;
  if (Array.isArray(sourcesContent)) {
    map.sourcesContent = sourcesContent.map(content => (typeof content === 'string' ? content : null));
  }
  return map;
}

/**
 * Shifts every mapping down by `lines`, for code prepended after the map was built
 */
export function offsetSourceMap(map: SourceMapJson, lines: number): SourceMapJson {
  const contentBySource = new Map<string, string | null>();
  map.sources.forEach((source, index) => contentBySource.set(source, map.sourcesContent?.[index] ?? null));
  const shifted = parseSourceMap(offsetLines(map, lines));
  if (map.sourcesContent) {
    shifted.sourcesContent = shifted.sources.map(source => contentBySource.get(source) ?? null);
  }
  if (map.file !== undefined) shifted.file = map.file;
  return shifted;
}

interface Fragment {
  content: string;
  sourcemap?: string;
}

/**
 * Ordered code fragments joined with newlines into one file and one map
 */
export class ConcatSource {
  private readonly fragments: Fragment[] = [];

  addSource(content: string, sourcemap?: string): void {
    this.fragments.push({ content, sourcemap });
  }

  prependSource(content: string, sourcemap?: string): void {
    this.fragments.unshift({ content, sourcemap });
  }

  contentAndSourceMap(generateMap: boolean, fileName: string): { code: string; map?: SourceMapJson } {
    const concat = new Concat(generateMap, fileName, '\n');
    for (const fragment of this.fragments) {
      concat.add(null, fragment.content, generateMap ? fragment.sourcemap : undefined);
    }
    const code = concat.content.toString();
    if (!generateMap || concat.sourceMap === undefined) return { code };
    return { code, map: parseSourceMap(concat.sourceMap) };
  }
}
