import { WrapKind } from '../../compiler/interfaces/ModuleKinds';
import { InternalError } from '../../errors/errors';
import { propertyKey } from '../../utils/utils';
import type { Chunk } from '../chunk/chunk';
import { entryExports } from '../chunk/crossChunkLinks';
import type { LinkStageOutput } from '../link/linkStage';

export interface ChunkExport {
  readonly exported: string;
  /** Canonical name of the exported symbol in this chunk */
  readonly local: string;
}

/**
 * Entry exports first, then names other chunks import
 */
export function getChunkExports(link: LinkStageOutput, chunk: Chunk): ChunkExport[] {
  const result: ChunkExport[] = [];
  const seen = new Set<string>();
  for (const [exported, ref] of entryExports(link, chunk)) {
    seen.add(exported);
    result.push({ exported, local: link.symbols.canonicalNameFor(ref, chunk.canonicalNames) });
  }
  for (const item of chunk.exportsToOtherChunks.values()) {
    if (item.alias === undefined) throw new InternalError(`chunk #${chunk.id} exports a symbol without an alias`);
    if (seen.has(item.alias)) continue;
    seen.add(item.alias);
    result.push({ exported: item.alias, local: link.symbols.canonicalNameFor(item.ref, chunk.canonicalNames) });
  }
  return result;
}

/**
 * Runs a wrapped entry module, and exports a CommonJS entry's value
 */
export function renderEntryWrapper(link: LinkStageOutput, chunk: Chunk): string | undefined {
  if (chunk.entryModule === undefined) return undefined;
  const meta = link.metas[chunk.entryModule];
  if (meta.wrapKind === WrapKind.None) return undefined;
  if (!meta.wrapperRef) throw new InternalError(`wrapped entry #${chunk.entryModule} has no wrapper symbol`);
  const wrapper = link.symbols.canonicalNameFor(meta.wrapperRef, chunk.canonicalNames);

  if (meta.wrapKind === WrapKind.Esm) return `${wrapper}();`;
  switch (link.format) {
    case 'esm':
      return `export default ${wrapper}();`;
    case 'cjs':
      return `module.exports = ${wrapper}();`;
    case 'app':
      return `${wrapper}();`;
  }
}

export function renderChunkExports(link: LinkStageOutput, chunk: Chunk): string | undefined {
  const exports = getChunkExports(link, chunk);
  if (link.format === 'app' || exports.length === 0) return undefined;

  if (link.format === 'esm') {
    const specifiers = exports.map(({ exported, local }) =>
      exported === local ? local : `${local} as ${propertyKey(exported)}`,
    );
    return `export { ${specifiers.join(', ')} };`;
  }
  return exports
    .map(
      ({ exported, local }) =>
        `Object.defineProperty(exports, ${JSON.stringify(exported)}, { enumerable: true, get: () => ${local} });`,
    )
    .join('\n');
}
