import { InternalError } from '../../errors/errors';
import { propertyKey, relativeChunkPath } from '../../utils/utils';
import type { Chunk } from '../chunk/chunk';
import type { ChunkGraph } from '../chunk/chunkGraph';
import type { LinkStageOutput } from '../link/linkStage';

/**
 * One statement per chunk this chunk imports from, in discovery order.
 * App output never has cross-chunk imports.
 */
export function renderChunkImports(link: LinkStageOutput, graph: ChunkGraph, chunk: Chunk): string | undefined {
  if (link.format === 'app' || chunk.importsFromOtherChunks.size === 0) return undefined;
  const fileName = chunk.preliminaryFilename;
  if (fileName === undefined) throw new InternalError(`chunk #${chunk.id} has no file name`);

  const statements: string[] = [];
  for (const [from, items] of chunk.importsFromOtherChunks) {
    const target = graph.get(from).preliminaryFilename;
    if (target === undefined) throw new InternalError(`chunk #${from} has no file name`);
    const request = JSON.stringify(relativeChunkPath(fileName, target));

    const specifiers = items.map(item => {
      const local = link.symbols.canonicalNameFor(item.importRef, chunk.canonicalNames);
      const exported = item.exportAlias;
      if (exported === undefined) throw new InternalError(`import of "${local}" from chunk #${from} has no export alias`);
      if (exported === local) return local;
      return link.format === 'esm' ? `${propertyKey(exported)} as ${local}` : `${propertyKey(exported)}: ${local}`;
    });

    if (link.format === 'esm') {
      statements.push(specifiers.length > 0 ? `import { ${specifiers.join(', ')} } from ${request};` : `import ${request};`);
    } else {
      statements.push(
        specifiers.length > 0 ? `const { ${specifiers.join(', ')} } = require(${request});` : `require(${request});`,
      );
    }
  }
  return statements.join('\n');
}
