import { WrapKind } from '../../compiler/interfaces/ModuleKinds';
import type { Chunk } from '../chunk/chunk';
import type { ChunkGraph } from '../chunk/chunkGraph';
import type { LinkStageOutput } from '../link/linkStage';
import { normalModule } from '../link/linkStage';
import type { ModuleRenderOutput, RenderedModule } from './renderNormalModule';
import { getChunkExports } from './renderChunkExports';

/**
 * Read-only summary of a chunk handed to the banner and footer hooks
 */
export interface RenderedChunk {
  readonly fileName: string;
  readonly name?: string;
  readonly isEntry: boolean;
  readonly isDynamicEntry: boolean;
  /** Path of the entry module, also for facade chunks */
  readonly facadeModuleId?: string;
  readonly moduleIds: ReadonlyArray<string>;
  readonly modules: Readonly<Record<string, RenderedModule>>;
  readonly exports: ReadonlyArray<string>;
  /** File names of the chunks this one imports */
  readonly imports: ReadonlyArray<string>;
}

export function generateRenderedChunk(
  link: LinkStageOutput,
  graph: ChunkGraph,
  chunk: Chunk,
  fileName: string,
  rendered: ReadonlyArray<ModuleRenderOutput>,
): RenderedChunk {
  const modules: Record<string, RenderedModule> = {};
  for (const output of rendered) {
    if (!output.modulePath.startsWith('\0')) modules[output.modulePath] = Object.freeze({ ...output.renderedModule });
  }
  const exports = getChunkExports(link, chunk).map(item => item.exported);
  if (link.format === 'esm' && chunk.entryModule !== undefined && link.metas[chunk.entryModule].wrapKind === WrapKind.Cjs) {
    exports.unshift('default');
  }
  const imports: string[] = [];
  for (const from of chunk.importsFromOtherChunks.keys()) {
    const target = graph.get(from).preliminaryFilename;
    if (target !== undefined) imports.push(target);
  }

  return Object.freeze({
    fileName,
    name: chunk.name,
    isEntry: chunk.isEntry,
    isDynamicEntry: chunk.isDynamicEntry,
    facadeModuleId: chunk.entryModule === undefined ? undefined : normalModule(link, chunk.entryModule).path,
    moduleIds: Object.freeze(chunk.modules.map(id => normalModule(link, id).path)),
    modules: Object.freeze(modules),
    exports: Object.freeze(exports),
    imports: Object.freeze(imports),
  });
}
