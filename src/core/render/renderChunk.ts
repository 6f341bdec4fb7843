/**
 * Chunk renderer
 *
 * Produces one output file:
 * 1. imports from other chunks
 * 2. member modules, rendered on a pool and joined in module order
 * 3. "use strict" for CommonJS output made only of strict code
 * 4. entry wrapper call and export block
 * 5. footer, concatenation with a composite source map, banner
 */

import * as path from 'path';
import { ExportsKind } from '../../compiler/interfaces/ModuleKinds';
import type { OutputFormat } from '../../compiler/interfaces/ModuleKinds';
import { BuildError, InternalError } from '../../errors/errors';
import { ConcatSource, offsetSourceMap } from '../../sourcemap/concatSource';
import type { SourceMapJson } from '../../sourcemap/concatSource';
import type { Chunk } from '../chunk/chunk';
import type { ChunkGraph } from '../chunk/chunkGraph';
import { normalModule } from '../link/linkStage';
import type { LinkStageOutput } from '../link/linkStage';
import { renderChunkExports, renderEntryWrapper } from './renderChunkExports';
import { renderChunkImports } from './renderChunkImports';
import { generateRenderedChunk } from './renderedChunk';
import type { RenderedChunk } from './renderedChunk';
import { renderNormalModule } from './renderNormalModule';
import type { ModuleRenderOutput } from './renderNormalModule';
import { mapInPool } from './workerPool';

export type AddonHook = (chunk: RenderedChunk) => string | Promise<string>;

export interface ChunkRenderOptions {
  format: OutputFormat;
  sourcemap: boolean;
  cwd: string;
  /** Output directory, relative to cwd or absolute */
  dir: string;
  parallelism: number;
  banner?: AddonHook;
  footer?: AddonHook;
}

export interface ChunkRenderOutput {
  code: string;
  map?: SourceMapJson;
  renderedChunk: RenderedChunk;
  /** Absolute directory the chunk is written to */
  fileDir: string;
  preliminaryFilename: string;
}

async function callAddonHook(hookName: string, hook: AddonHook | undefined, chunk: RenderedChunk): Promise<string> {
  if (!hook) return '';
  try {
    return await hook(chunk);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BuildError('HOOK_ERROR', `${hookName} hook failed for "${chunk.fileName}": ${message}`, { cause: error });
  }
}

export async function renderChunk(
  link: LinkStageOutput,
  graph: ChunkGraph,
  chunk: Chunk,
  options: ChunkRenderOptions,
): Promise<ChunkRenderOutput> {
  const fileName = chunk.preliminaryFilename;
  if (fileName === undefined) throw new InternalError(`chunk #${chunk.id} has no preliminary file name`);

  const concat = new ConcatSource();
  const imports = renderChunkImports(link, graph, chunk);
  if (imports) concat.addSource(imports);
  if (options.format === 'app') concat.addSource('(function() {');

  const modules = chunk.modules.map(id => normalModule(link, id));
  const outputs = await mapInPool(modules, options.parallelism, async module =>
    renderNormalModule(module, { link, graph, chunk, sourcemap: options.sourcemap }),
  );
  const rendered: ModuleRenderOutput[] = [];
  for (const output of outputs) {
    if (!output) continue;
    rendered.push(output);
    concat.addSource(`// ${output.modulePrettyPath}`);
    concat.addSource(output.renderedContent, output.sourcemap);
  }

  const renderedChunk = generateRenderedChunk(link, graph, chunk, fileName, rendered);

  if (
    options.format === 'cjs' &&
    modules.every(module => module.scan.exportsKind === ExportsKind.Esm || module.scan.containsUseStrict)
  ) {
    concat.prependSource('"use strict";');
  }

  const entryWrapper = renderEntryWrapper(link, chunk);
  if (entryWrapper) concat.addSource(entryWrapper);
  const exports = renderChunkExports(link, chunk);
  if (exports) concat.addSource(exports);
  if (options.format === 'app') concat.addSource('})();');

  const footer = await callAddonHook('footer', options.footer, renderedChunk);
  if (footer) concat.addSource(footer);

  let { code, map } = concat.contentAndSourceMap(options.sourcemap, fileName);

  const filePath = path.resolve(options.cwd, options.dir, fileName);
  const fileDir = path.dirname(filePath);
  if (fileDir === filePath) throw new InternalError(`output path ${filePath} has no parent directory`);
  if (map) {
    map.sources = map.sources.map(source => path.relative(fileDir, source));
  }

  const banner = await callAddonHook('banner', options.banner, renderedChunk);
  if (banner) {
    code = `${banner}\n${code}`;
    if (map) map = offsetSourceMap(map, banner.split('\n').length);
  }

  return { code, map, renderedChunk, fileDir, preliminaryFilename: fileName };
}
