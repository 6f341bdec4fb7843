import { describe, expect, it } from 'vitest';
import { generateChunks } from '../../src/core/chunk/generateChunks';
import { linkModules } from '../../src/core/link/linkStage';
import { renderChunk } from '../../src/core/render/renderChunk';
import { InternalError } from '../../src/errors/errors';
import { loadGraph, ROOT } from '../helpers/memoryFileSystem';

describe('renderChunk', () => {
  it('refuses a chunk without a file name', async () => {
    const link = linkModules(await loadGraph({ 'src/a.js': 'console.log(1);' }, ['src/a.js']), 'esm');
    const graph = generateChunks(link);

    const run = renderChunk(link, graph, graph.chunks[0], { format: 'esm', sourcemap: false, cwd: ROOT, dir: 'dist', parallelism: 1 });

    await expect(run).rejects.toBeInstanceOf(InternalError);
    await expect(run).rejects.toThrow('Internal error: chunk #0 has no preliminary file name');
  });
});
