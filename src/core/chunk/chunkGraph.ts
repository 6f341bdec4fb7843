import * as path from 'path';
import type { FileNameTemplate } from '../../config/fileNameTemplate';
import { InternalError } from '../../errors/errors';
import type { ModuleId } from '../symbols/symbolTable';
import type { Chunk, ChunkId } from './chunk';

export class ChunkGraph {
  constructor(
    public readonly chunks: ReadonlyArray<Chunk>,
    private readonly moduleToChunk: ReadonlyMap<ModuleId, ChunkId>,
    private readonly entryToChunk: ReadonlyMap<ModuleId, ChunkId>,
  ) {}

  get(id: ChunkId): Chunk {
    const chunk = this.chunks[id];
    if (!chunk) throw new InternalError(`chunk #${id} does not exist`);
    return chunk;
  }

  /** Chunk holding the module's code */
  chunkOf(module: ModuleId): Chunk | undefined {
    const id = this.moduleToChunk.get(module);
    return id === undefined ? undefined : this.get(id);
  }

  /** Chunk an `import()` of the entry module loads, a facade when the entry shares its code chunk */
  entryChunkOf(module: ModuleId): Chunk {
    const id = this.entryToChunk.get(module);
    if (id === undefined) throw new InternalError(`module #${module} is not an entry`);
    return this.get(id);
  }

  /**
   * Gives every chunk its preliminary file name. Names that collide
   * (case-insensitively) get a counter before the extension.
   */
  assignFileNames(entryFileNames: FileNameTemplate, chunkFileNames: FileNameTemplate): void {
    const used = new Set<string>();
    for (const chunk of this.chunks) {
      const fileName = chunk.renderFileName(chunk.isEntry ? entryFileNames : chunkFileNames);
      let candidate = fileName;
      if (used.has(candidate.toLowerCase())) {
        const ext = path.posix.extname(fileName);
        const base = ext ? fileName.slice(0, -ext.length) : fileName;
        let counter = 2;
        while (used.has(`${base}${counter}${ext}`.toLowerCase())) counter++;
        candidate = `${base}${counter}${ext}`;
      }
      used.add(candidate.toLowerCase());
      chunk.preliminaryFilename = candidate;
    }
  }
}
