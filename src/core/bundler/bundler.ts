/**
 * Bundler
 *
 * Runs the whole pipeline:
 * - loads and scans the module graph
 * - links imports to exports
 * - splits modules into chunks by entry reachability
 * - names symbols per chunk and wires cross-chunk imports
 * - renders every chunk with its source map
 */

import * as convertSourceMap from 'convert-source-map';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { OutputFormat } from '../../compiler/interfaces/ModuleKinds';
import { DEFAULT_FILE_NAMES, FileNameTemplate } from '../../config/fileNameTemplate';
import { BuildError, collectSettled } from '../../errors/errors';
import { createBundleLog } from '../../log/BundleLog';
import type { BundleLog, LogLevel } from '../../log/BundleLog';
import type { SourceMapJson } from '../../sourcemap/concatSource';
import { NodeFileSystem } from '../../utils/fileSystem';
import type { FileSystem } from '../../utils/fileSystem';
import { fileStem } from '../../utils/utils';
import { computeCrossChunkLinks, assignExportAliases } from '../chunk/crossChunkLinks';
import { deconflictChunk } from '../chunk/deconflict';
import { generateChunks } from '../chunk/generateChunks';
import { ModuleLoader } from '../graph/moduleLoader';
import type { EntryRequest } from '../graph/moduleLoader';
import { linkModules } from '../link/linkStage';
import { PluginManager } from '../plugins/pluginSystem';
import type { Plugin } from '../plugins/pluginSystem';
import { renderChunk } from '../render/renderChunk';
import type { AddonHook, ChunkRenderOptions } from '../render/renderChunk';
import type { RenderedChunk } from '../render/renderedChunk';
import { ModuleResolver } from '../resolver/moduleResolver';

// Bundler options
export interface BundlerOptions {
  /** One path, several paths, or chunk name → path */
  entry: string | string[] | Record<string, string>;
  outdir?: string;
  cwd?: string;
  format?: OutputFormat;
  /** `true` writes a `.map` file next to each chunk */
  sourcemap?: boolean | 'inline' | 'external';
  external?: string[];
  alias?: Record<string, string | false>;
  extensions?: string[];
  plugins?: Plugin[];
  banner?: string | AddonHook;
  footer?: string | AddonHook;
  entryFileNames?: string;
  chunkFileNames?: string;
  /** Modules rendered at once per chunk */
  parallelism?: number;
  logLevel?: LogLevel;
  fs?: FileSystem;
}

interface NormalizedOptions {
  entries: EntryRequest[];
  outdir: string;
  cwd: string;
  format: OutputFormat;
  sourcemap: false | 'inline' | 'external';
  external: string[];
  alias: Record<string, string | false>;
  extensions?: string[];
  plugins: Plugin[];
  banner?: AddonHook;
  footer?: AddonHook;
  entryFileNames: FileNameTemplate;
  chunkFileNames: FileNameTemplate;
  parallelism: number;
  fs: FileSystem;
}

export interface OutputChunk {
  fileName: string;
  /** Code including the source map comment, if any */
  code: string;
  map?: SourceMapJson;
  renderedChunk: RenderedChunk;
  /** Absolute directory the chunk is written to */
  fileDir: string;
}

export interface BundleStats {
  modules: number;
  chunks: number;
  totalSize: number;
  buildTime: number;
}

// Bundle output
export interface BundleOutput {
  chunks: OutputChunk[];
  warnings: BuildError[];
  stats: BundleStats;
}

function toAddonHook(addon: string | AddonHook | undefined): AddonHook | undefined {
  if (addon === undefined) return undefined;
  if (typeof addon === 'string') return () => addon;
  return addon;
}

function normalizeEntries(entry: BundlerOptions['entry']): EntryRequest[] {
  if (typeof entry === 'string') return [{ name: fileStem(entry), path: entry }];
  if (Array.isArray(entry)) return entry.map(item => ({ name: fileStem(item), path: item }));
  return Object.entries(entry).map(([name, item]) => ({ name, path: item }));
}

/**
 * Main bundler class
 */
export class Bundler {
  private options: NormalizedOptions;
  private log: BundleLog;
  private plugins: PluginManager;
  private resolver: ModuleResolver;

  constructor(options: BundlerOptions) {
    if (options.parallelism !== undefined && !(Number.isInteger(options.parallelism) && options.parallelism > 0)) {
      throw new BuildError('UNSUPPORTED', `parallelism must be a positive integer, got ${options.parallelism}`);
    }
    const sourcemap = options.sourcemap === true ? 'external' : options.sourcemap || false;
    this.options = {
      entries: normalizeEntries(options.entry),
      outdir: options.outdir || 'dist',
      cwd: options.cwd || process.cwd(),
      format: options.format || 'esm',
      sourcemap,
      external: options.external || [],
      alias: options.alias || {},
      extensions: options.extensions,
      plugins: options.plugins || [],
      banner: toAddonHook(options.banner),
      footer: toAddonHook(options.footer),
      entryFileNames: new FileNameTemplate(options.entryFileNames || DEFAULT_FILE_NAMES),
      chunkFileNames: new FileNameTemplate(options.chunkFileNames || DEFAULT_FILE_NAMES),
      parallelism: Math.max(1, options.parallelism ?? os.cpus().length - 1),
      fs: options.fs || new NodeFileSystem(),
    };

    this.log = createBundleLog({ level: options.logLevel });
    this.plugins = new PluginManager(this.options.plugins);
    this.resolver = new ModuleResolver({
      basedir: this.options.cwd,
      alias: this.options.alias,
      external: this.options.external,
      extensions: this.options.extensions,
      fs: this.options.fs,
    });
  }

  get bundleLog(): BundleLog {
    return this.log;
  }

  /**
   * Build the bundle
   */
  async build(): Promise<BundleOutput> {
    const startTime = Date.now();
    this.log.startTimeMeasure();
    const { format } = this.options;

    await this.plugins.setup();

    const loader = new ModuleLoader({
      cwd: this.options.cwd,
      entries: this.options.entries,
      resolver: this.resolver,
      plugins: this.plugins,
      fs: this.options.fs,
      log: this.log,
    });
    const graph = await loader.fetchModules();

    const link = linkModules(graph, format);
    const chunkGraph = generateChunks(link);
    if (format === 'app' && chunkGraph.chunks.length > 1) {
      throw new BuildError(
        'UNSUPPORTED',
        `The app format emits a single file but this build needs ${chunkGraph.chunks.length} chunks`,
      );
    }
    this.log.verbose('chunks', 'Split $modules modules into $chunks chunks', {
      modules: link.modules.length,
      chunks: chunkGraph.chunks.length,
    });

    computeCrossChunkLinks(link, chunkGraph);
    for (const chunk of chunkGraph.chunks) deconflictChunk(link, chunk);
    assignExportAliases(link, chunkGraph);
    chunkGraph.assignFileNames(this.options.entryFileNames, this.options.chunkFileNames);

    const renderOptions: ChunkRenderOptions = {
      format,
      sourcemap: this.options.sourcemap !== false,
      cwd: this.options.cwd,
      dir: this.options.outdir,
      parallelism: this.options.parallelism,
      banner: this.options.banner,
      footer: this.options.footer,
    };
    const rendered = collectSettled(
      await Promise.allSettled(chunkGraph.chunks.map(chunk => renderChunk(link, chunkGraph, chunk, renderOptions))),
    );

    const chunks = rendered.map(output => {
      let code = output.code;
      if (output.map && this.options.sourcemap === 'inline') {
        code += '\n' + convertSourceMap.fromObject(output.map).toComment();
      } else if (output.map && this.options.sourcemap === 'external') {
        code += '\n' + convertSourceMap.generateMapFileComment(path.basename(output.preliminaryFilename) + '.map');
      }
      return {
        fileName: output.preliminaryFilename,
        code,
        map: output.map,
        renderedChunk: output.renderedChunk,
        fileDir: output.fileDir,
      };
    });

    for (const warning of link.warnings) this.log.warn(warning.message);
    this.log.info('build', 'Bundled $modules modules into $chunks chunks in $time', {
      modules: link.modules.length,
      chunks: chunks.length,
      time: this.log.getTime(),
    });

    return {
      chunks,
      warnings: [...link.warnings],
      stats: {
        modules: link.modules.length,
        chunks: chunks.length,
        totalSize: chunks.reduce((sum, chunk) => sum + chunk.code.length, 0),
        buildTime: Date.now() - startTime,
      },
    };
  }

  /**
   * Write output to disk
   */
  async write(output: BundleOutput): Promise<string[]> {
    const written: string[] = [];
    for (const chunk of output.chunks) {
      const filePath = path.join(chunk.fileDir, path.basename(chunk.fileName));
      if (!fs.existsSync(chunk.fileDir)) {
        fs.mkdirSync(chunk.fileDir, { recursive: true });
      }
      fs.writeFileSync(filePath, chunk.code);
      written.push(filePath);

      if (this.options.sourcemap === 'external' && chunk.map) {
        fs.writeFileSync(filePath + '.map', JSON.stringify(chunk.map));
        written.push(filePath + '.map');
      }
    }
    return written;
  }
}

/**
 * Create a bundler instance
 */
export function createBundler(options: BundlerOptions): Bundler {
  return new Bundler(options);
}

/**
 * Build a bundle
 */
export async function bundle(options: BundlerOptions): Promise<BundleOutput> {
  const bundler = new Bundler(options);
  return bundler.build();
}
