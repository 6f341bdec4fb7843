/**
 * Module Loader
 *
 * Fetches the module graph depth-first from the entries:
 * - ids are handed out in discovery order
 * - every import edge goes through plugin onResolve hooks, then the resolver
 * - static edges that fail to resolve are errors, dynamic ones warnings
 * - the runtime helper module is scanned once the graph is complete
 */

import * as path from 'path';
import { ImportKind } from '../../compiler/interfaces/ImportKind';
import type { ImportRecord, RawImportRecord } from '../../compiler/interfaces/ImportKind';
import { bundleRuntime, RUNTIME_MODULE_PATH } from '../../bundleRuntime/bundleRuntime';
import { BatchedErrors, BuildError, toError } from '../../errors/errors';
import type { BundleLog } from '../../log/BundleLog';
import type { FileSystem } from '../../utils/fileSystem';
import { prettyPath } from '../../utils/utils';
import { loadSource } from '../loader/loadSource';
import { parseModule } from '../parser/parser';
import type { PluginManager, ResolveKind } from '../plugins/pluginSystem';
import type { ModuleResolver, ResolveResult } from '../resolver/moduleResolver';
import { SymbolTable } from '../symbols/symbolTable';
import type { ModuleId } from '../symbols/symbolTable';
import type { EntryPoint, Module } from './module';

export interface EntryRequest {
  name: string;
  /** Path of the entry, relative to cwd or absolute */
  path: string;
}

export interface ModuleLoaderOptions {
  cwd: string;
  entries: ReadonlyArray<EntryRequest>;
  resolver: ModuleResolver;
  plugins: PluginManager;
  fs: FileSystem;
  log: BundleLog;
}

export interface ModuleGraph {
  modules: ReadonlyArray<Module>;
  /** User entries in the order they were given */
  entries: ReadonlyArray<EntryPoint>;
  symbols: SymbolTable;
  runtimeId: ModuleId;
  warnings: ReadonlyArray<BuildError>;
}

function resolveKindOf(kind: ImportKind): ResolveKind {
  switch (kind) {
    case ImportKind.Import:
      return 'import';
    case ImportKind.DynamicImport:
      return 'dynamic';
    case ImportKind.Require:
      return 'require';
  }
}

export class ModuleLoader {
  private readonly slots: Array<Module | undefined> = [];
  private readonly idByPath = new Map<string, ModuleId>();
  private readonly externalByRequest = new Map<string, ModuleId>();
  private readonly symbols = new SymbolTable();
  private readonly errors: Error[] = [];
  private readonly warnings: BuildError[] = [];

  constructor(private readonly options: ModuleLoaderOptions) {}

  async fetchModules(): Promise<ModuleGraph> {
    const entries: EntryPoint[] = [];
    for (const entry of this.options.entries) {
      const id = await this.fetchEntry(entry);
      if (id !== undefined) entries.push({ id, name: entry.name, kind: 'user' });
    }

    const runtimeId = this.slots.length;
    this.idByPath.set(RUNTIME_MODULE_PATH, runtimeId);
    this.slots.push(undefined);
    const source = bundleRuntime();
    this.slots[runtimeId] = {
      kind: 'normal',
      id: runtimeId,
      path: RUNTIME_MODULE_PATH,
      prettyPath: prettyPath(RUNTIME_MODULE_PATH, this.options.cwd),
      source,
      scan: parseModule({ id: runtimeId, filename: RUNTIME_MODULE_PATH, source, symbols: this.symbols }),
      importRecords: [],
    };

    if (this.errors.length > 0) {
      throw new BatchedErrors(this.errors);
    }

    const modules: Module[] = [];
    for (const [id, module] of this.slots.entries()) {
      if (!module) throw new BuildError('LOAD_ERROR', `Module #${id} was never loaded`);
      modules.push(module);
    }
    this.options.log.verbose('load', 'Loaded $count modules', { count: modules.length });

    return { modules, entries, symbols: this.symbols, runtimeId, warnings: this.warnings };
  }

  private async fetchEntry(entry: EntryRequest): Promise<ModuleId | undefined> {
    let resolved: ResolveResult;
    try {
      resolved = await this.resolve(entry.path, undefined, 'entry');
    } catch (error) {
      this.errors.push(
        error instanceof BuildError
          ? error
          : new BuildError('UNRESOLVED_ENTRY', `Could not resolve entry module "${entry.path}"`, { cause: error }),
      );
      return undefined;
    }
    if (resolved.external) {
      this.errors.push(new BuildError('UNRESOLVED_ENTRY', `Entry module "${entry.path}" cannot be external`));
      return undefined;
    }
    return this.fetchModule(resolved);
  }

  private async resolve(specifier: string, importer: string | undefined, kind: ResolveKind): Promise<ResolveResult> {
    const resolveDir = importer ? path.dirname(importer) : this.options.cwd;
    const fromPlugin = await this.options.plugins.runOnResolve({
      path: specifier,
      importer: importer ?? '',
      kind,
      resolveDir,
    });
    if (fromPlugin?.external) {
      return { path: fromPlugin.path ?? specifier, external: true, ignored: false };
    }
    if (fromPlugin?.ignored) {
      return { path: fromPlugin.path ?? path.resolve(resolveDir, specifier), external: false, ignored: true };
    }
    if (fromPlugin?.path !== undefined) {
      return { path: fromPlugin.path, external: false, ignored: false };
    }
    // Entries are paths, never package names
    return this.options.resolver.resolve(importer ? specifier : path.resolve(resolveDir, specifier), importer, kind);
  }

  private async fetchModule(target: ResolveResult): Promise<ModuleId> {
    const existing = this.idByPath.get(target.path);
    if (existing !== undefined) return existing;

    const id = this.slots.length;
    this.idByPath.set(target.path, id);
    this.slots.push(undefined);
    const pretty = prettyPath(target.path, this.options.cwd);

    try {
      const source = await loadSource(target, this.options.plugins, this.options.fs);
      const scan = parseModule({ id, filename: target.path, source, symbols: this.symbols });
      const importRecords: ImportRecord[] = [];
      for (const raw of scan.rawImportRecords) {
        importRecords.push(raw.intoImportRecord(await this.resolveRecord(raw, target.path)));
      }
      this.slots[id] = { kind: 'normal', id, path: target.path, prettyPath: pretty, source, scan, importRecords };
      this.options.log.verbose('load', '$path', { path: pretty });
    } catch (error) {
      this.errors.push(toError(error));
      // Keeps ids dense, the build fails before anything reads it
      this.slots[id] = { kind: 'external', id, path: target.path, prettyPath: pretty };
    }
    return id;
  }

  private async resolveRecord(raw: RawImportRecord, importer: string): Promise<ModuleId> {
    let resolved: ResolveResult;
    try {
      resolved = await this.resolve(raw.moduleRequest, importer, resolveKindOf(raw.kind));
    } catch (error) {
      if (error instanceof BuildError) {
        this.errors.push(error);
        return this.externalModule(raw.moduleRequest);
      }
      const message = `Could not resolve "${raw.moduleRequest}" from "${prettyPath(importer, this.options.cwd)}"`;
      if (raw.kind === ImportKind.DynamicImport) {
        this.warnings.push(
          new BuildError('UNRESOLVED_IMPORT', `${message}, the import() is kept as written`, { id: importer, cause: error }),
        );
      } else {
        this.errors.push(new BuildError('UNRESOLVED_IMPORT', message, { id: importer, cause: error }));
      }
      return this.externalModule(raw.moduleRequest);
    }

    if (resolved.external) return this.externalModule(resolved.path);
    return this.fetchModule(resolved);
  }

  private externalModule(request: string): ModuleId {
    const existing = this.externalByRequest.get(request);
    if (existing !== undefined) return existing;
    const id = this.slots.length;
    this.slots.push({ kind: 'external', id, path: request, prettyPath: request });
    this.externalByRequest.set(request, id);
    return id;
  }
}
