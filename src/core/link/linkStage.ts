/**
 * Link Stage
 *
 * Turns the scanned graph into a linked one:
 * - final export kind of every module
 * - interop wrapping (`require_x` for CommonJS, `init_x` for required ES modules)
 * - resolved exports through re-exports and `export *`
 * - import bindings merged into the symbols they import
 * - runtime helpers each module needs
 * - execution order of the static graph
 *
 * After this stage the symbol table is frozen.
 */

import { ImportKind, isStaticImport } from '../../compiler/interfaces/ImportKind';
import type { ImportRecord } from '../../compiler/interfaces/ImportKind';
import { ExportsKind, WrapKind } from '../../compiler/interfaces/ModuleKinds';
import type { OutputFormat } from '../../compiler/interfaces/ModuleKinds';
import { RUNTIME_HELPERS } from '../../bundleRuntime/bundleRuntime';
import type { RuntimeHelper } from '../../bundleRuntime/bundleRuntime';
import { BatchedErrors, BuildError, InternalError } from '../../errors/errors';
import { isNormalModule } from '../graph/module';
import type { EntryPoint, Module, NormalModule } from '../graph/module';
import type { ModuleGraph } from '../graph/moduleLoader';
import { symbolKey } from '../symbols/symbolTable';
import type { ModuleId, SymbolRef, SymbolTable } from '../symbols/symbolTable';

export interface ModuleMeta {
  exportsKind: ExportsKind;
  wrapKind: WrapKind;
  wrapperRef?: SymbolRef;
  /** Exported name → symbol, in declaration order then `export *` order */
  resolvedExports: Map<string, SymbolRef>;
  /** The namespace object `<stem>_exports` is materialized */
  needsNamespace: boolean;
  runtimeHelpers: Set<RuntimeHelper>;
  /** Every symbol the rendered module reads, deduplicated, in first-use order */
  referencedSymbols: SymbolRef[];
  /** Position in execution order, -1 for modules not in any chunk */
  execOrder: number;
}

export interface LinkStageOutput {
  readonly modules: ReadonlyArray<Module>;
  readonly metas: ReadonlyArray<ModuleMeta>;
  readonly symbols: SymbolTable;
  /** User entries first, then dynamic-import targets in discovery order */
  readonly entries: ReadonlyArray<EntryPoint>;
  readonly runtimeId: ModuleId;
  readonly runtimeIncluded: boolean;
  readonly format: OutputFormat;
  readonly warnings: ReadonlyArray<BuildError>;
}

export function runtimeHelperRef(link: LinkStageOutput, helper: RuntimeHelper): SymbolRef {
  const ref = link.metas[link.runtimeId].resolvedExports.get(helper);
  if (!ref) throw new InternalError(`runtime module does not export ${helper}`);
  return ref;
}

export function normalModule(link: Pick<LinkStageOutput, 'modules'>, id: ModuleId): NormalModule {
  const module = link.modules[id];
  if (!isNormalModule(module)) throw new InternalError(`module #${id} is not a bundled module`);
  return module;
}

/**
 * True when an import statement of this record binds names that live on the
 * imported module object (CommonJS or non-ESM externals)
 */
export function importsThroughNamespace(link: Pick<LinkStageOutput, 'modules' | 'metas' | 'format'>, record: ImportRecord): boolean {
  const target = link.modules[record.resolvedModule];
  if (!isNormalModule(target)) return link.format !== 'esm';
  return link.metas[target.id].exportsKind === ExportsKind.CommonJs;
}

class Linker {
  private readonly modules: ReadonlyArray<Module>;
  private readonly symbols: SymbolTable;
  private readonly metas: ModuleMeta[];
  private readonly errors: Error[] = [];
  private readonly warnings: BuildError[];
  private readonly exportsCache = new Map<ModuleId, Map<string, SymbolRef>>();

  constructor(private readonly graph: ModuleGraph, private readonly format: OutputFormat) {
    this.modules = graph.modules;
    this.symbols = graph.symbols;
    this.warnings = [...graph.warnings];
    this.metas = graph.modules.map(module => ({
      exportsKind: isNormalModule(module) ? module.scan.exportsKind : ExportsKind.None,
      wrapKind: WrapKind.None,
      resolvedExports: new Map(),
      needsNamespace: false,
      runtimeHelpers: new Set(),
      referencedSymbols: [],
      execOrder: -1,
    }));
  }

  link(): LinkStageOutput {
    this.determineExportsKind();
    this.wrapModules();
    for (const module of this.normalModules()) {
      if (this.metas[module.id].exportsKind === ExportsKind.Esm) {
        this.metas[module.id].resolvedExports = this.resolveExports(module.id, new Set());
      }
    }
    this.bindImports();
    const entries = this.collectEntries();
    this.checkEntryExports(entries);
    if (this.errors.length > 0) throw new BatchedErrors(this.errors);

    this.computeRuntimeHelpers();
    const runtimeIncluded = this.normalModules().some(
      module => module.id !== this.graph.runtimeId && this.metas[module.id].runtimeHelpers.size > 0,
    );
    this.computeReferencedSymbols();
    this.computeExecOrder(entries, runtimeIncluded);
    this.symbols.freeze();

    return {
      modules: this.modules,
      metas: this.metas,
      symbols: this.symbols,
      entries,
      runtimeId: this.graph.runtimeId,
      runtimeIncluded,
      format: this.format,
      warnings: this.warnings,
    };
  }

  private normalModules(): NormalModule[] {
    return this.modules.filter(isNormalModule);
  }

  private throughNamespace(record: ImportRecord): boolean {
    return importsThroughNamespace({ modules: this.modules, metas: this.metas, format: this.format }, record);
  }

  private target(record: ImportRecord): NormalModule | undefined {
    const module = this.modules[record.resolvedModule];
    return isNormalModule(module) ? module : undefined;
  }

  // ============================================
  // Export and wrap kinds
  // ============================================

  private determineExportsKind() {
    for (const module of this.normalModules()) {
      for (const record of module.importRecords) {
        const target = this.target(record);
        if (record.kind === ImportKind.Require && target && this.metas[target.id].exportsKind === ExportsKind.None) {
          this.metas[target.id].exportsKind = ExportsKind.CommonJs;
        }
      }
    }
    for (const meta of this.metas) {
      if (meta.exportsKind === ExportsKind.None) meta.exportsKind = ExportsKind.Esm;
    }
  }

  private wrapModules() {
    const queue: NormalModule[] = [];
    for (const module of this.normalModules()) {
      const meta = this.metas[module.id];
      if (meta.exportsKind === ExportsKind.CommonJs) {
        meta.wrapKind = WrapKind.Cjs;
      }
      for (const record of module.importRecords) {
        const target = this.target(record);
        if (record.kind !== ImportKind.Require || !target) continue;
        const targetMeta = this.metas[target.id];
        if (targetMeta.exportsKind !== ExportsKind.Esm) continue;
        targetMeta.needsNamespace = true;
        if (targetMeta.wrapKind === WrapKind.None) {
          targetMeta.wrapKind = WrapKind.Esm;
          queue.push(target);
        }
      }
    }

    // A lazily initialized module must initialize its own static dependencies lazily too
    while (queue.length > 0) {
      const module = queue.shift();
      if (!module) break;
      for (const record of module.importRecords) {
        const target = this.target(record);
        if (record.kind !== ImportKind.Import || !target) continue;
        const targetMeta = this.metas[target.id];
        if (targetMeta.exportsKind === ExportsKind.Esm && targetMeta.wrapKind === WrapKind.None) {
          targetMeta.wrapKind = WrapKind.Esm;
          queue.push(target);
        }
      }
    }

    for (const module of this.normalModules()) {
      const meta = this.metas[module.id];
      if (meta.wrapKind === WrapKind.Cjs) {
        meta.wrapperRef = this.symbols.declare(module.id, `require_${module.scan.stem}`);
      } else if (meta.wrapKind === WrapKind.Esm) {
        meta.wrapperRef = this.symbols.declare(module.id, `init_${module.scan.stem}`);
      }
    }
  }

  // ============================================
  // Exports and imports
  // ============================================

  private resolveExports(id: ModuleId, visiting: Set<ModuleId>): Map<string, SymbolRef> {
    const cached = this.exportsCache.get(id);
    if (cached) return cached;
    const module = this.modules[id];
    if (!isNormalModule(module) || visiting.has(id)) return new Map();
    visiting.add(id);

    const result = new Map(module.scan.localExports);
    for (const recordIndex of module.scan.starExports) {
      const record = module.importRecords[recordIndex];
      const target = this.target(record);
      if (!target || this.metas[target.id].exportsKind !== ExportsKind.Esm) {
        this.warnings.push(
          new BuildError(
            'UNSUPPORTED',
            `"export * from '${record.moduleRequest}'" in "${module.prettyPath}" re-exports a module without static exports and is ignored`,
            { id: module.path },
          ),
        );
        continue;
      }
      for (const [name, ref] of this.resolveExports(target.id, visiting)) {
        if (name !== 'default' && !result.has(name)) result.set(name, ref);
      }
    }

    visiting.delete(id);
    this.exportsCache.set(id, result);
    return result;
  }

  private bindImports() {
    for (const module of this.normalModules()) {
      for (const binding of module.scan.namedImports) {
        const record = module.importRecords[binding.recordIndex];
        const target = this.target(record);

        if (this.throughNamespace(record)) {
          if (binding.imported === '*') this.symbols.link(binding.local, record.namespaceRef);
          else this.symbols.setNamespaceAlias(binding.local, { namespaceRef: record.namespaceRef, property: binding.imported });
          continue;
        }
        // External module in ESM output, the import statement is kept
        if (!target) continue;

        if (binding.imported === '*') {
          this.metas[target.id].needsNamespace = true;
          this.symbols.link(binding.local, target.scan.namespaceRef);
          continue;
        }

        const exported = this.metas[target.id].resolvedExports.get(binding.imported);
        if (!exported) {
          this.errors.push(
            new BuildError(
              'MISSING_EXPORT',
              `"${binding.imported}" is not exported by "${target.prettyPath}", imported by "${module.prettyPath}"`,
              { id: module.path },
            ),
          );
        } else if (!this.symbols.link(binding.local, exported)) {
          this.errors.push(
            new BuildError('MISSING_EXPORT', `"${binding.imported}" in "${module.prettyPath}" is re-exported in a cycle`, {
              id: module.path,
            }),
          );
        }
      }
    }
  }

  private checkEntryExports(entries: ReadonlyArray<EntryPoint>) {
    for (const entry of entries) {
      const module = this.modules[entry.id];
      if (!isNormalModule(module)) continue;
      for (const [name, ref] of this.metas[entry.id].resolvedExports) {
        if (this.symbols.namespaceAliasOf(ref)) {
          this.errors.push(
            new BuildError(
              'UNSUPPORTED',
              `Entry "${module.prettyPath}" re-exports "${name}" from a CommonJS or external module, export the module object instead`,
              { id: module.path },
            ),
          );
        }
      }
    }
  }

  // ============================================
  // Runtime, entries and order
  // ============================================

  private computeRuntimeHelpers() {
    for (const module of this.normalModules()) {
      if (module.id === this.graph.runtimeId) continue;
      const meta = this.metas[module.id];
      const helpers = meta.runtimeHelpers;
      if (meta.wrapKind === WrapKind.Cjs) helpers.add('__commonJS');
      if (meta.wrapKind === WrapKind.Esm) helpers.add('__esm');
      if (meta.needsNamespace && meta.resolvedExports.size > 0) helpers.add('__export');

      const recordsWithBindings = new Set(module.scan.namedImports.map(binding => binding.recordIndex));
      module.importRecords.forEach((record, index) => {
        const target = this.target(record);
        if (record.kind === ImportKind.Import && recordsWithBindings.has(index)) {
          if (this.throughNamespace(record)) {
            helpers.add('__toESM');
          }
        } else if (record.kind === ImportKind.Require && target && this.metas[target.id].wrapKind === WrapKind.Esm) {
          helpers.add('__toCommonJS');
        }
      });
    }
  }

  private collectEntries(): EntryPoint[] {
    const entries = [...this.graph.entries];
    const seen = new Set(entries.map(entry => entry.id));
    for (const module of this.normalModules()) {
      for (const record of module.importRecords) {
        const target = this.target(record);
        if (record.kind !== ImportKind.DynamicImport || !target || seen.has(target.id)) continue;
        seen.add(target.id);
        entries.push({ id: target.id, name: target.scan.stem, kind: 'dynamic' });
      }
    }
    return entries;
  }

  private computeReferencedSymbols() {
    const runtimeExports = this.metas[this.graph.runtimeId].resolvedExports;
    for (const module of this.normalModules()) {
      const meta = this.metas[module.id];
      const seen = new Set<string>();
      const add = (ref: SymbolRef | undefined) => {
        if (!ref) return;
        const key = symbolKey(ref);
        if (seen.has(key)) return;
        seen.add(key);
        meta.referencedSymbols.push(ref);
      };

      add(meta.wrapperRef);
      if (meta.wrapKind !== WrapKind.Cjs) {
        for (const ref of module.scan.references.values()) {
          const alias = this.symbols.namespaceAliasOf(ref);
          add(alias ? alias.namespaceRef : ref);
        }
        add(module.scan.defaultExportRef);
        if (meta.needsNamespace) {
          add(module.scan.namespaceRef);
          for (const ref of meta.resolvedExports.values()) add(this.symbols.storageRef(ref));
        }
      }

      const recordsWithBindings = new Set(module.scan.namedImports.map(binding => binding.recordIndex));
      module.importRecords.forEach((record, index) => {
        const target = this.target(record);
        if (record.kind === ImportKind.DynamicImport) return;
        if (record.kind === ImportKind.Import && recordsWithBindings.has(index) && this.throughNamespace(record)) {
          add(record.namespaceRef);
        }
        if (!target) return;
        const targetMeta = this.metas[target.id];
        add(targetMeta.wrapperRef);
        if (record.kind === ImportKind.Require && targetMeta.wrapKind === WrapKind.Esm) {
          add(target.scan.namespaceRef);
        }
      });

      for (const helper of RUNTIME_HELPERS) {
        if (meta.runtimeHelpers.has(helper)) add(runtimeExports.get(helper));
      }
    }
  }

  private computeExecOrder(entries: ReadonlyArray<EntryPoint>, runtimeIncluded: boolean) {
    let next = 0;
    const visited = new Set<ModuleId>();
    const visit = (id: ModuleId) => {
      const module = this.modules[id];
      if (visited.has(id) || !isNormalModule(module)) return;
      visited.add(id);
      for (const record of module.importRecords) {
        if (isStaticImport(record.kind)) visit(record.resolvedModule);
      }
      this.metas[id].execOrder = next++;
    };

    if (runtimeIncluded) visit(this.graph.runtimeId);
    else visited.add(this.graph.runtimeId);
    for (const entry of entries) visit(entry.id);
  }
}

export function linkModules(graph: ModuleGraph, format: OutputFormat): LinkStageOutput {
  return new Linker(graph, format).link();
}
