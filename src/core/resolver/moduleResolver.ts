/**
 * Module Resolver
 *
 * Resolves import specifiers to absolute file paths.
 * Supports:
 * - Relative and absolute imports (./foo, ../bar, /abs/baz)
 * - Bare imports (react, lodash/get) through node_modules
 * - Package.json exports, module and main fields
 * - Aliases, where `false` marks a module as ignored (loads as empty)
 * - Externals and Node.js built-ins
 */

import { builtinModules } from 'module';
import * as path from 'path';
import { RESOLVE_EXTENSIONS } from '../../config/extensions';
import { FileSystem, NodeFileSystem } from '../../utils/fileSystem';
import type { ResolveKind } from '../plugins/pluginSystem';

export interface ResolveOptions {
  /** Base directory for entries */
  basedir: string;
  /** File extensions to try */
  extensions?: string[];
  /** Alias mappings, `false` ignores the module */
  alias?: Record<string, string | false>;
  /** Main fields to check in package.json */
  mainFields?: string[];
  /** Condition names for the exports field; `import` applies to all but require() calls, `require` only to those */
  conditionNames?: string[];
  /** External packages (not bundled), a trailing `*` matches a prefix */
  external?: string[];
  fs?: FileSystem;
}

export interface ResolveResult {
  /** Resolved absolute path, or the request itself for externals */
  path: string;
  external: boolean;
  /** Resolved through an alias set to false, loads as an empty module */
  ignored: boolean;
  /** Package name if from node_modules */
  packageName?: string;
}

type PackageJson = Record<string, unknown>;

const DEFAULT_MAIN_FIELDS = ['module', 'main'];
const DEFAULT_CONDITION_NAMES = ['import', 'require', 'node', 'default'];
const BUILTINS = new Set(builtinModules);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ModuleResolver {
  private options: Required<ResolveOptions>;
  private cache = new Map<string, ResolveResult | null>();
  private packageCache = new Map<string, PackageJson>();

  constructor(options: ResolveOptions) {
    this.options = {
      basedir: options.basedir,
      extensions: options.extensions || RESOLVE_EXTENSIONS,
      alias: options.alias || {},
      mainFields: options.mainFields || DEFAULT_MAIN_FIELDS,
      conditionNames: options.conditionNames || DEFAULT_CONDITION_NAMES,
      external: options.external || [],
      fs: options.fs || new NodeFileSystem(),
    };
  }

  /**
   * Resolve an import specifier to an absolute path. Entries pass no importer.
   */
  resolve(specifier: string, fromFile?: string, kind: ResolveKind = 'import'): ResolveResult {
    const basedir = fromFile ? path.dirname(fromFile) : this.options.basedir;
    const conditions = this.conditionsFor(kind);
    const cacheKey = `${kind === 'require' ? 'require' : 'import'}:${basedir}:${specifier}`;

    const cached = this.cache.get(cacheKey);
    if (cached === null) {
      throw new Error(`Cannot resolve module '${specifier}' from '${basedir}'`);
    }
    if (cached) return cached;

    try {
      const result = this.resolveInternal(specifier, basedir, conditions);
      this.cache.set(cacheKey, result);
      return result;
    } catch (error) {
      this.cache.set(cacheKey, null);
      throw error;
    }
  }

  private conditionsFor(kind: ResolveKind): ReadonlyArray<string> {
    const skipped = kind === 'require' ? 'import' : 'require';
    return this.options.conditionNames.filter(condition => condition !== skipped);
  }

  private resolveInternal(specifier: string, basedir: string, conditions: ReadonlyArray<string>): ResolveResult {
    if (this.isExternal(specifier)) {
      return { path: specifier, external: true, ignored: false };
    }

    const aliased = this.resolveAlias(specifier);
    if (aliased === false) {
      return { path: path.resolve(basedir, specifier), external: false, ignored: true };
    }
    if (aliased !== specifier) {
      return this.resolveInternal(aliased, basedir, conditions);
    }

    if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
      const resolved = this.resolveRelative(specifier, basedir);
      if (resolved) {
        return { path: resolved, external: false, ignored: false };
      }
      throw new Error(`Cannot resolve '${specifier}' from '${basedir}'`);
    }

    return this.resolveNodeModule(specifier, basedir, conditions);
  }

  private isExternal(specifier: string): boolean {
    if (specifier.startsWith('node:')) return true;
    if (BUILTINS.has(specifier.split('/')[0])) return true;

    return this.options.external.some(ext => {
      if (ext === specifier) return true;
      if (ext.endsWith('*') && specifier.startsWith(ext.slice(0, -1))) return true;
      return specifier.startsWith(ext + '/');
    });
  }

  private resolveAlias(specifier: string): string | false {
    for (const [alias, target] of Object.entries(this.options.alias)) {
      if (specifier === alias) {
        return target;
      }
      if (specifier.startsWith(alias + '/')) {
        return target === false ? false : target + specifier.slice(alias.length);
      }
    }
    return specifier;
  }

  private resolveRelative(specifier: string, basedir: string): string | null {
    const absolutePath = path.resolve(basedir, specifier);
    return this.tryResolveFile(absolutePath) || this.tryResolveDirectory(absolutePath);
  }

  private tryResolveFile(filePath: string): string | null {
    if (this.options.fs.isFile(filePath)) {
      return filePath;
    }

    for (const ext of this.options.extensions) {
      const withExt = filePath + ext;
      if (this.options.fs.isFile(withExt)) {
        return withExt;
      }
    }

    return null;
  }

  private tryResolveDirectory(dirPath: string): string | null {
    if (!this.options.fs.isDirectory(dirPath)) {
      return null;
    }

    const pkg = this.readPackageJson(path.join(dirPath, 'package.json'));
    if (pkg) {
      const main = this.getMainFromPackage(pkg);
      if (main) {
        const mainPath = path.resolve(dirPath, main);
        const resolved = this.tryResolveFile(mainPath) || this.tryResolveFile(path.join(mainPath, 'index'));
        if (resolved) return resolved;
      }
    }

    return this.tryResolveFile(path.join(dirPath, 'index'));
  }

  private resolveNodeModule(specifier: string, basedir: string, conditions: ReadonlyArray<string>): ResolveResult {
    const parts = specifier.split('/');
    const isScoped = specifier.startsWith('@');
    const packageName = isScoped ? `${parts[0]}/${parts[1]}` : parts[0];
    const subpath = isScoped ? parts.slice(2).join('/') : parts.slice(1).join('/');

    // Walk up directories looking for node_modules
    let current = basedir;
    for (;;) {
      const packagePath = path.join(current, 'node_modules', packageName);
      const pkg = this.options.fs.isDirectory(packagePath)
        ? this.readPackageJson(path.join(packagePath, 'package.json'))
        : undefined;

      if (pkg) {
        if (pkg.exports !== undefined) {
          const resolved = this.resolveExports(pkg.exports, subpath ? './' + subpath : '.', packagePath, conditions);
          if (resolved && this.options.fs.isFile(resolved)) {
            return { path: resolved, external: false, ignored: false, packageName };
          }
        }

        let targetPath: string;
        if (subpath) {
          targetPath = path.join(packagePath, subpath);
        } else {
          const main = this.getMainFromPackage(pkg);
          targetPath = main ? path.join(packagePath, main) : packagePath;
        }

        const resolved = this.tryResolveFile(targetPath) || this.tryResolveDirectory(targetPath);
        if (resolved) {
          return { path: resolved, external: false, ignored: false, packageName };
        }
      }

      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }

    throw new Error(`Cannot find module '${specifier}' from '${basedir}'`);
  }

  private resolveExports(
    exports: unknown,
    subpath: string,
    packagePath: string,
    conditions: ReadonlyArray<string>,
  ): string | null {
    if (typeof exports === 'string') {
      return subpath === '.' ? path.join(packagePath, exports) : null;
    }

    if (Array.isArray(exports)) {
      for (const exp of exports) {
        const resolved = this.resolveExports(exp, subpath, packagePath, conditions);
        if (resolved) return resolved;
      }
      return null;
    }

    if (!isRecord(exports)) return null;

    const keys = Object.keys(exports);
    const isSubpathMap = keys.some(key => key.startsWith('.'));
    if (!isSubpathMap) {
      // Conditions only, applies to the package root
      return subpath === '.' ? this.resolveExportsTarget(exports, packagePath, conditions) : null;
    }

    if (subpath in exports) {
      return this.resolveExportsTarget(exports[subpath], packagePath, conditions);
    }

    for (const [pattern, target] of Object.entries(exports)) {
      const star = pattern.indexOf('*');
      if (star === -1) continue;
      const prefix = pattern.slice(0, star);
      const suffix = pattern.slice(star + 1);
      if (subpath.startsWith(prefix) && subpath.endsWith(suffix) && subpath.length >= pattern.length - 1) {
        const resolved = this.resolveExportsTarget(target, packagePath, conditions);
        if (resolved) {
          return resolved.replace('*', subpath.slice(prefix.length, subpath.length - suffix.length));
        }
      }
    }

    return null;
  }

  private resolveExportsTarget(target: unknown, packagePath: string, conditions: ReadonlyArray<string>): string | null {
    if (typeof target === 'string') {
      return path.join(packagePath, target);
    }

    if (Array.isArray(target)) {
      for (const item of target) {
        const resolved = this.resolveExportsTarget(item, packagePath, conditions);
        if (resolved) return resolved;
      }
      return null;
    }

    if (isRecord(target)) {
      for (const [condition, value] of Object.entries(target)) {
        if (conditions.includes(condition)) {
          const resolved = this.resolveExportsTarget(value, packagePath, conditions);
          if (resolved) return resolved;
        }
      }
    }

    return null;
  }

  private getMainFromPackage(pkg: PackageJson): string | null {
    for (const field of this.options.mainFields) {
      const value = pkg[field];
      if (typeof value === 'string' && value) {
        return value;
      }
    }
    return null;
  }

  private readPackageJson(pkgPath: string): PackageJson | undefined {
    const cached = this.packageCache.get(pkgPath);
    if (cached) return cached;
    if (!this.options.fs.isFile(pkgPath)) return undefined;

    const parsed: unknown = JSON.parse(this.options.fs.readFile(pkgPath));
    if (!isRecord(parsed)) {
      throw new Error(`Invalid package.json at '${pkgPath}'`);
    }
    this.packageCache.set(pkgPath, parsed);
    return parsed;
  }
}
