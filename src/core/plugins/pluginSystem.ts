/**
 * Plugin System
 *
 * esbuild-style hooks, run in registration order:
 * - onResolve: Customize module resolution
 * - onLoad: Custom file loading
 *
 * The first hook returning a result wins. A throwing hook fails the build
 * with a PLUGIN_ERROR naming the plugin.
 */

import { BuildError } from '../../errors/errors';

export type OnResolveCallback = (args: OnResolveArgs) => OnResolveResult | null | undefined | Promise<OnResolveResult | null | undefined>;
export type OnLoadCallback = (args: OnLoadArgs) => OnLoadResult | null | undefined | Promise<OnLoadResult | null | undefined>;

export type ResolveKind = 'import' | 'require' | 'dynamic' | 'entry';

export interface OnResolveArgs {
  path: string;
  /** Absolute path of the importing module, empty for entries */
  importer: string;
  kind: ResolveKind;
  resolveDir: string;
}

export interface OnResolveResult {
  path?: string;
  external?: boolean;
  /** Load the module as empty source */
  ignored?: boolean;
}

export interface OnLoadArgs {
  path: string;
}

export interface OnLoadResult {
  contents?: string;
}

export interface Plugin {
  name: string;
  setup: (build: PluginBuild) => void | Promise<void>;
}

export interface PluginBuild {
  onResolve: (options: { filter: RegExp }, callback: OnResolveCallback) => void;
  onLoad: (options: { filter: RegExp }, callback: OnLoadCallback) => void;
}

interface RegisteredHook<T> {
  filter: RegExp;
  callback: T;
  pluginName: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Plugin manager
 */
export class PluginManager {
  private onResolveHooks: RegisteredHook<OnResolveCallback>[] = [];
  private onLoadHooks: RegisteredHook<OnLoadCallback>[] = [];
  private ready: Promise<void> | undefined;

  constructor(private readonly plugins: ReadonlyArray<Plugin> = []) {}

  /**
   * Runs every plugin's setup once
   */
  setup(): Promise<void> {
    if (!this.ready) {
      this.ready = this.registerAll();
    }
    return this.ready;
  }

  private async registerAll(): Promise<void> {
    for (const plugin of this.plugins) {
      const build: PluginBuild = {
        onResolve: (options, callback) => {
          this.onResolveHooks.push({ filter: options.filter, callback, pluginName: plugin.name });
        },
        onLoad: (options, callback) => {
          this.onLoadHooks.push({ filter: options.filter, callback, pluginName: plugin.name });
        },
      };
      try {
        await plugin.setup(build);
      } catch (error) {
        throw new BuildError('PLUGIN_ERROR', `Plugin ${plugin.name} setup failed: ${describe(error)}`, { cause: error });
      }
    }
  }

  /**
   * Run onResolve hooks, undefined when no hook handled the request
   */
  async runOnResolve(args: OnResolveArgs): Promise<OnResolveResult | undefined> {
    for (const hook of this.onResolveHooks) {
      if (!hook.filter.test(args.path)) {
        continue;
      }

      let result: OnResolveResult | null | undefined;
      try {
        result = await hook.callback(args);
      } catch (error) {
        throw new BuildError('PLUGIN_ERROR', `Plugin ${hook.pluginName} onResolve error: ${describe(error)}`, {
          id: args.importer || undefined,
          cause: error,
        });
      }
      if (result && (result.path !== undefined || result.external || result.ignored)) {
        return result;
      }
    }

    return undefined;
  }

  /**
   * Run onLoad hooks
   */
  async runOnLoad(args: OnLoadArgs): Promise<OnLoadResult | undefined> {
    for (const hook of this.onLoadHooks) {
      if (!hook.filter.test(args.path)) {
        continue;
      }

      let result: OnLoadResult | null | undefined;
      try {
        result = await hook.callback(args);
      } catch (error) {
        throw new BuildError('PLUGIN_ERROR', `Plugin ${hook.pluginName} onLoad error: ${describe(error)}`, {
          id: args.path,
          cause: error,
        });
      }
      if (result && result.contents !== undefined) {
        return result;
      }
    }

    return undefined;
  }
}

// ============================================
// Built-in plugins
// ============================================

/**
 * Virtual plugin - modules whose source lives in memory
 */
export function virtualPlugin(modules: Record<string, string>): Plugin {
  const escape = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return {
    name: 'virtual',
    setup(build) {
      const names = Object.keys(modules);
      if (names.length === 0) return;
      const filter = new RegExp(`^(${names.map(escape).join('|')})$`);

      build.onResolve({ filter }, args => ({ path: `\0virtual:${args.path}` }));

      build.onLoad({ filter: /^\0virtual:/ }, args => {
        const contents = modules[args.path.slice('\0virtual:'.length)];
        return contents === undefined ? null : { contents };
      });
    },
  };
}
