import { describe, expect, it } from 'vitest';
import { Bundler } from '../../src/core/bundler/bundler';
import { PluginManager, virtualPlugin } from '../../src/core/plugins/pluginSystem';
import type { Plugin } from '../../src/core/plugins/pluginSystem';
import { MemoryFileSystem, ROOT } from '../helpers/memoryFileSystem';

describe('PluginManager', () => {
  it('runs hooks in registration order, first result wins', async () => {
    const calls: string[] = [];
    const first: Plugin = {
      name: 'first',
      setup(build) {
        build.onResolve({ filter: /^skip/ }, () => {
          calls.push('first');
          return null;
        });
      },
    };
    const second: Plugin = {
      name: 'second',
      setup(build) {
        build.onResolve({ filter: /.*/ }, args => {
          calls.push('second');
          return { path: `/resolved/${args.path}` };
        });
      },
    };
    const plugins = new PluginManager([first, second]);
    await plugins.setup();

    const result = await plugins.runOnResolve({ path: 'skip-me', importer: '', kind: 'entry', resolveDir: ROOT });
    expect(result).toEqual({ path: '/resolved/skip-me' });
    expect(calls).toEqual(['first', 'second']);
  });

  it('names the plugin whose hook failed', async () => {
    const plugins = new PluginManager([
      {
        name: 'broken',
        setup(build) {
          build.onLoad({ filter: /\.css$/ }, () => {
            throw new Error('cannot read css');
          });
        },
      },
    ]);
    await plugins.setup();

    await expect(plugins.runOnLoad({ path: '/a.css' })).rejects.toThrow('Plugin broken onLoad error: cannot read css');
    expect(await plugins.runOnLoad({ path: '/a.js' })).toBeUndefined();
  });

  it('bundles virtual modules', async () => {
    const output = await new Bundler({
      cwd: ROOT,
      fs: new MemoryFileSystem({ 'src/a.js': "import { greeting } from 'virtual-greeting';\nconsole.log(greeting);" }),
      entry: 'src/a.js',
      plugins: [virtualPlugin({ 'virtual-greeting': "export const greeting = 'hi';" })],
    }).build();

    expect(output.chunks[0].code).toBe(
      "// virtual:virtual-greeting\nconst greeting = 'hi';\n// src/a.js\nconsole.log(greeting);",
    );
  });

  it('loads JSON files as CommonJS modules', async () => {
    const output = await new Bundler({
      cwd: ROOT,
      fs: new MemoryFileSystem({
        'src/a.js': "import data from './data.json';\nconsole.log(data.n);",
        'src/data.json': '{ "n": 1 }\n',
      }),
      entry: 'src/a.js',
    }).build();

    expect(output.chunks[0].code).toContain(
      '// src/data.json\nvar require_data = __commonJS((exports, module) => {\nmodule.exports = { "n": 1 };\n});',
    );
  });
});
