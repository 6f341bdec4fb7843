import { describe, expect, it } from 'vitest';
import { Bundler } from '../../src/core/bundler/bundler';
import type { BundlerOptions, BundleOutput } from '../../src/core/bundler/bundler';
import { BatchedErrors, BuildError } from '../../src/errors/errors';
import { MemoryFileSystem, ROOT } from '../helpers/memoryFileSystem';

function build(files: Record<string, string>, options: Omit<BundlerOptions, 'fs' | 'cwd'>): Promise<BundleOutput> {
  return new Bundler({ cwd: ROOT, fs: new MemoryFileSystem(files), ...options }).build();
}

function codeOf(output: BundleOutput, fileName: string): string {
  const chunk = output.chunks.find(item => item.fileName === fileName);
  if (!chunk) throw new Error(`no chunk named ${fileName}`);
  return chunk.code;
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (reason: unknown) => reason,
  );
}

describe('Bundler', () => {
  describe('linking', () => {
    it('inlines dependencies in execution order', async () => {
      const output = await build(
        {
          'src/a.js': "import { x } from './b';\nconsole.log(x);",
          'src/b.js': 'export const x = 1;',
        },
        { entry: 'src/a.js' },
      );

      expect(output.chunks).toHaveLength(1);
      expect(output.chunks[0].fileName).toBe('a.js');
      expect(output.chunks[0].code).toBe('// src/b.js\nconst x = 1;\n// src/a.js\nconsole.log(x);');
      expect(output.stats.modules).toBe(3);
    });

    it('renames colliding top-level names', async () => {
      const output = await build(
        {
          'src/a.js': "import { value as b } from './b';\nconst value = 'a';\nconsole.log(value, b);",
          'src/b.js': "export const value = 'b';",
        },
        { entry: 'src/a.js' },
      );

      expect(output.chunks[0].code).toBe(
        "// src/b.js\nconst value = 'b';\n// src/a.js\nconst value$1 = 'a';\nconsole.log(value$1, value);",
      );
      const { modules } = output.chunks[0].renderedChunk;
      expect(modules[`${ROOT}/src/a.js`].names).toEqual({ value: 'value$1', b: 'value' });
      expect(modules[`${ROOT}/src/b.js`].names).toEqual({ value: 'value' });
    });

    it('keeps imports of external modules', async () => {
      const output = await build(
        { 'src/a.js': "import { readFileSync } from 'fs';\nconsole.log(readFileSync);" },
        { entry: 'src/a.js' },
      );

      expect(output.chunks[0].code).toBe(
        '// src/a.js\nimport { readFileSync } from "fs";\nconsole.log(readFileSync);',
      );
    });
  });

  describe('interop', () => {
    it('wraps a CommonJS entry and exports its value as default', async () => {
      const output = await build({ 'src/main.cjs': 'module.exports = { answer: 42 };' }, { entry: 'src/main.cjs' });
      const code = output.chunks[0].code;

      expect(code.startsWith('// chunklink:runtime\n')).toBe(true);
      expect(code).toContain(
        '// src/main.cjs\nvar require_main = __commonJS((exports, module) => {\nmodule.exports = { answer: 42 };\n});',
      );
      expect(code.endsWith('\nexport default require_main();')).toBe(true);
      expect(output.chunks[0].renderedChunk.exports).toEqual(['default']);
      expect(Object.keys(output.chunks[0].renderedChunk.modules)).toEqual([`${ROOT}/src/main.cjs`]);
    });

    it('reads imports of CommonJS modules off the converted module object', async () => {
      const output = await build(
        {
          'src/main.js': "import data from './data.cjs';\nconsole.log(data.answer);",
          'src/data.cjs': 'module.exports = { answer: 42 };',
        },
        { entry: 'src/main.js' },
      );

      expect(output.chunks[0].code).toContain(
        '// src/main.js\nvar import_data = __toESM(require_data());\nconsole.log(import_data.default.answer);',
      );
    });

    it('initializes a required ES module lazily', async () => {
      const output = await build(
        {
          'src/main.js': "const util = require('./util');\nconsole.log(util.value);",
          'src/util.js': 'export const value = 1;',
        },
        { entry: 'src/main.js' },
      );
      const code = output.chunks[0].code;

      expect(code).toContain(
        [
          '// src/util.js',
          'var util_exports = {};',
          '__export(util_exports, {',
          '  value: () => value',
          '});',
          'var value;',
          'var init_util = __esm(() => {',
          'value = 1;',
          '});',
        ].join('\n'),
      );
      expect(code).toContain('const util = (init_util(), __toCommonJS(util_exports));');
    });
  });

  describe('code splitting', () => {
    it('imports renamed shared symbols under their exported name', async () => {
      const files = {
        'src/a.js': "import './other';\nimport { y } from './shared';\nconsole.log('a', y);",
        'src/b.js': "import './other';\nimport { y } from './shared';\nconsole.log('b', y);",
        'src/other.js': 'const y = 2;\nconsole.log(y);',
        'src/shared.js': 'export const y = 1;',
      };
      const esm = await build(files, { entry: ['src/a.js', 'src/b.js'] });
      const cjs = await build(files, { entry: ['src/a.js', 'src/b.js'], format: 'cjs' });

      expect(codeOf(esm, 'a.js')).toBe('import { y$1 as y } from "./chunk.js";\n// src/a.js\nconsole.log(\'a\', y);');
      expect(codeOf(cjs, 'a.js').split('\n')).toContain('const { y$1: y } = require("./chunk.js");');
    });

    it('exports a CommonJS entry value before the names other chunks import', async () => {
      const output = await build(
        {
          'src/main.cjs': 'module.exports = { answer: 42 };',
          'src/b.js': "import main from './main.cjs';\nconsole.log(main.answer);",
        },
        { entry: ['src/main.cjs', 'src/b.js'] },
      );
      const lines = codeOf(output, 'main.js').split('\n');
      const defaultExport = lines.indexOf('export default require_main();');

      expect(defaultExport).toBeGreaterThan(-1);
      expect(lines[defaultExport + 1].startsWith('export { ')).toBe(true);
      expect(lines[defaultExport + 1]).toContain('require_main');
      expect(defaultExport + 2).toBe(lines.length);
    });

    it('moves shared modules into a chunk both entries import', async () => {
      const output = await build(
        {
          'src/a.js': "import { shared } from './shared';\nconsole.log('a', shared);",
          'src/b.js': "import { shared } from './shared';\nconsole.log('b', shared);",
          'src/shared.js': "export const shared = 'shared';",
        },
        { entry: ['src/a.js', 'src/b.js'] },
      );

      expect(output.chunks.map(chunk => chunk.fileName)).toEqual(['chunk.js', 'a.js', 'b.js']);
      expect(codeOf(output, 'chunk.js')).toBe("// src/shared.js\nconst shared = 'shared';\nexport { shared };");
      expect(codeOf(output, 'a.js')).toBe(
        'import { shared } from "./chunk.js";\n// src/a.js\nconsole.log(\'a\', shared);',
      );
      expect(output.chunks[1].renderedChunk.imports).toEqual(['chunk.js']);
    });

    it('quotes entry export names that are not identifiers when another chunk imports them', async () => {
      const files = {
        'src/a.js': "const shared = 1;\nexport { shared as 'shared-value' };",
        'src/b.js': "import { 'shared-value' as s } from './a';\nconsole.log(s);",
      };
      const esm = await build(files, { entry: ['src/a.js', 'src/b.js'] });
      const cjs = await build(files, { entry: ['src/a.js', 'src/b.js'], format: 'cjs' });

      expect(codeOf(esm, 'b.js')).toBe('import { "shared-value" as shared } from "./a.js";\n// src/b.js\nconsole.log(shared);');
      expect(codeOf(cjs, 'b.js').split('\n')).toContain('const { "shared-value": shared } = require("./a.js");');
    });

    it('points dynamic imports at the chunk of their target', async () => {
      const output = await build(
        {
          'src/a.js': "export function load() {\n  return import('./lazy');\n}",
          'src/lazy.js': 'export const lazy = true;',
        },
        { entry: 'src/a.js' },
      );

      expect(codeOf(output, 'a.js')).toBe(
        '// src/a.js\nfunction load() {\n  return import("./lazy.js");\n}\nexport { load };',
      );
      expect(codeOf(output, 'lazy.js')).toBe('// src/lazy.js\nconst lazy = true;\nexport { lazy };');
      expect(output.chunks[1].renderedChunk.isDynamicEntry).toBe(true);
    });

    it('rejects a parallelism that is not a positive integer', () => {
      expect(() => new Bundler({ cwd: ROOT, entry: 'src/a.js', parallelism: Number.NaN })).toThrow(
        'parallelism must be a positive integer, got NaN',
      );
      expect(() => new Bundler({ cwd: ROOT, entry: 'src/a.js', parallelism: 0 })).toThrow(BuildError);
    });

    it('renders the same code at any parallelism', async () => {
      const files = {
        'src/a.js': "import { b } from './b';\nimport { c } from './c';\nconsole.log(b, c);",
        'src/b.js': "const value = 'b';\nexport const b = value;",
        'src/c.js': "const value = 'c';\nexport const c = value;",
      };
      const sequential = await build(files, { entry: 'src/a.js', parallelism: 1 });
      const parallel = await build(files, { entry: 'src/a.js', parallelism: 4 });

      expect(parallel.chunks[0].code).toBe(sequential.chunks[0].code);
    });
  });

  describe('output formats', () => {
    it('exports through getters in CommonJS output', async () => {
      const output = await build({ 'src/a.js': 'export const value = 1;' }, { entry: 'src/a.js', format: 'cjs' });

      expect(output.chunks[0].code).toBe(
        '"use strict";\n// src/a.js\nconst value = 1;\nObject.defineProperty(exports, "value", { enumerable: true, get: () => value });',
      );
    });

    it('runs a lazily initialized entry after its own code', async () => {
      const output = await build(
        {
          'src/a.js': "import './b';\nconsole.log('a');",
          'src/b.js': "require('./a');\nexport const b = 1;",
        },
        { entry: 'src/a.js' },
      );
      const lines = output.chunks[0].code.split('\n');

      expect(lines[lines.length - 1]).toBe('init_a();');
      expect(lines.indexOf('// src/a.js')).toBeGreaterThan(-1);
      expect(lines.indexOf('// src/a.js')).toBeLessThan(lines.length - 1);
    });

    it('keeps CommonJS glue names free', async () => {
      const output = await build(
        { 'src/a.js': "const module = { name: 'a' };\nexport const name = module.name;" },
        { entry: 'src/a.js', format: 'cjs' },
      );

      expect(output.chunks[0].code).toBe(
        [
          '"use strict";',
          '// src/a.js',
          "const module$1 = { name: 'a' };",
          'const name = module$1.name;',
          'Object.defineProperty(exports, "name", { enumerable: true, get: () => name });',
        ].join('\n'),
      );
    });

    it('adds no "use strict" when a module may be sloppy', async () => {
      const output = await build({ 'src/legacy.js': 'console.log(1);' }, { entry: 'src/legacy.js', format: 'cjs' });
      expect(output.chunks[0].code).toBe('// src/legacy.js\nconsole.log(1);');
    });

    it('wraps app output in a function', async () => {
      const output = await build({ 'src/a.js': 'export const value = 1;' }, { entry: 'src/a.js', format: 'app' });
      expect(output.chunks[0].code).toBe('(function() {\n// src/a.js\nconst value = 1;\n})();');
    });

    it('rejects app output that needs several chunks', async () => {
      const error = await failure(
        build({ 'src/a.js': 'console.log(1);', 'src/b.js': 'console.log(2);' }, { entry: ['src/a.js', 'src/b.js'], format: 'app' }),
      );

      expect(error).toBeInstanceOf(BuildError);
      expect(error instanceof BuildError && error.code).toBe('UNSUPPORTED');
      expect(error instanceof Error && error.message).toBe('The app format emits a single file but this build needs 2 chunks');
    });

    it('adds banner and footer', async () => {
      const output = await build(
        { 'src/a.js': 'export const value = 1;' },
        { entry: 'src/a.js', format: 'cjs', banner: '#!/usr/bin/env node', footer: chunk => `// end of ${chunk.fileName}` },
      );
      const code = output.chunks[0].code;

      expect(code.startsWith('#!/usr/bin/env node\n"use strict";\n')).toBe(true);
      expect(code.endsWith('\n// end of a.js')).toBe(true);
    });

    it('reports failing addon hooks', async () => {
      const error = await failure(
        build(
          { 'src/a.js': 'console.log(1);' },
          {
            entry: 'src/a.js',
            banner: () => {
              throw new Error('no banner today');
            },
          },
        ),
      );

      expect(error instanceof Error && error.message).toBe('banner hook failed for "a.js": no banner today');
    });

    it('aborts the chunk when the footer hook fails', async () => {
      let bannerCalls = 0;
      const error = await failure(
        build(
          { 'src/a.js': 'console.log(1);' },
          {
            entry: 'src/a.js',
            footer: () => {
              throw new Error('no footer today');
            },
            banner: () => {
              bannerCalls++;
              return '// banner';
            },
          },
        ),
      );

      expect(error instanceof Error && error.message).toBe('footer hook failed for "a.js": no footer today');
      expect(bannerCalls).toBe(0);
    });

    it('names output files from templates', async () => {
      const output = await build(
        {
          'src/a.js': "import { shared } from './shared';\nconsole.log(shared);",
          'src/b.js': "import { shared } from './shared';\nconsole.log(shared);",
          'src/shared.js': 'export const shared = 1;',
        },
        { entry: { main: 'src/a.js', other: 'src/b.js' }, entryFileNames: 'entry-[name].js', chunkFileNames: 'shared-[name].js' },
      );

      expect(output.chunks.map(chunk => chunk.fileName)).toEqual(['shared-chunk.js', 'entry-main.js', 'entry-other.js']);
    });
  });

  describe('source maps', () => {
    it('maps the chunk back to its sources', async () => {
      const output = await build({ 'src/a.js': 'export const value = 1;' }, { entry: 'src/a.js', sourcemap: true });
      const chunk = output.chunks[0];

      expect(chunk.map?.sources).toEqual(['../src/a.js']);
      expect(chunk.map?.sourcesContent).toEqual(['export const value = 1;']);
      expect(chunk.code.endsWith('\n//# sourceMappingURL=a.js.map')).toBe(true);
      expect(chunk.fileDir).toBe(`${ROOT}/dist`);
    });

    it('shifts the map down under a banner', async () => {
      const files = { 'src/a.js': 'export const value = 1;' };
      const plain = await build(files, { entry: 'src/a.js', sourcemap: true });
      const bannered = await build(files, { entry: 'src/a.js', sourcemap: true, banner: '// banner' });

      expect(bannered.chunks[0].code.startsWith('// banner\n// src/a.js\n')).toBe(true);
      expect(bannered.chunks[0].map?.mappings).toBe(';' + (plain.chunks[0].map?.mappings ?? ''));
      expect(bannered.chunks[0].map?.sources).toEqual(['../src/a.js']);
    });

    it('inlines the map as a data url', async () => {
      const output = await build({ 'src/a.js': 'export const value = 1;' }, { entry: 'src/a.js', sourcemap: 'inline' });
      expect(output.chunks[0].code).toContain('\n//# sourceMappingURL=data:application/json;charset=utf-8;base64,');
    });
  });

  describe('errors', () => {
    it('collects every unresolved import before failing', async () => {
      const error = await failure(
        build({ 'src/a.js': "import './missing1';\nimport './missing2';" }, { entry: 'src/a.js' }),
      );

      expect(error).toBeInstanceOf(BatchedErrors);
      if (!(error instanceof BatchedErrors)) return;
      expect(error.errors.map(item => (item instanceof BuildError ? item.code : 'unknown'))).toEqual([
        'UNRESOLVED_IMPORT',
        'UNRESOLVED_IMPORT',
      ]);
      expect(error.errors[0].message).toBe('Could not resolve "./missing1" from "src/a.js"');
    });

    it('fails on imports of names a module does not export', async () => {
      const error = await failure(
        build(
          { 'src/a.js': "import { nope } from './b';\nconsole.log(nope);", 'src/b.js': 'export const x = 1;' },
          { entry: 'src/a.js' },
        ),
      );

      expect(error instanceof Error && error.message).toBe('"nope" is not exported by "src/b.js", imported by "src/a.js"');
    });
  });
});
