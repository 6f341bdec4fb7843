import { describe, expect, it } from 'vitest';
import { ExportsKind, WrapKind } from '../../src/compiler/interfaces/ModuleKinds';
import { BatchedErrors } from '../../src/errors/errors';
import { linkModules } from '../../src/core/link/linkStage';
import type { LinkStageOutput } from '../../src/core/link/linkStage';
import { loadGraph } from '../helpers/memoryFileSystem';

async function link(files: Record<string, string>, entries: string[], format: 'esm' | 'cjs' = 'esm'): Promise<LinkStageOutput> {
  return linkModules(await loadGraph(files, entries), format);
}

function wrapperName(output: LinkStageOutput, id: number): string | undefined {
  const ref = output.metas[id].wrapperRef;
  return ref && output.symbols.originalName(ref);
}

describe('linkModules', () => {
  it('wraps required ES modules and their static dependencies', async () => {
    const output = await link(
      {
        'src/main.js': "const util = require('./util');\nconsole.log(util);",
        'src/util.js': "import { dep } from './dep';\nexport const value = dep;",
        'src/dep.js': 'export const dep = 1;',
      },
      ['src/main.js'],
    );
    const [, util, dep] = output.metas;

    expect(util.wrapKind).toBe(WrapKind.Esm);
    expect(util.needsNamespace).toBe(true);
    expect(wrapperName(output, 1)).toBe('init_util');
    expect(dep.wrapKind).toBe(WrapKind.Esm);
    expect(dep.needsNamespace).toBe(false);
    expect(output.metas[0].runtimeHelpers.has('__toCommonJS')).toBe(true);

    expect(output.runtimeIncluded).toBe(true);
    expect(output.metas.map(meta => meta.execOrder)).toEqual([3, 2, 1, 0]);
  });

  it('wraps CommonJS modules and reads their bindings off the module object', async () => {
    const output = await link(
      {
        'src/main.js': "import data from './data.cjs';\nconsole.log(data);",
        'src/data.cjs': 'module.exports = { answer: 42 };',
      },
      ['src/main.js'],
    );

    expect(output.metas[1].exportsKind).toBe(ExportsKind.CommonJs);
    expect(output.metas[1].wrapKind).toBe(WrapKind.Cjs);
    expect(wrapperName(output, 1)).toBe('require_data');
    expect([...output.metas[0].runtimeHelpers]).toEqual(['__toESM']);

    const module = output.modules[0];
    if (module.kind !== 'normal') throw new Error('expected a bundled module');
    const alias = output.symbols.namespaceAliasOf(module.scan.namedImports[0].local);
    expect(alias?.property).toBe('default');
  });

  it('resolves star exports, first module wins', async () => {
    const output = await link(
      {
        'src/main.js': "export * from './a';\nexport * from './b';",
        'src/a.js': 'export const x = 1;',
        'src/b.js': 'export const x = 2;\nexport const y = 3;',
      },
      ['src/main.js'],
    );
    const exports = output.metas[0].resolvedExports;

    expect([...exports.keys()]).toEqual(['x', 'y']);
    expect(exports.get('x')?.module).toBe(1);
    expect(exports.get('y')?.module).toBe(2);
  });

  it('warns about star exports of CommonJS modules', async () => {
    const output = await link(
      {
        'src/main.js': "export * from './c';\nexport const own = 1;",
        'src/c.cjs': 'module.exports = {};',
      },
      ['src/main.js'],
    );

    expect([...output.metas[0].resolvedExports.keys()]).toEqual(['own']);
    expect(output.warnings.map(warning => warning.message)).toEqual([
      `"export * from './c'" in "src/main.js" re-exports a module without static exports and is ignored`,
    ]);
  });

  it('adds dynamic import targets as entries', async () => {
    const output = await link(
      {
        'src/main.js': "import('./lazy');\nimport('./lazy');",
        'src/lazy.js': 'export const lazy = 1;',
      },
      ['src/main.js'],
    );

    expect(output.entries).toEqual([
      { id: 0, name: 'main', kind: 'user' },
      { id: 1, name: 'lazy', kind: 'dynamic' },
    ]);
    expect(output.runtimeIncluded).toBe(false);
    expect(output.metas.map(meta => meta.execOrder)).toEqual([0, 1, -1]);
  });

  it('reports every missing export at once', async () => {
    const build = link(
      {
        'src/main.js': "import { nope, other } from './a';\nconsole.log(nope, other);",
        'src/a.js': 'export const x = 1;',
      },
      ['src/main.js'],
    );

    const error = await build.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(BatchedErrors);
    if (!(error instanceof BatchedErrors)) return;
    expect(error.errors.map(item => item.message)).toEqual([
      '"nope" is not exported by "src/a.js", imported by "src/main.js"',
      '"other" is not exported by "src/a.js", imported by "src/main.js"',
    ]);
  });

  it('freezes the symbol table', async () => {
    const output = await link({ 'src/main.js': 'export const a = 1;' }, ['src/main.js']);
    expect(() => output.symbols.declare(0, 'late')).toThrow('Internal error: declare called on a frozen symbol table');
  });
});
