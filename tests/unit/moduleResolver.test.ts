import { describe, expect, it } from 'vitest';
import { ModuleResolver } from '../../src/core/resolver/moduleResolver';
import { MemoryFileSystem, ROOT } from '../helpers/memoryFileSystem';

const files = {
  'src/a.js': '',
  'src/b.ts': '',
  'src/lib/index.js': '',
  'node_modules/pkg/package.json': JSON.stringify({ name: 'pkg', exports: { '.': { import: './esm.js', require: './cjs.js' } } }),
  'node_modules/pkg/esm.js': '',
  'node_modules/pkg/cjs.js': '',
  'node_modules/legacy/package.json': JSON.stringify({ name: 'legacy', main: 'main.js' }),
  'node_modules/legacy/main.js': '',
  'node_modules/@scope/tools/package.json': JSON.stringify({ name: '@scope/tools', exports: { './*': './dist/*.js' } }),
  'node_modules/@scope/tools/dist/format.js': '',
};

function createResolver(options: { alias?: Record<string, string | false>; external?: string[] } = {}) {
  return new ModuleResolver({ basedir: ROOT, fs: new MemoryFileSystem(files), ...options });
}

describe('ModuleResolver', () => {
  const importer = `${ROOT}/src/a.js`;

  it('probes extensions and directory indexes', () => {
    const resolver = createResolver();
    expect(resolver.resolve('./b', importer).path).toBe(`${ROOT}/src/b.ts`);
    expect(resolver.resolve('./lib', importer).path).toBe(`${ROOT}/src/lib/index.js`);
  });

  it('resolves package exports by condition', () => {
    const result = createResolver().resolve('pkg', importer);
    expect(result).toEqual({ path: `${ROOT}/node_modules/pkg/esm.js`, external: false, ignored: false, packageName: 'pkg' });
  });

  it('matches the require condition for require() calls only', () => {
    const resolver = createResolver();
    expect(resolver.resolve('pkg', importer, 'require').path).toBe(`${ROOT}/node_modules/pkg/cjs.js`);
    expect(resolver.resolve('pkg', importer, 'dynamic').path).toBe(`${ROOT}/node_modules/pkg/esm.js`);
    expect(resolver.resolve('pkg', importer).path).toBe(`${ROOT}/node_modules/pkg/esm.js`);
  });

  it('resolves subpath patterns of scoped packages', () => {
    expect(createResolver().resolve('@scope/tools/format', importer).path).toBe(
      `${ROOT}/node_modules/@scope/tools/dist/format.js`,
    );
  });

  it('falls back to the main field', () => {
    expect(createResolver().resolve('legacy', importer).path).toBe(`${ROOT}/node_modules/legacy/main.js`);
  });

  it('marks built-ins and configured packages as external', () => {
    const resolver = createResolver({ external: ['react'] });
    expect(resolver.resolve('fs', importer)).toEqual({ path: 'fs', external: true, ignored: false });
    expect(resolver.resolve('node:path', importer).external).toBe(true);
    expect(resolver.resolve('react/jsx-runtime', importer).external).toBe(true);
  });

  it('applies aliases, false ignores the module', () => {
    const resolver = createResolver({ alias: { '@lib': './lib', 'legacy': false } });
    expect(resolver.resolve('@lib', importer).path).toBe(`${ROOT}/src/lib/index.js`);
    expect(resolver.resolve('legacy', importer)).toEqual({ path: `${ROOT}/src/legacy`, external: false, ignored: true });
  });

  it('throws for missing modules', () => {
    const resolver = createResolver();
    expect(() => resolver.resolve('./missing', importer)).toThrow(`Cannot resolve './missing' from '${ROOT}/src'`);
    expect(() => resolver.resolve('nope', importer)).toThrow(`Cannot find module 'nope' from '${ROOT}/src'`);
  });
});
