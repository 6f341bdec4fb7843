import { describe, expect, it } from 'vitest';
import { ImportKind } from '../../src/compiler/interfaces/ImportKind';
import { ExportsKind } from '../../src/compiler/interfaces/ModuleKinds';
import { parseModule } from '../../src/core/parser/parser';
import { SymbolTable } from '../../src/core/symbols/symbolTable';
import { BuildError } from '../../src/errors/errors';

function scan(source: string, filename = '/project/src/a.js') {
  const symbols = new SymbolTable();
  return { symbols, scan: parseModule({ id: 0, filename, source, symbols }) };
}

describe('parseModule', () => {
  it('collects import records in source order', () => {
    const { scan: result } = scan(
      "import def, { a as b } from './x';\nexport const c = 1;\nrequire('./y');\nconst lazy = () => import('./z');\n",
    );

    expect(result.rawImportRecords.map(record => [record.moduleRequest, record.kind])).toEqual([
      ['./x', ImportKind.Import],
      ['./y', ImportKind.Require],
      ['./z', ImportKind.DynamicImport],
    ]);
    expect(result.rawImportRecords[0].containsImportDefault).toBe(true);
    expect(result.namedImports.map(binding => binding.imported)).toEqual(['default', 'a']);
  });

  it('names the namespace, record and default symbols after the file', () => {
    const { symbols, scan: result } = scan("import './dep';\nexport default function () {}\n");

    expect(symbols.originalName(result.namespaceRef)).toBe('a_exports');
    expect(symbols.originalName(result.rawImportRecords[0].namespaceRef)).toBe('import_dep');
    expect(result.defaultExportRef && symbols.originalName(result.defaultExportRef)).toBe('a_default');
    expect([...result.localExports.keys()]).toEqual(['default']);
  });

  it('models re-exports as imports plus local exports', () => {
    const { scan: result } = scan("export { x as y } from './b';\nexport * from './c';\n");

    expect(result.namedImports.map(binding => [binding.recordIndex, binding.imported])).toEqual([[0, 'x']]);
    expect([...result.localExports.keys()]).toEqual(['y']);
    expect(result.starExports).toEqual([1]);
  });

  it('resolves local export lists after the declarations', () => {
    const { symbols, scan: result } = scan('export { value as renamed };\nconst value = 1;\n');
    const ref = result.localExports.get('renamed');
    expect(ref && symbols.originalName(ref)).toBe('value');
  });

  it('separates globals from nested bindings', () => {
    const { scan: result } = scan('function f(y) {\n  return y + missing;\n}\nconsole.log(f(1));\n');

    expect([...result.unresolvedNames].sort()).toEqual(['console', 'missing']);
    expect([...result.nestedNames]).toEqual(['y']);
  });

  it('records shorthand properties of top-level bindings', () => {
    const { scan: result } = scan('const x = 1;\nexport const o = { x };\n');
    expect([...result.shorthands].map(id => id.text)).toEqual(['x']);
  });

  it('ignores require when it is a local binding', () => {
    const { scan: result } = scan("const require = () => 1;\nrequire('./x');\n");
    expect(result.rawImportRecords).toEqual([]);
  });

  it('detects the export kind', () => {
    expect(scan('export const a = 1;').scan.exportsKind).toBe(ExportsKind.Esm);
    expect(scan('module.exports = 1;').scan.exportsKind).toBe(ExportsKind.CommonJs);
    expect(scan('console.log(1);', '/project/src/a.cjs').scan.exportsKind).toBe(ExportsKind.CommonJs);
    expect(scan('console.log(1);', '/project/src/a.mjs').scan.exportsKind).toBe(ExportsKind.Esm);
    expect(scan('console.log(1);').scan.exportsKind).toBe(ExportsKind.None);
  });

  it('detects a leading use strict directive', () => {
    expect(scan('"use strict";\nmodule.exports = 1;').scan.containsUseStrict).toBe(true);
    expect(scan('module.exports = 1;\n"use strict";').scan.containsUseStrict).toBe(false);
  });

  it('reports syntax errors with their location', () => {
    let error: unknown;
    try {
      scan('const ok = 1;\nconst = ;\n');
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(BuildError);
    if (error instanceof BuildError) {
      expect(error.code).toBe('PARSE_ERROR');
      expect(error.loc?.file).toBe('/project/src/a.js');
      expect(error.loc?.line).toBe(2);
    }
  });

  it('rejects duplicate exports', () => {
    expect(() => scan('export const a = 1;\nexport { a };\n')).toThrow('Duplicate export "a"');
  });
});
