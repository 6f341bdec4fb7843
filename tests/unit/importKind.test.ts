import { describe, expect, it } from 'vitest';
import { ImportKind, RawImportRecord, formatImportKind, isStaticImport } from '../../src/compiler/interfaces/ImportKind';

describe('ImportKind', () => {
  it('treats import statements and require calls as static', () => {
    expect(isStaticImport(ImportKind.Import)).toBe(true);
    expect(isStaticImport(ImportKind.Require)).toBe(true);
    expect(isStaticImport(ImportKind.DynamicImport)).toBe(false);
  });

  it('formats every kind', () => {
    expect(formatImportKind(ImportKind.Import)).toBe('import-statement');
    expect(formatImportKind(ImportKind.DynamicImport)).toBe('dynamic-import');
    expect(formatImportKind(ImportKind.Require)).toBe('require-call');
  });
});

describe('RawImportRecord', () => {
  it('starts without star or default imports', () => {
    const record = new RawImportRecord('./a', ImportKind.Import, { module: 0, symbol: 1 });
    expect(record.containsImportStar).toBe(false);
    expect(record.containsImportDefault).toBe(false);
  });

  it('keeps its request, kind, namespace and flags once resolved', () => {
    const raw = new RawImportRecord('./a', ImportKind.Require, { module: 0, symbol: 1 });
    raw.containsImportDefault = true;
    const record = raw.intoImportRecord(7);

    expect(record).toEqual({
      moduleRequest: './a',
      kind: ImportKind.Require,
      resolvedModule: 7,
      namespaceRef: { module: 0, symbol: 1 },
      containsImportStar: false,
      containsImportDefault: true,
    });
    expect(Object.isFrozen(record)).toBe(true);
  });
});
