/**
 * Module Parser
 *
 * Parses a module with the TypeScript compiler API and binds every
 * identifier through a single-file program's type checker:
 * - top-level symbols, import bindings and exports
 * - raw import records (import, export-from, import(), require())
 * - reference sites for renaming, unresolved globals and nested names
 * - the module's export kind and strictness
 */

import * as path from 'path';
import * as ts from 'typescript';
import { ImportKind, RawImportRecord } from '../../compiler/interfaces/ImportKind';
import { ExportsKind } from '../../compiler/interfaces/ModuleKinds';
import { isCJSExtension, isESMExtension } from '../../config/extensions';
import { BuildError } from '../../errors/errors';
import { fileStem, legitimizeIdentifier } from '../../utils/utils';
import type { ModuleId, SymbolRef, SymbolTable } from '../symbols/symbolTable';

export interface ImportBinding {
  readonly recordIndex: number;
  /** Name exported by the target, `*` for its namespace */
  readonly imported: string;
  readonly local: SymbolRef;
}

export interface ModuleScan {
  readonly sourceFile: ts.SourceFile;
  readonly stem: string;
  /** Kind the source itself shows, before linking */
  readonly exportsKind: ExportsKind;
  /** A "use strict" directive leads the file */
  readonly containsUseStrict: boolean;
  readonly namespaceRef: SymbolRef;
  /** Symbol of `export default <expression>` or an anonymous default declaration */
  readonly defaultExportRef?: SymbolRef;
  readonly rawImportRecords: ReadonlyArray<RawImportRecord>;
  /** Import/export declarations and import()/require() calls mapped to their record */
  readonly importNodes: ReadonlyMap<ts.Node, number>;
  readonly namedImports: ReadonlyArray<ImportBinding>;
  readonly localExports: ReadonlyMap<string, SymbolRef>;
  /** Records of `export * from` */
  readonly starExports: ReadonlyArray<number>;
  readonly references: ReadonlyMap<ts.Identifier, SymbolRef>;
  /** References written as `{ x }`, rendered as `{ x: name }` when renamed */
  readonly shorthands: ReadonlySet<ts.Identifier>;
  readonly unresolvedNames: ReadonlySet<string>;
  readonly nestedNames: ReadonlySet<string>;
}

export interface ParserOptions {
  id: ModuleId;
  /** Resolved path, decides script kind and CommonJS/ESM defaults */
  filename: string;
  source: string;
  symbols: SymbolTable;
}

const BINDING_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.VariableDeclaration,
  ts.SyntaxKind.Parameter,
  ts.SyntaxKind.BindingElement,
  ts.SyntaxKind.FunctionDeclaration,
  ts.SyntaxKind.FunctionExpression,
  ts.SyntaxKind.ClassDeclaration,
  ts.SyntaxKind.ClassExpression,
  ts.SyntaxKind.ImportClause,
  ts.SyntaxKind.ImportSpecifier,
  ts.SyntaxKind.NamespaceImport,
  ts.SyntaxKind.ImportEqualsDeclaration,
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.ModuleDeclaration,
]);

function scriptKindOf(filename: string): ts.ScriptKind {
  switch (path.extname(filename)) {
    case '.ts':
    case '.mts':
    case '.cts':
      return ts.ScriptKind.TS;
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    default:
      return ts.ScriptKind.JS;
  }
}

// The checker only ever sees one file, its name just has to carry the right extension
function programFileName(kind: ts.ScriptKind): string {
  switch (kind) {
    case ts.ScriptKind.TS:
      return '/module.ts';
    case ts.ScriptKind.TSX:
      return '/module.tsx';
    case ts.ScriptKind.JSX:
      return '/module.jsx';
    default:
      return '/module.js';
  }
}

function createProgram(sourceFile: ts.SourceFile): ts.Program {
  const host: ts.CompilerHost = {
    getSourceFile: fileName => (fileName === sourceFile.fileName ? sourceFile : undefined),
    getDefaultLibFileName: () => '/lib.d.ts',
    writeFile: () => undefined,
    getCurrentDirectory: () => '/',
    getCanonicalFileName: fileName => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => '\n',
    fileExists: fileName => fileName === sourceFile.fileName,
    readFile: () => undefined,
  };
  return ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: {
      allowJs: true,
      noLib: true,
      noResolve: true,
      types: [],
      target: ts.ScriptTarget.ESNext,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
    },
    host,
  });
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some(m => m.kind === kind) ?? false;
}

function hasExportModifier(node: ts.Node): boolean {
  return hasModifier(node, ts.SyntaxKind.ExportKeyword);
}

/**
 * Identifier nodes in binding patterns, in source order
 */
export function collectBindingIdentifiers(name: ts.BindingName, into: ts.Identifier[] = []): ts.Identifier[] {
  if (ts.isIdentifier(name)) {
    into.push(name);
    return into;
  }
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) collectBindingIdentifiers(element.name, into);
  }
  return into;
}

/**
 * False for identifiers that name a property, label or meta property
 * rather than a binding
 */
function isReferenceIdentifier(id: ts.Identifier): boolean {
  const parent = id.parent;
  if (ts.isPropertyAccessExpression(parent) || ts.isQualifiedName(parent)) {
    return ts.isPropertyAccessExpression(parent) ? parent.expression === id : parent.left === id;
  }
  if (
    (ts.isPropertyAssignment(parent) ||
      ts.isMethodDeclaration(parent) ||
      ts.isPropertyDeclaration(parent) ||
      ts.isGetAccessorDeclaration(parent) ||
      ts.isSetAccessorDeclaration(parent) ||
      ts.isPropertySignature(parent) ||
      ts.isMethodSignature(parent) ||
      ts.isEnumMember(parent)) &&
    parent.name === id
  ) {
    return false;
  }
  if (ts.isBindingElement(parent) && parent.propertyName === id) return false;
  if (ts.isLabeledStatement(parent) || ts.isBreakOrContinueStatement(parent)) return false;
  if (ts.isMetaProperty(parent) || ts.isJsxAttribute(parent)) return false;
  return true;
}

function isShorthandSite(id: ts.Identifier): boolean {
  const parent = id.parent;
  if (ts.isShorthandPropertyAssignment(parent)) return parent.name === id;
  return (
    ts.isBindingElement(parent) &&
    parent.name === id &&
    !parent.propertyName &&
    !parent.dotDotDotToken &&
    ts.isObjectBindingPattern(parent.parent)
  );
}

/**
 * Scans one module. Symbols are declared in the shared table in a fixed
 * order: the namespace first, then top-level bindings and import records in
 * statement order, then records of nested import() and require() calls.
 */
export class ModuleParser {
  private readonly options: ParserOptions;
  private readonly sourceFile: ts.SourceFile;
  private readonly checker: ts.TypeChecker;
  private readonly stem: string;
  private readonly namespaceRef: SymbolRef;

  private defaultExportRef?: SymbolRef;
  private hasModuleSyntax = false;
  private usesCommonJs = false;
  private readonly records: RawImportRecord[] = [];
  private readonly importNodes = new Map<ts.Node, number>();
  private readonly namedImports: ImportBinding[] = [];
  private readonly localExports = new Map<string, SymbolRef>();
  private readonly starExports: number[] = [];
  private readonly pendingLocalExports: ts.ExportDeclaration[] = [];
  private readonly topLevelBySymbol = new Map<ts.Symbol, SymbolRef>();
  private readonly topLevelByName = new Map<string, SymbolRef>();
  private readonly references = new Map<ts.Identifier, SymbolRef>();
  private readonly shorthands = new Set<ts.Identifier>();
  private readonly unresolvedNames = new Set<string>();
  private readonly nestedNames = new Set<string>();

  constructor(options: ParserOptions) {
    this.options = options;
    const kind = scriptKindOf(options.filename);
    this.sourceFile = ts.createSourceFile(programFileName(kind), options.source, ts.ScriptTarget.ESNext, true, kind);
    const program = createProgram(this.sourceFile);
    this.assertNoSyntaxErrors(program);
    this.checker = program.getTypeChecker();
    this.stem = fileStem(options.filename);
    this.namespaceRef = options.symbols.declare(options.id, `${this.stem}_exports`);
  }

  parse(): ModuleScan {
    for (const statement of this.sourceFile.statements) {
      this.scanTopLevel(statement);
    }
    for (const declaration of this.pendingLocalExports) {
      this.scanLocalExports(declaration);
    }

    const visit = (node: ts.Node): void => {
      if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node) || ts.isImportEqualsDeclaration(node)) return;
      if (ts.isInterfaceDeclaration(node) || ts.isTypeAliasDeclaration(node)) return;
      if (ts.isTypeNode(node) && !ts.isExpressionWithTypeArguments(node)) return;
      if (ts.isCallExpression(node)) this.scanCall(node);
      if (ts.isIdentifier(node)) this.scanIdentifier(node);
      ts.forEachChild(node, visit);
    };
    ts.forEachChild(this.sourceFile, visit);

    return {
      sourceFile: this.sourceFile,
      stem: this.stem,
      exportsKind: this.detectExportsKind(),
      containsUseStrict: this.detectUseStrict(),
      namespaceRef: this.namespaceRef,
      defaultExportRef: this.defaultExportRef,
      rawImportRecords: this.records,
      importNodes: this.importNodes,
      namedImports: this.namedImports,
      localExports: this.localExports,
      starExports: this.starExports,
      references: this.references,
      shorthands: this.shorthands,
      unresolvedNames: this.unresolvedNames,
      nestedNames: this.nestedNames,
    };
  }

  private assertNoSyntaxErrors(program: ts.Program) {
    const diagnostic = program
      .getSyntacticDiagnostics(this.sourceFile)
      .find(diag => diag.category === ts.DiagnosticCategory.Error);
    if (!diagnostic) return;
    const pos = this.sourceFile.getLineAndCharacterOfPosition(diagnostic.start ?? 0);
    throw new BuildError('PARSE_ERROR', ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'), {
      id: this.options.filename,
      loc: { file: this.options.filename, line: pos.line + 1, column: pos.character },
    });
  }

  private locationOf(node: ts.Node) {
    const pos = this.sourceFile.getLineAndCharacterOfPosition(node.getStart());
    return { file: this.options.filename, line: pos.line + 1, column: pos.character };
  }

  private symbolAt(node: ts.Node): ts.Symbol | undefined {
    const symbol = this.checker.getSymbolAtLocation(node);
    return symbol && this.checker.getExportSymbolOfSymbol(symbol);
  }

  private declareBinding(name: ts.Identifier): SymbolRef {
    const symbol = this.symbolAt(name);
    const existing = symbol ? this.topLevelBySymbol.get(symbol) : this.topLevelByName.get(name.text);
    if (existing) return existing;

    const ref = this.options.symbols.declare(this.options.id, name.text);
    if (symbol) this.topLevelBySymbol.set(symbol, ref);
    if (!this.topLevelByName.has(name.text)) this.topLevelByName.set(name.text, ref);
    return ref;
  }

  private addRecord(request: string, kind: ImportKind, node: ts.Node): number {
    const namespaceRef = this.options.symbols.declare(this.options.id, `import_${fileStem(request)}`);
    this.records.push(new RawImportRecord(request, kind, namespaceRef));
    const index = this.records.length - 1;
    this.importNodes.set(node, index);
    return index;
  }

  private addExport(name: string, ref: SymbolRef, node: ts.Node) {
    if (this.localExports.has(name)) {
      throw new BuildError('PARSE_ERROR', `Duplicate export "${name}"`, {
        id: this.options.filename,
        loc: this.locationOf(node),
      });
    }
    this.localExports.set(name, ref);
  }

  // ============================================
  // Top-level declarations
  // ============================================

  private scanTopLevel(statement: ts.Statement) {
    if (ts.isImportDeclaration(statement)) {
      this.scanImportDeclaration(statement);
    } else if (ts.isExportDeclaration(statement)) {
      this.scanExportDeclaration(statement);
    } else if (ts.isExportAssignment(statement)) {
      if (statement.isExportEquals) return;
      this.hasModuleSyntax = true;
      this.defaultExportRef = this.options.symbols.declare(this.options.id, `${this.stem}_default`);
      this.addExport('default', this.defaultExportRef, statement);
    } else if (ts.isVariableStatement(statement)) {
      const exported = hasExportModifier(statement);
      if (exported) this.hasModuleSyntax = true;
      for (const declaration of statement.declarationList.declarations) {
        for (const name of collectBindingIdentifiers(declaration.name)) {
          const ref = this.declareBinding(name);
          if (exported) this.addExport(name.text, ref, name);
        }
      }
    } else if (ts.isFunctionDeclaration(statement) || ts.isClassDeclaration(statement)) {
      this.scanDeclaration(statement);
    }
  }

  private scanDeclaration(statement: ts.FunctionDeclaration | ts.ClassDeclaration) {
    let ref = statement.name ? this.declareBinding(statement.name) : undefined;
    if (!hasExportModifier(statement)) return;
    this.hasModuleSyntax = true;

    if (hasModifier(statement, ts.SyntaxKind.DefaultKeyword)) {
      if (!ref) {
        ref = this.options.symbols.declare(this.options.id, `${this.stem}_default`);
        this.defaultExportRef = ref;
      }
      this.addExport('default', ref, statement);
    } else if (ref && statement.name) {
      this.addExport(statement.name.text, ref, statement.name);
    }
  }

  private scanImportDeclaration(node: ts.ImportDeclaration) {
    this.hasModuleSyntax = true;
    const clause = node.importClause;
    if (clause?.isTypeOnly || !ts.isStringLiteral(node.moduleSpecifier)) return;

    const index = this.addRecord(node.moduleSpecifier.text, ImportKind.Import, node);
    const record = this.records[index];
    if (!clause) return;

    if (clause.name) {
      record.containsImportDefault = true;
      this.namedImports.push({ recordIndex: index, imported: 'default', local: this.declareBinding(clause.name) });
    }
    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) {
      record.containsImportStar = true;
      this.namedImports.push({ recordIndex: index, imported: '*', local: this.declareBinding(bindings.name) });
    } else if (bindings) {
      for (const element of bindings.elements) {
        if (element.isTypeOnly) continue;
        const imported = (element.propertyName ?? element.name).text;
        if (imported === 'default') record.containsImportDefault = true;
        this.namedImports.push({ recordIndex: index, imported, local: this.declareBinding(element.name) });
      }
    }
  }

  private scanExportDeclaration(node: ts.ExportDeclaration) {
    this.hasModuleSyntax = true;
    if (node.isTypeOnly) return;
    if (!node.moduleSpecifier) {
      this.pendingLocalExports.push(node);
      return;
    }
    if (!ts.isStringLiteral(node.moduleSpecifier)) return;

    const index = this.addRecord(node.moduleSpecifier.text, ImportKind.Import, node);
    const record = this.records[index];
    const clause = node.exportClause;
    if (!clause) {
      this.starExports.push(index);
      return;
    }

    if (ts.isNamespaceExport(clause)) {
      record.containsImportStar = true;
      const local = this.options.symbols.declare(this.options.id, legitimizeIdentifier(clause.name.text));
      this.namedImports.push({ recordIndex: index, imported: '*', local });
      this.addExport(clause.name.text, local, clause);
      return;
    }

    // Re-exports become an import binding plus a local export of it
    for (const element of clause.elements) {
      if (element.isTypeOnly) continue;
      const imported = (element.propertyName ?? element.name).text;
      if (imported === 'default') record.containsImportDefault = true;
      const local = this.options.symbols.declare(this.options.id, legitimizeIdentifier(imported));
      this.namedImports.push({ recordIndex: index, imported, local });
      this.addExport(element.name.text, local, element);
    }
  }

  private scanLocalExports(node: ts.ExportDeclaration) {
    const clause = node.exportClause;
    if (!clause || !ts.isNamedExports(clause)) return;
    for (const element of clause.elements) {
      if (element.isTypeOnly) continue;
      const localName = (element.propertyName ?? element.name).text;
      const ref = this.topLevelByName.get(localName);
      if (!ref) {
        throw new BuildError('PARSE_ERROR', `Exported binding "${localName}" is not declared in this module`, {
          id: this.options.filename,
          loc: this.locationOf(element),
        });
      }
      this.addExport(element.name.text, ref, element);
    }
  }

  // ============================================
  // References
  // ============================================

  private isFree(symbol: ts.Symbol | undefined): boolean {
    if (!symbol) return true;
    return !(symbol.declarations ?? []).some(
      declaration => declaration.getSourceFile() === this.sourceFile && BINDING_KINDS.has(declaration.kind),
    );
  }

  private scanCall(node: ts.CallExpression) {
    const [argument] = node.arguments;
    if (node.arguments.length !== 1 || !ts.isStringLiteralLike(argument)) return;

    if (node.expression.kind === ts.SyntaxKind.ImportKeyword) {
      this.addRecord(argument.text, ImportKind.DynamicImport, node);
    } else if (
      ts.isIdentifier(node.expression) &&
      node.expression.text === 'require' &&
      this.isFree(this.symbolAt(node.expression))
    ) {
      this.addRecord(argument.text, ImportKind.Require, node);
    }
  }

  private scanIdentifier(id: ts.Identifier) {
    if (!isReferenceIdentifier(id)) return;
    const parent = id.parent;
    const raw =
      ts.isShorthandPropertyAssignment(parent) && parent.name === id
        ? this.checker.getShorthandAssignmentValueSymbol(parent)
        : this.checker.getSymbolAtLocation(id);
    const symbol = raw && this.checker.getExportSymbolOfSymbol(raw);

    const ref = symbol && this.topLevelBySymbol.get(symbol);
    if (ref) {
      this.references.set(id, ref);
      if (isShorthandSite(id)) this.shorthands.add(id);
    } else if (this.isFree(symbol)) {
      this.unresolvedNames.add(id.text);
      if (id.text === 'module' || id.text === 'exports') this.usesCommonJs = true;
    } else {
      this.nestedNames.add(id.text);
    }
  }

  // ============================================
  // Module flags
  // ============================================

  private detectExportsKind(): ExportsKind {
    const ext = path.extname(this.options.filename);
    if (this.hasModuleSyntax || isESMExtension(ext)) return ExportsKind.Esm;
    if (this.usesCommonJs || isCJSExtension(ext)) return ExportsKind.CommonJs;
    return ExportsKind.None;
  }

  private detectUseStrict(): boolean {
    for (const statement of this.sourceFile.statements) {
      if (!ts.isExpressionStatement(statement) || !ts.isStringLiteral(statement.expression)) break;
      if (statement.expression.text === 'use strict') return true;
    }
    return false;
  }
}

export function parseModule(options: ParserOptions): ModuleScan {
  return new ModuleParser(options).parse();
}
