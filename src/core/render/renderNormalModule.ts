/**
 * Renders one module's code for its chunk.
 *
 * Edits happen in two passes on a MagicString: removals and overwrites
 * first, insertions after, so nothing is inserted into a range that is
 * later dropped.
 */

import MagicString from 'magic-string';
import * as ts from 'typescript';
import { ImportKind } from '../../compiler/interfaces/ImportKind';
import type { ImportRecord } from '../../compiler/interfaces/ImportKind';
import { WrapKind } from '../../compiler/interfaces/ModuleKinds';
import type { RuntimeHelper } from '../../bundleRuntime/bundleRuntime';
import { InternalError } from '../../errors/errors';
import { propertyAccess, propertyKey, relativeChunkPath } from '../../utils/utils';
import type { Chunk } from '../chunk/chunk';
import type { ChunkGraph } from '../chunk/chunkGraph';
import { isNormalModule } from '../graph/module';
import type { NormalModule } from '../graph/module';
import { importsThroughNamespace, runtimeHelperRef } from '../link/linkStage';
import type { LinkStageOutput, ModuleMeta } from '../link/linkStage';
import { collectBindingIdentifiers, hasModifier } from '../parser/parser';
import type { SymbolRef } from '../symbols/symbolTable';

export interface ModuleRenderContext {
  readonly link: LinkStageOutput;
  readonly graph: ChunkGraph;
  readonly chunk: Chunk;
  readonly sourcemap: boolean;
}

export interface RenderedModule {
  /** Top-level names as written in the source, mapped to the name or expression rendered */
  readonly names: Readonly<Record<string, string>>;
  readonly renderedLength: number;
}

export interface ModuleRenderOutput {
  readonly modulePath: string;
  readonly modulePrettyPath: string;
  readonly renderedModule: RenderedModule;
  readonly renderedContent: string;
  readonly sourcemap?: string;
  readonly linesCount: number;
}

class NormalModuleRenderer {
  private readonly s: MagicString;
  private readonly source: string;
  private readonly meta: ModuleMeta;
  private readonly wrapped: boolean;
  private readonly removed: Array<[number, number]> = [];
  private readonly insertions: Array<() => void> = [];
  /** Names declared with `var` ahead of a lazily initialized module */
  private readonly hoisted: string[] = [];
  /** Import statements that must stay at the top level of a wrapped module */
  private readonly hoistedImports: string[] = [];
  private readonly hoistedFunctions: ts.FunctionDeclaration[] = [];
  private readonly names: Record<string, string> = {};

  constructor(private readonly module: NormalModule, private readonly ctx: ModuleRenderContext) {
    this.source = module.source;
    this.s = new MagicString(module.source);
    this.meta = ctx.link.metas[module.id];
    this.wrapped = this.meta.wrapKind === WrapKind.Esm;
  }

  render(): ModuleRenderOutput | undefined {
    if (this.meta.wrapKind === WrapKind.Cjs) {
      this.rewriteCalls();
      this.s.trim();
      const body = this.s.toString();
      this.s.prepend(`var ${this.name(this.wrapperRef())} = ${this.helper('__commonJS')}((exports, module) => {\n`);
      this.s.append(body ? '\n});' : '});');
    } else {
      for (const statement of this.module.scan.sourceFile.statements) this.renderStatement(statement);
      this.renameReferences();
      this.rewriteCalls();
      for (const insert of this.insertions) insert();
      this.finishEsm();
    }

    const content = this.s.toString();
    if (content === '') return undefined;

    const sourcemap =
      this.ctx.sourcemap && !this.module.path.startsWith('\0')
        ? this.s.generateMap({ source: this.module.path, includeContent: true, hires: true }).toString()
        : undefined;

    return {
      modulePath: this.module.path,
      modulePrettyPath: this.module.prettyPath,
      renderedModule: { names: Object.freeze({ ...this.names }), renderedLength: content.length },
      renderedContent: content,
      sourcemap,
      linesCount: content.split('\n').length,
    };
  }

  // ============================================
  // Names
  // ============================================

  private name(ref: SymbolRef): string {
    return this.ctx.link.symbols.canonicalNameFor(ref, this.ctx.chunk.canonicalNames);
  }

  /** Expression reading the symbol, `ns.prop` for bindings of CommonJS modules */
  private expression(ref: SymbolRef): string {
    const alias = this.ctx.link.symbols.namespaceAliasOf(ref);
    return alias ? this.name(alias.namespaceRef) + propertyAccess(alias.property) : this.name(ref);
  }

  private helper(name: RuntimeHelper): string {
    return this.name(runtimeHelperRef(this.ctx.link, name));
  }

  private wrapperRef(id = this.module.id): SymbolRef {
    const ref = this.ctx.link.metas[id].wrapperRef;
    if (!ref) throw new InternalError(`wrapped module #${id} has no wrapper symbol`);
    return ref;
  }

  // ============================================
  // Edits
  // ============================================

  private isRemoved(pos: number): boolean {
    return this.removed.some(([start, end]) => pos >= start && pos < end);
  }

  private remove(start: number, end: number) {
    if (start >= end) return;
    this.s.remove(start, end);
    this.removed.push([start, end]);
  }

  private overwrite(start: number, end: number, content: string) {
    this.s.overwrite(start, end, content);
    this.removed.push([start, end]);
  }

  private statementEnd(node: ts.Node): number {
    let end = node.end;
    if (this.source[end] === '\r') end++;
    if (this.source[end] === '\n') end++;
    return end;
  }

  private removeStatement(node: ts.Node) {
    this.remove(node.getStart(), this.statementEnd(node));
  }

  private replaceStatement(node: ts.Node, code: string | undefined) {
    if (code === undefined) this.removeStatement(node);
    else this.overwrite(node.getStart(), node.end, code);
  }

  /** Removes `export` and `default` keywords, returns where the declaration keyword starts */
  private stripExportModifiers(node: ts.Node): number {
    const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) ?? [] : [];
    let keywordStart = node.getStart();
    modifiers.forEach((modifier, index) => {
      const next = index + 1 < modifiers.length ? modifiers[index + 1].getStart() : this.skipWhitespace(modifier.end);
      if (modifier.kind === ts.SyntaxKind.ExportKeyword || modifier.kind === ts.SyntaxKind.DefaultKeyword) {
        this.remove(modifier.getStart(), next);
      }
      keywordStart = next;
    });
    return keywordStart;
  }

  private skipWhitespace(pos: number): number {
    let end = pos;
    while (end < this.source.length && /\s/.test(this.source[end])) end++;
    return end;
  }

  // ============================================
  // Statements
  // ============================================

  private renderStatement(statement: ts.Statement) {
    if (ts.isImportDeclaration(statement) || (ts.isExportDeclaration(statement) && statement.moduleSpecifier)) {
      const index = this.module.scan.importNodes.get(statement);
      if (index === undefined) this.removeStatement(statement);
      else this.replaceStatement(statement, this.importStatement(this.module.importRecords[index], index));
    } else if (ts.isExportDeclaration(statement) || ts.isInterfaceDeclaration(statement) || ts.isTypeAliasDeclaration(statement)) {
      this.removeStatement(statement);
    } else if (ts.isExportAssignment(statement)) {
      this.renderExportDefault(statement);
    } else if (ts.isVariableStatement(statement)) {
      if (this.wrapped) this.renderWrappedVariables(statement);
      else this.stripExportModifiers(statement);
    } else if (ts.isFunctionDeclaration(statement)) {
      this.renderFunction(statement);
    } else if (ts.isClassDeclaration(statement)) {
      this.renderClass(statement);
    }
  }

  private importStatement(record: ImportRecord, index: number): string | undefined {
    const { link } = this.ctx;
    const bindings = this.module.scan.namedImports.filter(binding => binding.recordIndex === index);
    const target = link.modules[record.resolvedModule];

    if (isNormalModule(target)) {
      const targetMeta = link.metas[target.id];
      if (targetMeta.wrapKind === WrapKind.Cjs) {
        const call = `${this.name(this.wrapperRef(target.id))}()`;
        if (bindings.length === 0) return `${call};`;
        return this.assignNamespace(record, `${this.helper('__toESM')}(${call})`);
      }
      if (targetMeta.wrapKind === WrapKind.Esm) return `${this.name(this.wrapperRef(target.id))}();`;
      return undefined;
    }

    const request = JSON.stringify(record.moduleRequest);
    if (importsThroughNamespace(link, record)) {
      if (bindings.length === 0) return `require(${request});`;
      return this.assignNamespace(record, `${this.helper('__toESM')}(require(${request}))`);
    }

    const defaults: string[] = [];
    const stars: string[] = [];
    const named: string[] = [];
    for (const binding of bindings) {
      const local = this.name(binding.local);
      if (binding.imported === 'default') defaults.push(local);
      else if (binding.imported === '*') stars.push(`* as ${local}`);
      else named.push(binding.imported === local ? local : `${propertyKey(binding.imported)} as ${local}`);
    }
    const statements: string[] = [];
    if (stars.length > 0) {
      statements.push(`import ${[...defaults.slice(0, 1), stars[0]].join(', ')} from ${request};`);
      if (named.length > 0) statements.push(`import { ${named.join(', ')} } from ${request};`);
    } else if (defaults.length > 0 || named.length > 0) {
      const clause = named.length > 0 ? [...defaults.slice(0, 1), `{ ${named.join(', ')} }`] : defaults.slice(0, 1);
      statements.push(`import ${clause.join(', ')} from ${request};`);
    } else {
      statements.push(`import ${request};`);
    }

    if (!this.wrapped) return statements.join('\n');
    this.hoistedImports.push(...statements);
    return undefined;
  }

  private assignNamespace(record: ImportRecord, init: string): string {
    const namespace = this.name(record.namespaceRef);
    if (!this.wrapped) return `var ${namespace} = ${init};`;
    this.hoisted.push(namespace);
    return `${namespace} = ${init};`;
  }

  private renderExportDefault(statement: ts.ExportAssignment) {
    if (statement.isExportEquals) return;
    const ref = this.module.scan.defaultExportRef;
    if (!ref) throw new InternalError(`${this.module.prettyPath} has a default export without a symbol`);
    const name = this.name(ref);
    if (this.wrapped) this.hoisted.push(name);
    this.overwrite(statement.getStart(), statement.expression.getStart(), this.wrapped ? `${name} = ` : `var ${name} = `);
    if (!this.source.slice(statement.getStart(), statement.end).trimEnd().endsWith(';')) {
      this.insertions.push(() => this.s.appendLeft(statement.end, ';'));
    }
  }

  private renderWrappedVariables(statement: ts.VariableStatement) {
    const declarations = statement.declarationList.declarations;
    for (const declaration of declarations) {
      for (const id of collectBindingIdentifiers(declaration.name)) {
        const ref = this.module.scan.references.get(id);
        if (ref) this.hoisted.push(this.name(ref));
      }
    }

    const initialized = declarations.filter(declaration => declaration.initializer);
    if (initialized.length === 0) {
      this.removeStatement(statement);
      return;
    }
    const needsParens = initialized.some(declaration => !ts.isIdentifier(declaration.name));
    const first = initialized[0];
    const last = initialized[initialized.length - 1];
    const listEnd = statement.declarationList.end;

    if (needsParens) this.overwrite(statement.getStart(), first.getStart(), '(');
    else this.remove(statement.getStart(), first.getStart());
    for (let i = 1; i < initialized.length; i++) {
      this.overwrite(initialized[i - 1].end, initialized[i].getStart(), ', ');
    }
    if (last.end < listEnd) {
      if (needsParens) this.overwrite(last.end, listEnd, ')');
      else this.remove(last.end, listEnd);
    } else if (needsParens) {
      this.insertions.push(() => this.s.appendLeft(last.end, ')'));
    }
  }

  private renderFunction(statement: ts.FunctionDeclaration) {
    if (!statement.body) {
      this.removeStatement(statement);
      return;
    }
    this.stripExportModifiers(statement);
    if (!statement.name && hasModifier(statement, ts.SyntaxKind.DefaultKeyword)) {
      const keyword = statement.asteriskToken ?? statement.getChildren().find(child => child.kind === ts.SyntaxKind.FunctionKeyword);
      const ref = this.module.scan.defaultExportRef;
      if (keyword && ref) {
        const name = this.name(ref);
        this.insertions.push(() => this.s.appendLeft(keyword.end, ` ${name}`));
      }
    }
    if (this.wrapped) this.hoistedFunctions.push(statement);
  }

  private renderClass(statement: ts.ClassDeclaration) {
    const keywordStart = this.stripExportModifiers(statement);
    const ref = statement.name ? this.module.scan.references.get(statement.name) : this.module.scan.defaultExportRef;
    if (!ref) return;
    const name = this.name(ref);
    if (!statement.name) {
      const keyword = statement.getChildren().find(child => child.kind === ts.SyntaxKind.ClassKeyword);
      if (keyword) this.insertions.push(() => this.s.appendLeft(keyword.end, ` ${name}`));
    }
    if (!this.wrapped) return;
    this.hoisted.push(name);
    this.insertions.push(() => {
      this.s.prependRight(keywordStart, `${name} = `);
      this.s.appendLeft(statement.end, ';');
    });
  }

  // ============================================
  // References and calls
  // ============================================

  private renameReferences() {
    for (const [id, ref] of this.module.scan.references) {
      const start = id.getStart();
      if (this.isRemoved(start)) continue;
      const replacement = this.expression(ref);
      this.names[id.text] = replacement;
      if (replacement === id.text) continue;
      if (this.module.scan.shorthands.has(id)) {
        this.s.overwrite(start, id.end, `${id.text}: ${replacement}`);
      } else {
        this.s.overwrite(start, id.end, replacement);
      }
    }
  }

  private rewriteCalls() {
    const { link, graph, chunk } = this.ctx;
    for (const [node, index] of this.module.scan.importNodes) {
      if (!ts.isCallExpression(node) || this.isRemoved(node.getStart())) continue;
      const record = this.module.importRecords[index];
      const target = link.modules[record.resolvedModule];
      if (!isNormalModule(target)) continue;

      if (record.kind === ImportKind.Require) {
        const targetMeta = link.metas[target.id];
        const wrapper = this.name(this.wrapperRef(target.id));
        const code =
          targetMeta.wrapKind === WrapKind.Cjs
            ? `${wrapper}()`
            : `(${wrapper}(), ${this.helper('__toCommonJS')}(${this.name(target.scan.namespaceRef)}))`;
        this.s.overwrite(node.getStart(), node.end, code);
      } else if (record.kind === ImportKind.DynamicImport) {
        const from = chunk.preliminaryFilename;
        const to = graph.entryChunkOf(target.id).preliminaryFilename;
        if (from === undefined || to === undefined) throw new InternalError('chunk file names are not assigned');
        const request = JSON.stringify(relativeChunkPath(from, to));
        if (link.format === 'esm') {
          const [argument] = node.arguments;
          this.s.overwrite(argument.getStart(), argument.end, request);
        } else {
          this.s.overwrite(node.getStart(), node.end, `Promise.resolve().then(() => require(${request}))`);
        }
      }
    }
  }

  // ============================================
  // Module shape
  // ============================================

  private namespaceBlock(): string | undefined {
    if (!this.meta.needsNamespace) return undefined;
    const namespace = this.name(this.module.scan.namespaceRef);
    if (this.meta.resolvedExports.size === 0) return `var ${namespace} = {};`;
    const getters = [...this.meta.resolvedExports].map(([exported, ref]) => `${propertyKey(exported)}: () => ${this.expression(ref)}`);
    return `var ${namespace} = {};\n${this.helper('__export')}(${namespace}, {\n  ${getters.join(',\n  ')}\n});`;
  }

  private finishEsm() {
    const namespace = this.namespaceBlock();
    if (!this.wrapped) {
      this.s.trim();
      if (namespace) this.s.prepend(this.s.toString() === '' ? namespace : `${namespace}\n`);
      return;
    }

    const functions = this.hoistedFunctions.map(statement => {
      const text = this.s.slice(statement.getStart(), statement.end);
      this.s.remove(statement.getStart(), this.statementEnd(statement));
      return text;
    });
    this.s.trim();
    const body = this.s.toString();

    const hoisted = [...new Set(this.hoisted)];
    const header = [
      ...this.hoistedImports,
      ...(namespace ? [namespace] : []),
      ...(hoisted.length > 0 ? [`var ${hoisted.join(', ')};`] : []),
      ...functions,
      `var ${this.name(this.wrapperRef())} = ${this.helper('__esm')}(() => {`,
    ];
    this.s.prepend(`${header.join('\n')}\n`);
    this.s.append(body ? '\n});' : '});');
  }
}

export function renderNormalModule(module: NormalModule, ctx: ModuleRenderContext): ModuleRenderOutput | undefined {
  return new NormalModuleRenderer(module, ctx).render();
}
