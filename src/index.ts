// Core bundler components
export { Bundler, bundle, createBundler } from './core/bundler/bundler';
export type { BundlerOptions, BundleOutput, BundleStats, OutputChunk } from './core/bundler/bundler';

export { ImportKind, RawImportRecord, formatImportKind, isStaticImport } from './compiler/interfaces/ImportKind';
export type { ImportRecord } from './compiler/interfaces/ImportKind';
export { ExportsKind, WrapKind } from './compiler/interfaces/ModuleKinds';
export type { OutputFormat } from './compiler/interfaces/ModuleKinds';

export { ModuleResolver } from './core/resolver/moduleResolver';
export type { ResolveOptions, ResolveResult } from './core/resolver/moduleResolver';

export { PluginManager, virtualPlugin } from './core/plugins/pluginSystem';
export type { Plugin, PluginBuild, OnResolveArgs, OnResolveResult, OnLoadArgs, OnLoadResult } from './core/plugins/pluginSystem';

// Linking and chunking
export { parseModule } from './core/parser/parser';
export type { ModuleScan } from './core/parser/parser';
export { ModuleLoader } from './core/graph/moduleLoader';
export type { ModuleGraph } from './core/graph/moduleLoader';
export { linkModules } from './core/link/linkStage';
export type { LinkStageOutput, ModuleMeta } from './core/link/linkStage';
export { SymbolTable } from './core/symbols/symbolTable';
export type { SymbolRef } from './core/symbols/symbolTable';
export { BitSet } from './core/chunk/bitset';
export { Chunk } from './core/chunk/chunk';
export { ChunkGraph } from './core/chunk/chunkGraph';
export { generateChunks } from './core/chunk/generateChunks';
export { FileNameTemplate } from './config/fileNameTemplate';

// Rendering
export { renderChunk } from './core/render/renderChunk';
export type { AddonHook, ChunkRenderOptions, ChunkRenderOutput } from './core/render/renderChunk';
export type { RenderedChunk } from './core/render/renderedChunk';
export type { ModuleRenderOutput, RenderedModule } from './core/render/renderNormalModule';

// Errors and logging
export { BatchedErrors, BuildError, InternalError } from './errors/errors';
export type { BuildErrorCode } from './errors/errors';
export { BundleLog, createBundleLog } from './log/BundleLog';
export type { LogLevel } from './log/BundleLog';

export { NodeFileSystem } from './utils/fileSystem';
export type { FileSystem } from './utils/fileSystem';
