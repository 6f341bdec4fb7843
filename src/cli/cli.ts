#!/usr/bin/env node
/**
 * chunklink CLI
 *
 * chunklink build <entries...> [options]
 */

import { Bundler } from '../core/bundler/bundler';
import type { BundlerOptions } from '../core/bundler/bundler';
import type { OutputFormat } from '../compiler/interfaces/ModuleKinds';
import { BatchedErrors, BuildError } from '../errors/errors';
import { createBundleLog } from '../log/BundleLog';

// CLI version
const VERSION = '0.1.0';

const FORMATS: ReadonlyArray<OutputFormat> = ['esm', 'cjs', 'app'];

// Parse command line arguments
export interface ParsedArgs {
  command: string;
  args: string[];
  options: Record<string, string | boolean>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const command = args[0] || 'help';
  const positionalArgs: string[] = [];
  const options: Record<string, string | boolean> = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const [key, value] = arg.slice(2).split('=');
      if (value !== undefined) {
        options[key] = value;
      } else if (args[i + 1] && !args[i + 1].startsWith('-')) {
        options[key] = args[++i];
      } else {
        options[key] = true;
      }
    } else if (arg.startsWith('-')) {
      const key = arg.slice(1);
      if (args[i + 1] && !args[i + 1].startsWith('-')) {
        options[key] = args[++i];
      } else {
        options[key] = true;
      }
    } else {
      positionalArgs.push(arg);
    }
  }

  return { command, args: positionalArgs, options };
}

function stringOption(options: ParsedArgs['options'], ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = options[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some(format => format === value);
}

/**
 * Maps `build` arguments onto bundler options
 */
export function toBundlerOptions({ args, options }: ParsedArgs): BundlerOptions {
  if (args.length === 0) {
    throw new Error('No entry given, usage: chunklink build <entries...>');
  }

  const format = stringOption(options, 'format', 'f') ?? 'esm';
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown format "${format}", expected one of ${FORMATS.join(', ')}`);
  }

  let sourcemap: BundlerOptions['sourcemap'] = false;
  if (options.sourcemap === true) sourcemap = 'external';
  else if (options.sourcemap === 'inline' || options.sourcemap === 'external') sourcemap = options.sourcemap;

  const external = stringOption(options, 'external');
  const parallelismOption = stringOption(options, 'parallelism');
  const parallelism = parallelismOption === undefined ? undefined : Number(parallelismOption);
  if (parallelism !== undefined && !(Number.isInteger(parallelism) && parallelism > 0)) {
    throw new Error(`Invalid parallelism "${parallelismOption}", expected a positive integer`);
  }

  return {
    entry: args,
    outdir: stringOption(options, 'outdir', 'o') ?? 'dist',
    cwd: stringOption(options, 'cwd'),
    format,
    sourcemap,
    external: external ? external.split(',').filter(Boolean) : [],
    banner: stringOption(options, 'banner'),
    footer: stringOption(options, 'footer'),
    parallelism,
    logLevel: options.verbose ? 'verbose' : 'succinct',
  };
}

// Help text
export function showHelp(): void {
  console.log(`
chunklink - links ES and CommonJS modules into output chunks

Usage:
  chunklink build <entries...> [options]

Options:
  -o, --outdir <dir>        Output directory (default: dist)
  -f, --format <format>     esm | cjs | app (default: esm)
  --sourcemap [kind]        inline | external
  --external <a,b>          Modules left to the runtime
  --banner <text>           Prepended to every chunk
  --footer <text>           Appended to every chunk
  --parallelism <n>         Modules rendered at once
  --cwd <dir>               Working directory
  --verbose                 Detailed logging
  -h, --help                Show help
  -v, --version             Show version
`);
}

// Version
export function showVersion(): void {
  console.log(VERSION);
}

async function runBuild(parsed: ParsedArgs): Promise<void> {
  const bundler = new Bundler(toBundlerOptions(parsed));
  const log = bundler.bundleLog;
  try {
    const output = await bundler.build();
    const files = await bundler.write(output);
    for (const file of files) log.verbose('write', '$file', { file });
  } catch (error) {
    const errors = error instanceof BatchedErrors ? error.errors : [error];
    for (const item of errors) log.error(item instanceof BuildError ? item.toString() : String(item));
    log.finalise();
    process.exitCode = 1;
    return;
  }
  log.finalise();
}

// Main CLI entry
export async function main(argv: string[]): Promise<void> {
  const parsed = parseArgs(argv);
  const { command, options } = parsed;

  // Handle help and version flags
  if (options.h || options.help) {
    showHelp();
    return;
  }

  if (options.v || options.version) {
    showVersion();
    return;
  }

  switch (command) {
    case 'help':
      showHelp();
      break;

    case 'version':
      showVersion();
      break;

    case 'build':
      await runBuild(parsed);
      break;

    default:
      createBundleLog().fatal(`Unknown command: ${command}`);
      showHelp();
      process.exitCode = 1;
  }
}

// Run CLI
if (require.main === module) {
  main(process.argv).catch((err: unknown) => {
    createBundleLog().fatal(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
