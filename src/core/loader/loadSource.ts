import * as path from 'path';
import { BuildError } from '../../errors/errors';
import type { FileSystem } from '../../utils/fileSystem';
import type { PluginManager } from '../plugins/pluginSystem';

export interface LoadTarget {
  path: string;
  ignored: boolean;
}

/**
 * Source of one module: plugin onLoad hooks first, then empty text for
 * ignored modules, then the file system. JSON files load as CommonJS.
 */
export async function loadSource(target: LoadTarget, plugins: PluginManager, fs: FileSystem): Promise<string> {
  const loaded = await plugins.runOnLoad({ path: target.path });
  if (loaded?.contents !== undefined) {
    return loaded.contents;
  }
  if (target.ignored) {
    return '';
  }

  let contents: string;
  try {
    contents = fs.readFile(target.path);
  } catch (error) {
    throw new BuildError('LOAD_ERROR', `Could not load "${target.path}": ${error instanceof Error ? error.message : String(error)}`, {
      id: target.path,
      cause: error,
    });
  }
  return path.extname(target.path) === '.json' ? `module.exports = ${contents.trim()};\n` : contents;
}
