import * as fs from 'fs';

/**
 * The only way the bundler touches input files
 */
export interface FileSystem {
  readFile(filePath: string): string;
  isFile(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
}

export class NodeFileSystem implements FileSystem {
  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  isFile(filePath: string): boolean {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  }

  isDirectory(filePath: string): boolean {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isDirectory() ?? false;
  }
}
