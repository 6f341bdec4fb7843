/**
 * Output file name pattern, `[name].js` by default.
 * `[name]` is the chunk's logical name, or `chunk` for shared chunks.
 */
export class FileNameTemplate {
  constructor(public readonly pattern: string) {}

  render(props: { name?: string }): string {
    return this.pattern.replace(/\[name\]/g, props.name ?? 'chunk');
  }

  toString(): string {
    return this.pattern;
  }
}

export const DEFAULT_FILE_NAMES = '[name].js';
