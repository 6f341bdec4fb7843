/**
 * Build errors
 *
 * - BuildError: a problem with the user's input (code, message, id, loc)
 * - BatchedErrors: every error a phase collected, raised once
 * - InternalError: a broken invariant inside the bundler
 */

export type BuildErrorCode =
  | 'UNRESOLVED_ENTRY'
  | 'UNRESOLVED_IMPORT'
  | 'MISSING_EXPORT'
  | 'PARSE_ERROR'
  | 'PLUGIN_ERROR'
  | 'LOAD_ERROR'
  | 'HOOK_ERROR'
  | 'UNSUPPORTED';

export interface SourceLocation {
  file: string;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

export interface BuildErrorProps {
  /** Module the error belongs to */
  id?: string;
  loc?: SourceLocation;
  cause?: unknown;
}

export class BuildError extends Error {
  public readonly id?: string;
  public readonly loc?: SourceLocation;

  constructor(public readonly code: BuildErrorCode, message: string, props: BuildErrorProps = {}) {
    super(message, props.cause === undefined ? undefined : { cause: props.cause });
    this.name = 'BuildError';
    this.id = props.id;
    this.loc = props.loc;
  }

  toString(): string {
    const where = this.loc ? ` (${this.loc.file}:${this.loc.line}:${this.loc.column})` : '';
    return `[${this.code}] ${this.message}${where}`;
  }
}

export class InternalError extends Error {
  public readonly code = 'INTERNAL';

  constructor(invariant: string) {
    super(`Internal error: ${invariant}`);
    this.name = 'InternalError';
  }
}

export class BatchedErrors extends Error {
  public readonly errors: ReadonlyArray<Error>;

  constructor(errors: ReadonlyArray<Error>) {
    const flat = flattenErrors(errors);
    super(
      flat.length === 1
        ? flat[0].message
        : `Build failed with ${flat.length} errors:\n${flat.map(error => `  - ${error.message}`).join('\n')}`,
    );
    this.name = 'BatchedErrors';
    this.errors = flat;
  }
}

function flattenErrors(errors: ReadonlyArray<Error>): Error[] {
  const result: Error[] = [];
  for (const error of errors) {
    if (error instanceof BatchedErrors) result.push(...error.errors);
    else result.push(error);
  }
  return result;
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}

/**
 * Unwraps settled results in order, raising every rejection as one batch
 */
export function collectSettled<T>(results: ReadonlyArray<PromiseSettledResult<T>>): T[] {
  const values: T[] = [];
  const errors: Error[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled') values.push(result.value);
    else errors.push(toError(result.reason));
  }
  if (errors.length > 0) throw new BatchedErrors(errors);
  return values;
}
