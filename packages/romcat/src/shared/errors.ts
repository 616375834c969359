/**
 * Error taxonomy. Fatal errors surface once at the command boundary;
 * malformed catalog rows are collected as warnings instead.
 */

export type RomcatErrorCode = 'CONFIGURATION' | 'OPERATOR_ABORT';

export class RomcatError extends Error {
  constructor(
    message: string,
    readonly code: RomcatErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing catalog, bad threshold, no input items, refusing to overwrite output. */
export class ConfigurationError extends RomcatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
  }
}

/** Operator cancelled the run mid-review. Nothing is written. */
export class OperatorAbortError extends RomcatError {
  constructor(message = 'Run aborted by operator', options?: { cause?: unknown }) {
    super(message, 'OPERATOR_ABORT', options);
  }
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof OperatorAbortError) return 130;
  return 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
