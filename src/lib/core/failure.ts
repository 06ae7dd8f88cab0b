/**
 * Look up table failure information.
 */

/**
 * Reasons why a table operation can fail.
 */
export type TableFailureReason =
  | 'FORMAT'
  | 'LAYOUT'
  | 'OUT_OF_RANGE'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'NO_FILE_SPECIFIED';

/**
 * Information about a failed table operation.
 *
 * @property line - 1-based source line, only set for FORMAT failures
 */
export interface TableFailure {
  readonly reason: TableFailureReason;
  readonly details: string;
  readonly line?: number;
}

/**
 * Create a frozen TableFailure.
 */
export function tableFailure(
  reason: TableFailureReason,
  details: string,
  line?: number
): TableFailure {
  return Object.freeze(line === undefined ? { reason, details } : { reason, details, line });
}

/**
 * Type guard to check if a result is a TableFailure.
 */
export function isTableFailure(value: unknown): value is TableFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'reason' in value &&
    'details' in value
  );
}

/**
 * Error thrown by table operations. The failure record is kept so callers
 * can branch on `reason` rather than on the message text.
 */
export class TableError extends Error {
  readonly failure: TableFailure;

  constructor(failure: TableFailure) {
    const where = failure.line !== undefined ? ` (line ${failure.line})` : '';
    super(`${failure.reason}: ${failure.details}${where}`);
    this.name = 'TableError';
    this.failure = failure;
  }

  get reason(): TableFailureReason {
    return this.failure.reason;
  }
}

/**
 * Throw a TableError built from the given failure fields.
 */
export function fail(reason: TableFailureReason, details: string, line?: number): never {
  throw new TableError(tableFailure(reason, details, line));
}

/**
 * Run `fn` and return its result, or the TableFailure if it threw a TableError.
 * Any other error is rethrown.
 */
export function attempt<T>(fn: () => T): T | TableFailure {
  try {
    return fn();
  } catch (error) {
    if (error instanceof TableError) {
      return error.failure;
    }
    throw error;
  }
}

/**
 * One-line description of a failure for console output.
 */
export function describeFailure(failure: TableFailure): string {
  const where = failure.line !== undefined ? ` on line ${failure.line}` : '';
  return `${failure.reason}${where}: ${failure.details}`;
}
