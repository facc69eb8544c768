import { InvalidArgumentError, OperationCancelledError } from '../errors/index.js';

/**
 * Reject a missing, non-string or blank argument.
 *
 * @param label - Human-readable name used in the message. Example: "Blob name"
 * @throws InvalidArgumentError carrying the parameter name.
 */
export function requireNonBlank(value: string, parameter: string, label: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidArgumentError(`${label} cannot be empty`, parameter);
  }
}

/**
 * Reject a null or undefined argument (used for streams).
 */
export function requirePresent(value: object | null | undefined, parameter: string): void {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${parameter} is required`, parameter);
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(
      `Operation "${operation}" was cancelled before it started`,
      operation,
      { cause: signal.reason },
    );
  }
}
