import { RestError } from '@azure/storage-blob';

/**
 * Whether an error is the storage service reporting that the blob (or its container)
 * does not exist.
 *
 * Remote errors are passed through unchanged; this predicate is the supported way
 * for callers to recognise the not-found case.
 */
export function isRemoteNotFound(error: unknown): boolean {
  return error instanceof RestError && error.statusCode === 404;
}

/**
 * Whether an error was produced by an aborted request.
 * Matches the SDK's AbortError as well as DOMException('...', 'AbortError').
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
