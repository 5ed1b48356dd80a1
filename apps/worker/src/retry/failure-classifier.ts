import {
  NoHandlerError,
  PermanentJobError,
  SubjectNotFoundError,
} from '../errors';

export type FailureType = 'retryable' | 'permanent';

/**
 * Timeouts, stale claims and anything a handler throws are retryable unless
 * the handler says otherwise with a PermanentJobError.
 */
export function classifyFailure(error: unknown): FailureType {
  if (
    error instanceof PermanentJobError ||
    error instanceof NoHandlerError ||
    error instanceof SubjectNotFoundError
  ) {
    return 'permanent';
  }
  return 'retryable';
}
