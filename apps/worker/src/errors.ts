export class JobTimeoutError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Job ${jobId} timed out after ${timeoutMs}ms`);
    this.name = 'JobTimeoutError';
  }
}

export class NoHandlerError extends Error {
  constructor(public readonly operationType: string) {
    super(`No handler registered for operation type ${operationType}`);
    this.name = 'NoHandlerError';
  }
}

export class SubjectNotFoundError extends Error {
  constructor(public readonly subjectId: string) {
    super(`Subject ${subjectId} not found`);
    this.name = 'SubjectNotFoundError';
  }
}

/** Thrown by a handler to fail its job without further retries. */
export class PermanentJobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermanentJobError';
  }
}

export class StaleJobError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly claimedAt: string,
  ) {
    super(`Job ${jobId} has been PROCESSING since ${claimedAt}`);
    this.name = 'StaleJobError';
  }
}

export class BatchResultMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`Batch processor returned ${received} results for ${expected} items`);
    this.name = 'BatchResultMismatchError';
  }
}

export class InvalidIdentifierError extends Error {
  constructor(public readonly identifier: string) {
    super(`Invalid SQL identifier: ${identifier}`);
    this.name = 'InvalidIdentifierError';
  }
}

export class DeliveryFailedError extends Error {
  constructor(
    public readonly subjectId: string,
    public readonly connectorType: string,
    reason: string,
  ) {
    super(`Delivery of ${subjectId} via ${connectorType} failed: ${reason}`);
    this.name = 'DeliveryFailedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
