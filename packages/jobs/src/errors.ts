export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class UnknownDependencyError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly dependsOn: string,
  ) {
    super(`Job ${jobId} depends on unknown job ${dependsOn}`);
    this.name = 'UnknownDependencyError';
  }
}

export class JobInsertFailedError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job insert did not return a row for ${jobId}`);
    this.name = 'JobInsertFailedError';
  }
}

export class UnknownStoreKindError extends Error {
  constructor(public readonly kind: string) {
    super(`Unknown job store kind: ${kind}`);
    this.name = 'UnknownStoreKindError';
  }
}

export class IdempotencyKeyConflictError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} conflicts with a live job holding its idempotency key`);
    this.name = 'IdempotencyKeyConflictError';
  }
}
