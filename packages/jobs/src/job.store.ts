import type { Job, JobDetails, JobStatus, NewJob } from './job.types';

export const JOB_STORE = Symbol('JOB_STORE');

export type CreateJobResult = {
  job: Job;
  /** false when an existing live job already held the idempotency key */
  created: boolean;
};

export type ListPendingOptions = {
  operationTypes: readonly string[];
  limit: number;
  now: Date;
};

export type JobTransition = {
  from: readonly JobStatus[];
  to: JobStatus;
  error?: string | null;
  completedAt?: Date | null;
  /** Shallow-merged into the stored details. */
  details?: Partial<JobDetails>;
};

export type JobFilter = {
  status?: JobStatus;
  operationType?: string;
  /** e.g. `DELIVERY_` for every delivery record */
  operationTypePrefix?: string;
  subjectId?: string;
  limit: number;
};

export type StatusTypeCount = {
  status: JobStatus;
  operation_type: string;
  count: number;
};

/**
 * Persistence contract for jobs and their dependency edges.
 *
 * Every status change goes through `claim` or `transition`, both of which are
 * conditional on the current status and must be atomic in the backing store:
 * two callers racing on the same job can never both succeed.
 */
export interface JobStore {
  create(job: NewJob, dependsOn?: readonly string[]): Promise<CreateJobResult>;
  get(id: string): Promise<Job | null>;
  findLiveByIdempotencyKey(key: string): Promise<Job | null>;
  getDependencies(id: string): Promise<string[]>;

  /**
   * PENDING jobs of the given types that are due (no `retry_after` in the
   * future) and whose dependencies have all COMPLETED, oldest first.
   */
  listPending(options: ListPendingOptions): Promise<Job[]>;

  /** PENDING -> PROCESSING; returns null when someone else got there first. */
  claim(id: string): Promise<Job | null>;
  transition(id: string, change: JobTransition): Promise<Job | null>;
  listStale(options: { claimedBefore: Date; limit: number }): Promise<Job[]>;

  find(filter: JobFilter): Promise<Job[]>;
  countByStatusAndType(): Promise<StatusTypeCount[]>;
  deleteCompletedBefore(cutoff: Date): Promise<number>;
  delete(id: string): Promise<boolean>;

  transaction<T>(fn: (store: JobStore) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
