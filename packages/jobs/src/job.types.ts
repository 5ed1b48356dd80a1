export const JOB_STATUSES = [
  'PENDING',
  'PROCESSING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'DEAD_LETTER',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

/** Statuses whose idempotency key no longer blocks a new enqueue. */
export const RETIRED_STATUSES: readonly JobStatus[] = ['CANCELLED', 'DEAD_LETTER'];

export enum JobPriority {
  LOW = 0,
  NORMAL = 1,
  HIGH = 2,
  URGENT = 3,
}

export type JobDetails = {
  priority?: number;
  idempotency_key?: string | null;
  retry_count?: number;
  last_error?: string;
  retry_after?: string | null;
  enqueued_at?: string;
  claimed_at?: string;
  result?: unknown;
  [key: string]: unknown;
};

export type Job = {
  id: string;
  subject_id: string;
  operation_type: string;
  status: JobStatus;
  details: JobDetails;
  error: string | null;
  created_at: Date;
  completed_at: Date | null;
};

export type JobDependency = {
  job_id: string;
  depends_on: string;
};

/** A row to insert. Derived records (deliveries) may be created already terminal. */
export type NewJob = {
  id: string;
  subject_id: string;
  operation_type: string;
  status?: JobStatus;
  details: JobDetails;
  error?: string | null;
  created_at: Date;
  completed_at?: Date | null;
};

export type EnqueueRequest = {
  subjectId: string;
  operationType: string;
  priority?: JobPriority | number;
  dependsOn?: readonly string[];
  details?: Record<string, unknown>;
  idempotencyKey?: string | null;
};

export type JobStatusView = {
  id: string;
  subject_id: string;
  operation_type: string;
  status: JobStatus;
  error: string | null;
  details: JobDetails;
  depends_on: string[];
  created_at: string;
  completed_at: string | null;
};

export type DeadLetterJob = {
  id: string;
  subject_id: string;
  operation_type: string;
  error: string | null;
  details: JobDetails;
  completed_at: string | null;
};

export type QueueStats = {
  total: number;
  by_status: Partial<Record<JobStatus, number>>;
  by_type: Record<string, number>;
};

export function retryCountOf(job: Pick<Job, 'details'>): number {
  const count = job.details.retry_count;
  return typeof count === 'number' && Number.isInteger(count) && count >= 0
    ? count
    : 0;
}
