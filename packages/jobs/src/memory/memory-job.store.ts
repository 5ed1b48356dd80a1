import { RETIRED_STATUSES } from '../job.types';
import type { Job, NewJob } from '../job.types';
import type {
  CreateJobResult,
  JobFilter,
  JobStore,
  JobTransition,
  ListPendingOptions,
  StatusTypeCount,
} from '../job.store';
import { UnknownDependencyError } from '../errors';

function copy(job: Job): Job {
  return { ...job, details: { ...job.details } };
}

function isDue(job: Job, now: Date): boolean {
  const retryAfter = job.details.retry_after;
  return typeof retryAfter !== 'string' || new Date(retryAfter) <= now;
}

/**
 * Process-local job store. Every check-and-set below runs without an await in
 * between, so on a single event loop claims and transitions are atomic.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly dependencies = new Map<string, string[]>();

  async create(
    data: NewJob,
    dependsOn: readonly string[] = [],
  ): Promise<CreateJobResult> {
    const key = data.details.idempotency_key;
    if (key) {
      const existing = this.liveByKey(key);
      if (existing) {
        return { job: copy(existing), created: false };
      }
    }

    const parents = [...new Set(dependsOn)];
    for (const dependency of parents) {
      if (!this.jobs.has(dependency)) {
        throw new UnknownDependencyError(data.id, dependency);
      }
    }

    const job: Job = {
      id: data.id,
      subject_id: data.subject_id,
      operation_type: data.operation_type,
      status: data.status ?? 'PENDING',
      details: { ...data.details },
      error: data.error ?? null,
      created_at: data.created_at,
      completed_at: data.completed_at ?? null,
    };

    this.jobs.set(job.id, job);
    if (parents.length > 0) {
      this.dependencies.set(job.id, parents);
    }
    return { job: copy(job), created: true };
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? copy(job) : null;
  }

  async findLiveByIdempotencyKey(key: string): Promise<Job | null> {
    const job = this.liveByKey(key);
    return job ? copy(job) : null;
  }

  async getDependencies(id: string): Promise<string[]> {
    return [...(this.dependencies.get(id) ?? [])];
  }

  async listPending(options: ListPendingOptions): Promise<Job[]> {
    if (options.limit <= 0 || options.operationTypes.length === 0) {
      return [];
    }

    return Array.from(this.jobs.values())
      .filter(
        (job) =>
          job.status === 'PENDING' &&
          options.operationTypes.includes(job.operation_type) &&
          isDue(job, options.now) &&
          this.dependenciesMet(job.id),
      )
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
      .slice(0, options.limit)
      .map(copy);
  }

  async claim(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'PENDING') {
      return null;
    }

    job.status = 'PROCESSING';
    job.details = { ...job.details, claimed_at: new Date().toISOString() };
    return copy(job);
  }

  async transition(id: string, change: JobTransition): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job || !change.from.includes(job.status)) {
      return null;
    }

    job.status = change.to;
    if (change.error !== undefined) {
      job.error = change.error;
    }
    if (change.completedAt !== undefined) {
      job.completed_at = change.completedAt;
    }
    if (change.details) {
      job.details = { ...job.details, ...change.details };
    }
    return copy(job);
  }

  async listStale(options: {
    claimedBefore: Date;
    limit: number;
  }): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter((job) => {
        const claimedAt = job.details.claimed_at;
        return (
          job.status === 'PROCESSING' &&
          typeof claimedAt === 'string' &&
          new Date(claimedAt) < options.claimedBefore
        );
      })
      .slice(0, options.limit)
      .map(copy);
  }

  async find(filter: JobFilter): Promise<Job[]> {
    let jobs = Array.from(this.jobs.values());

    if (filter.status) {
      jobs = jobs.filter((job) => job.status === filter.status);
    }
    if (filter.operationType) {
      jobs = jobs.filter((job) => job.operation_type === filter.operationType);
    }
    const prefix = filter.operationTypePrefix;
    if (prefix) {
      jobs = jobs.filter((job) => job.operation_type.startsWith(prefix));
    }
    if (filter.subjectId) {
      jobs = jobs.filter((job) => job.subject_id === filter.subjectId);
    }

    const sortKey = (job: Job): number =>
      filter.status === 'DEAD_LETTER' && job.completed_at
        ? job.completed_at.getTime()
        : job.created_at.getTime();
    jobs.sort((a, b) => sortKey(b) - sortKey(a));

    return jobs.slice(0, filter.limit).map(copy);
  }

  async countByStatusAndType(): Promise<StatusTypeCount[]> {
    const counts = new Map<string, StatusTypeCount>();
    for (const job of this.jobs.values()) {
      const key = `${job.status}\u0000${job.operation_type}`;
      const entry = counts.get(key);
      if (entry) {
        entry.count++;
      } else {
        counts.set(key, {
          status: job.status,
          operation_type: job.operation_type,
          count: 1,
        });
      }
    }
    return Array.from(counts.values());
  }

  async deleteCompletedBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const job of Array.from(this.jobs.values())) {
      if (
        job.status === 'COMPLETED' &&
        job.completed_at !== null &&
        job.completed_at < cutoff
      ) {
        this.remove(job.id);
        removed++;
      }
    }
    return removed;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.jobs.has(id)) {
      return false;
    }
    this.remove(id);
    return true;
  }

  /** Restores every job and edge to its state before `fn` when it throws. */
  async transaction<T>(fn: (store: JobStore) => Promise<T>): Promise<T> {
    const jobs = Array.from(this.jobs.values(), copy);
    const dependencies = Array.from(
      this.dependencies,
      ([id, parents]): [string, string[]] => [id, [...parents]],
    );

    try {
      return await fn(this);
    } catch (error) {
      this.jobs.clear();
      for (const job of jobs) {
        this.jobs.set(job.id, job);
      }
      this.dependencies.clear();
      for (const [id, parents] of dependencies) {
        this.dependencies.set(id, parents);
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.jobs.clear();
    this.dependencies.clear();
  }

  private liveByKey(key: string): Job | undefined {
    for (const job of this.jobs.values()) {
      if (
        job.details.idempotency_key === key &&
        !RETIRED_STATUSES.includes(job.status)
      ) {
        return job;
      }
    }
    return undefined;
  }

  private dependenciesMet(id: string): boolean {
    const dependsOn = this.dependencies.get(id) ?? [];
    return dependsOn.every((dependency) => {
      const parent = this.jobs.get(dependency);
      // a removed parent took its edge with it, as with ON DELETE CASCADE
      return parent === undefined || parent.status === 'COMPLETED';
    });
  }

  private remove(id: string): void {
    this.jobs.delete(id);
    this.dependencies.delete(id);
    for (const [jobId, dependsOn] of this.dependencies) {
      const remaining = dependsOn.filter((dependency) => dependency !== id);
      if (remaining.length === 0) {
        this.dependencies.delete(jobId);
      } else {
        this.dependencies.set(jobId, remaining);
      }
    }
  }
}
