import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@pipeline/shared';
import { IdempotencyKeyConflictError } from './errors';
import { JOB_STORE } from './job.store';
import type { JobStore } from './job.store';
import { JobPriority } from './job.types';
import type {
  DeadLetterJob,
  EnqueueRequest,
  Job,
  JobDetails,
  JobStatus,
  JobStatusView,
  NewJob,
  QueueStats,
} from './job.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function newJobId(): string {
  return `job_${uuidv4().replace(/-/g, '')}`;
}

function buildJob(request: EnqueueRequest, now: Date): NewJob {
  const details: JobDetails = {
    ...request.details,
    priority: request.priority ?? JobPriority.NORMAL,
    idempotency_key: request.idempotencyKey ?? null,
    retry_count: 0,
    retry_after: null,
    enqueued_at: now.toISOString(),
  };

  return {
    id: newJobId(),
    subject_id: request.subjectId,
    operation_type: request.operationType,
    details,
    created_at: now,
  };
}

/**
 * Enqueue, cancel, retry and inspect jobs. Status changes made here are
 * conditional transitions on the store: a job the worker already claimed
 * cannot be cancelled.
 */
@Injectable()
export class JobQueue {
  constructor(@Inject(JOB_STORE) private readonly store: JobStore) {}

  async enqueue(request: EnqueueRequest): Promise<string> {
    const { job, created } = await this.store.create(
      buildJob(request, new Date()),
      request.dependsOn ?? [],
    );
    this.logEnqueued(job, created);
    return job.id;
  }

  /**
   * All jobs are created in one transaction. A key repeated inside the batch
   * resolves to the job created for its first occurrence.
   */
  async enqueueBatch(requests: readonly EnqueueRequest[]): Promise<string[]> {
    if (requests.length === 0) {
      return [];
    }

    return this.store.transaction(async (store) => {
      const ids: string[] = [];
      for (const request of requests) {
        const { job, created } = await store.create(
          buildJob(request, new Date()),
          request.dependsOn ?? [],
        );
        this.logEnqueued(job, created);
        ids.push(job.id);
      }
      return ids;
    });
  }

  async cancel(jobId: string): Promise<boolean> {
    const job = await this.store.transition(jobId, {
      from: ['PENDING'],
      to: 'CANCELLED',
      completedAt: new Date(),
    });

    if (!job) {
      return false;
    }
    logger.info({ service: 'queue', job_id: jobId }, 'job cancelled');
    return true;
  }

  /**
   * Moves a FAILED or DEAD_LETTER job back to PENDING. Returns false when the
   * job is missing, in another status, or its idempotency key has since been
   * taken by another live job.
   */
  async retryFailed(jobId: string, resetRetryCount = false): Promise<boolean> {
    try {
      return await this.requeue(jobId, resetRetryCount);
    } catch (error) {
      if (error instanceof IdempotencyKeyConflictError) {
        logger.warn(
          { service: 'queue', job_id: jobId },
          'idempotency key taken while requeueing',
        );
        return false;
      }
      throw error;
    }
  }

  private async requeue(
    jobId: string,
    resetRetryCount: boolean,
  ): Promise<boolean> {
    return this.store.transaction(async (store) => {
      const job = await store.get(jobId);
      if (!job || (job.status !== 'FAILED' && job.status !== 'DEAD_LETTER')) {
        return false;
      }

      const key = job.details.idempotency_key;
      if (key) {
        const holder = await store.findLiveByIdempotencyKey(key);
        if (holder && holder.id !== jobId) {
          logger.warn(
            { service: 'queue', job_id: jobId, held_by: holder.id },
            'idempotency key held by another job',
          );
          return false;
        }
      }

      const details: Partial<JobDetails> = { retry_after: null };
      if (resetRetryCount) {
        details.retry_count = 0;
      }

      const updated = await store.transition(jobId, {
        from: ['FAILED', 'DEAD_LETTER'],
        to: 'PENDING',
        error: null,
        completedAt: null,
        details,
      });
      if (!updated) {
        return false;
      }

      logger.info(
        {
          service: 'queue',
          job_id: jobId,
          previous_status: job.status,
          reset_retry_count: resetRetryCount,
        },
        'job requeued',
      );
      return true;
    });
  }

  async getJobStatus(jobId: string): Promise<JobStatusView | null> {
    const job = await this.store.get(jobId);
    if (!job) {
      return null;
    }

    return {
      id: job.id,
      subject_id: job.subject_id,
      operation_type: job.operation_type,
      status: job.status,
      error: job.error,
      details: job.details,
      depends_on: await this.store.getDependencies(jobId),
      created_at: job.created_at.toISOString(),
      completed_at: job.completed_at ? job.completed_at.toISOString() : null,
    };
  }

  async getPendingCount(operationType?: string): Promise<number> {
    const counts = await this.store.countByStatusAndType();
    return counts
      .filter(
        (row) =>
          row.status === 'PENDING' &&
          (operationType === undefined || row.operation_type === operationType),
      )
      .reduce((sum, row) => sum + row.count, 0);
  }

  async getDeadLetterJobs(
    operationType?: string,
    limit = 100,
  ): Promise<DeadLetterJob[]> {
    const jobs = await this.store.find({
      status: 'DEAD_LETTER',
      operationType,
      limit,
    });

    return jobs.map((job) => ({
      id: job.id,
      subject_id: job.subject_id,
      operation_type: job.operation_type,
      error: job.error,
      details: job.details,
      completed_at: job.completed_at ? job.completed_at.toISOString() : null,
    }));
  }

  async getQueueStats(): Promise<QueueStats> {
    const counts = await this.store.countByStatusAndType();
    const byStatus: Partial<Record<JobStatus, number>> = {};
    const byType: Record<string, number> = {};
    let total = 0;

    for (const row of counts) {
      total += row.count;
      byStatus[row.status] = (byStatus[row.status] ?? 0) + row.count;
      byType[row.operation_type] = (byType[row.operation_type] ?? 0) + row.count;
    }

    return { total, by_status: byStatus, by_type: byType };
  }

  async clearCompleted(olderThanDays = 30): Promise<number> {
    const cutoff = new Date(Date.now() - olderThanDays * DAY_MS);
    const removed = await this.store.deleteCompletedBefore(cutoff);
    logger.info(
      { service: 'queue', removed, cutoff: cutoff.toISOString() },
      'completed jobs cleared',
    );
    return removed;
  }

  private logEnqueued(job: Job, created: boolean): void {
    if (created) {
      logger.info(
        {
          service: 'queue',
          job_id: job.id,
          operation_type: job.operation_type,
          subject_id: job.subject_id,
        },
        'job enqueued',
      );
    } else {
      logger.info(
        {
          service: 'queue',
          job_id: job.id,
          idempotency_key: job.details.idempotency_key,
        },
        'duplicate enqueue',
      );
    }
  }
}
