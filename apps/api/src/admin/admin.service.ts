import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { JobQueue } from '@pipeline/jobs';
import { logger } from '@pipeline/shared';

@Injectable()
export class AdminService {
  constructor(private readonly jobQueue: JobQueue) {}

  async getDeadLetterJobs(filters: { operationType?: string; limit: number }) {
    const items = await this.jobQueue.getDeadLetterJobs(
      filters.operationType,
      filters.limit,
    );
    return { items, limit: filters.limit };
  }

  async retryJob(jobId: string, resetRetryCount: boolean) {
    const requeued = await this.jobQueue.retryFailed(jobId, resetRetryCount);
    if (requeued) {
      logger.info(
        {
          service: 'api',
          job_id: jobId,
          action: 'manual_retry',
          reset_retry_count: resetRetryCount,
        },
        'manual retry',
      );
      return { ok: true, id: jobId, status: 'PENDING' };
    }

    const job = await this.jobQueue.getJobStatus(jobId);
    if (!job) {
      throw new NotFoundException(`Job with id ${jobId} not found`);
    }
    if (job.status === 'FAILED' || job.status === 'DEAD_LETTER') {
      throw new ConflictException(
        `Job with id ${jobId} cannot be retried: its idempotency key is held by another live job.`,
      );
    }
    throw new ConflictException(
      `Job with id ${jobId} is not FAILED or DEAD_LETTER (current status: ${job.status}). Only failed jobs can be retried.`,
    );
  }

  async getStats() {
    return this.jobQueue.getQueueStats();
  }

  async cleanup(olderThanDays: number) {
    const removed = await this.jobQueue.clearCompleted(olderThanDays);
    return { removed, older_than_days: olderThanDays };
  }
}
