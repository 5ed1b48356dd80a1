import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { JobQueue, UnknownDependencyError } from '@pipeline/jobs';
import type { EnqueueRequest, JobStatusView } from '@pipeline/jobs';

@Injectable()
export class JobsService {
  constructor(private readonly jobQueue: JobQueue) {}

  async enqueue(request: EnqueueRequest) {
    const jobId = await this.rejectUnknownDependency(() =>
      this.jobQueue.enqueue(request),
    );
    return { job_id: jobId };
  }

  async enqueueBatch(requests: readonly EnqueueRequest[]) {
    const jobIds = await this.rejectUnknownDependency(() =>
      this.jobQueue.enqueueBatch(requests),
    );
    return { job_ids: jobIds };
  }

  async getJob(jobId: string): Promise<JobStatusView> {
    const job = await this.jobQueue.getJobStatus(jobId);
    if (!job) {
      throw new NotFoundException(`Job with id ${jobId} not found`);
    }
    return job;
  }

  async cancel(jobId: string) {
    if (await this.jobQueue.cancel(jobId)) {
      return { ok: true, id: jobId, status: 'CANCELLED' };
    }

    const job = await this.getJob(jobId);
    throw new ConflictException(
      `Job with id ${jobId} is not PENDING (current status: ${job.status}). Only pending jobs can be cancelled.`,
    );
  }

  private async rejectUnknownDependency<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof UnknownDependencyError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
