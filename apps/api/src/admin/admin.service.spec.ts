import { ConflictException, NotFoundException } from '@nestjs/common';
import { JobQueue } from '@pipeline/jobs';
import type { JobStatusView } from '@pipeline/jobs';
import { AdminService } from './admin.service';

function statusView(overrides: Partial<JobStatusView>): JobStatusView {
  return {
    id: 'job_1',
    subject_id: 'doc1',
    operation_type: 'EXTRACT',
    status: 'DEAD_LETTER',
    error: 'Max retries exceeded. Last error: boom',
    details: { retry_count: 3 },
    depends_on: [],
    created_at: '2024-01-01T12:00:00.000Z',
    completed_at: '2024-01-01T12:05:00.000Z',
    ...overrides,
  };
}

describe('AdminService', () => {
  let service: AdminService;
  let jobQueue: {
    getDeadLetterJobs: jest.Mock;
    retryFailed: jest.Mock;
    getJobStatus: jest.Mock;
    getQueueStats: jest.Mock;
    clearCompleted: jest.Mock;
  };

  beforeEach(() => {
    jobQueue = {
      getDeadLetterJobs: jest.fn(),
      retryFailed: jest.fn(),
      getJobStatus: jest.fn(),
      getQueueStats: jest.fn(),
      clearCompleted: jest.fn(),
    };

    service = new AdminService(jobQueue as unknown as JobQueue);
  });

  describe('getDeadLetterJobs', () => {
    it('passes the filters through and echoes the limit', async () => {
      const items = [{ id: 'job_1' }];
      jobQueue.getDeadLetterJobs.mockResolvedValue(items);

      const result = await service.getDeadLetterJobs({
        operationType: 'EXTRACT',
        limit: 25,
      });

      expect(jobQueue.getDeadLetterJobs).toHaveBeenCalledWith('EXTRACT', 25);
      expect(result).toEqual({ items, limit: 25 });
    });
  });

  describe('retryJob', () => {
    const jobId = 'job_1';

    it('requeues a dead-lettered job', async () => {
      jobQueue.retryFailed.mockResolvedValue(true);

      const result = await service.retryJob(jobId, true);

      expect(jobQueue.retryFailed).toHaveBeenCalledWith(jobId, true);
      expect(jobQueue.getJobStatus).not.toHaveBeenCalled();
      expect(result).toEqual({ ok: true, id: jobId, status: 'PENDING' });
    });

    it('throws NotFoundException when the job does not exist', async () => {
      jobQueue.retryFailed.mockResolvedValue(false);
      jobQueue.getJobStatus.mockResolvedValue(null);

      await expect(service.retryJob(jobId, false)).rejects.toThrow(
        new NotFoundException(`Job with id ${jobId} not found`),
      );
    });

    it('throws ConflictException when the job is not failed', async () => {
      jobQueue.retryFailed.mockResolvedValue(false);
      jobQueue.getJobStatus.mockResolvedValue(
        statusView({ status: 'PROCESSING', error: null, completed_at: null }),
      );

      await expect(service.retryJob(jobId, false)).rejects.toThrow(
        new ConflictException(
          `Job with id ${jobId} is not FAILED or DEAD_LETTER (current status: PROCESSING). Only failed jobs can be retried.`,
        ),
      );
    });

    it('throws ConflictException when another job holds the idempotency key', async () => {
      jobQueue.retryFailed.mockResolvedValue(false);
      jobQueue.getJobStatus.mockResolvedValue(statusView({}));

      await expect(service.retryJob(jobId, false)).rejects.toThrow(
        new ConflictException(
          `Job with id ${jobId} cannot be retried: its idempotency key is held by another live job.`,
        ),
      );
    });
  });

  describe('getStats', () => {
    it('returns the queue stats', async () => {
      const stats = {
        total: 3,
        by_status: { PENDING: 2, COMPLETED: 1 },
        by_type: { EXTRACT: 3 },
      };
      jobQueue.getQueueStats.mockResolvedValue(stats);

      await expect(service.getStats()).resolves.toEqual(stats);
    });
  });

  describe('cleanup', () => {
    it('reports how many jobs were removed', async () => {
      jobQueue.clearCompleted.mockResolvedValue(4);

      await expect(service.cleanup(7)).resolves.toEqual({
        removed: 4,
        older_than_days: 7,
      });
      expect(jobQueue.clearCompleted).toHaveBeenCalledWith(7);
    });
  });
});
