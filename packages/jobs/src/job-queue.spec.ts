import { JobQueue } from './job-queue';
import { InMemoryJobStore } from './memory/memory-job.store';
import { JobPriority } from './job.types';
import { IdempotencyKeyConflictError, UnknownDependencyError } from './errors';

describe('JobQueue', () => {
  let store: InMemoryJobStore;
  let queue: JobQueue;

  beforeEach(() => {
    store = new InMemoryJobStore();
    queue = new JobQueue(store);
  });

  async function deadLetter(jobId: string): Promise<void> {
    await store.claim(jobId);
    await store.transition(jobId, {
      from: ['PROCESSING'],
      to: 'DEAD_LETTER',
      error: 'Max retries exceeded. Last error: boom',
      completedAt: new Date(),
      details: { retry_count: 3 },
    });
  }

  describe('enqueue', () => {
    it('creates a PENDING job with default details', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      const job = await store.get(jobId);
      expect(jobId).toMatch(/^job_[0-9a-f]{32}$/);
      expect(job?.status).toBe('PENDING');
      expect(job?.subject_id).toBe('doc1');
      expect(job?.details.priority).toBe(JobPriority.NORMAL);
      expect(job?.details.retry_count).toBe(0);
      expect(job?.details.idempotency_key).toBeNull();
      expect(job?.details.retry_after).toBeNull();
    });

    it('keeps caller details but not over the bookkeeping keys', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        priority: JobPriority.URGENT,
        details: { schema: 'invoice', retry_count: 9 },
      });

      const job = await store.get(jobId);
      expect(job?.details.schema).toBe('invoice');
      expect(job?.details.retry_count).toBe(0);
      expect(job?.details.priority).toBe(3);
    });

    it('returns the first job id for a repeated idempotency key', async () => {
      const first = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });
      const second = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });

      expect(second).toBe(first);
      expect((await queue.getQueueStats()).total).toBe(1);
    });

    it('accepts the key again once the holder is cancelled', async () => {
      const first = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });
      await queue.cancel(first);

      const second = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });

      expect(second).not.toBe(first);
      expect((await queue.getQueueStats()).total).toBe(2);
    });

    it('records dependency edges', async () => {
      const parent = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      const child = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'DELIVER_WEBHOOK',
        dependsOn: [parent],
      });

      const status = await queue.getJobStatus(child);
      expect(status?.depends_on).toEqual([parent]);
    });

    it('rejects a dependency on an unknown job', async () => {
      await expect(
        queue.enqueue({
          subjectId: 'doc1',
          operationType: 'EXTRACT',
          dependsOn: ['job_missing'],
        }),
      ).rejects.toBeInstanceOf(UnknownDependencyError);
    });
  });

  describe('enqueueBatch', () => {
    it('resolves a key repeated inside the batch to its first job', async () => {
      const ids = await queue.enqueueBatch([
        { subjectId: 'doc1', operationType: 'EXTRACT', idempotencyKey: 'k1' },
        { subjectId: 'doc2', operationType: 'EXTRACT' },
        { subjectId: 'doc1', operationType: 'EXTRACT', idempotencyKey: 'k1' },
      ]);

      expect(ids).toHaveLength(3);
      expect(ids[2]).toBe(ids[0]);
      expect(ids[1]).not.toBe(ids[0]);
      expect((await queue.getQueueStats()).total).toBe(2);
    });

    it('creates nothing when one entry fails', async () => {
      await expect(
        queue.enqueueBatch([
          { subjectId: 'doc1', operationType: 'EXTRACT', idempotencyKey: 'k1' },
          {
            subjectId: 'doc2',
            operationType: 'EXTRACT',
            dependsOn: ['job_missing'],
          },
        ]),
      ).rejects.toBeInstanceOf(UnknownDependencyError);

      expect((await queue.getQueueStats()).total).toBe(0);
      expect(await store.findLiveByIdempotencyKey('k1')).toBeNull();
    });

    it('returns an empty list for an empty batch', async () => {
      expect(await queue.enqueueBatch([])).toEqual([]);
    });
  });

  describe('cancel', () => {
    it('cancels a PENDING job once', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      expect(await queue.cancel(jobId)).toBe(true);
      expect(await queue.cancel(jobId)).toBe(false);

      const job = await store.get(jobId);
      expect(job?.status).toBe('CANCELLED');
      expect(job?.completed_at).toBeInstanceOf(Date);
    });

    it('does not cancel a job a worker has claimed', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      await store.claim(jobId);

      expect(await queue.cancel(jobId)).toBe(false);
      expect((await store.get(jobId))?.status).toBe('PROCESSING');
    });

    it('returns false for an unknown job', async () => {
      expect(await queue.cancel('job_missing')).toBe(false);
    });
  });

  describe('retryFailed', () => {
    it('moves a dead-lettered job back to PENDING keeping its retry count', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      await deadLetter(jobId);

      expect(await queue.retryFailed(jobId)).toBe(true);

      const job = await store.get(jobId);
      expect(job?.status).toBe('PENDING');
      expect(job?.error).toBeNull();
      expect(job?.completed_at).toBeNull();
      expect(job?.details.retry_count).toBe(3);
      expect(job?.details.retry_after).toBeNull();
    });

    it('resets the retry count when asked', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      await deadLetter(jobId);

      expect(await queue.retryFailed(jobId, true)).toBe(true);
      expect((await store.get(jobId))?.details.retry_count).toBe(0);
    });

    it('refuses jobs that are not FAILED or DEAD_LETTER', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      expect(await queue.retryFailed(jobId)).toBe(false);
      expect(await queue.retryFailed('job_missing')).toBe(false);
    });

    it('refuses when another live job now holds the idempotency key', async () => {
      const first = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });
      await deadLetter(first);
      const second = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });

      expect(second).not.toBe(first);
      expect(await queue.retryFailed(first)).toBe(false);
      expect((await store.get(first))?.status).toBe('DEAD_LETTER');
    });

    it('returns false when the key is taken between check and update', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
        idempotencyKey: 'k1',
      });
      await deadLetter(jobId);
      jest
        .spyOn(store, 'transition')
        .mockRejectedValueOnce(new IdempotencyKeyConflictError(jobId));

      expect(await queue.retryFailed(jobId)).toBe(false);
      expect((await store.get(jobId))?.status).toBe('DEAD_LETTER');
    });

    it('rethrows other store failures', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      await deadLetter(jobId);
      jest
        .spyOn(store, 'transition')
        .mockRejectedValueOnce(new Error('connection reset'));

      await expect(queue.retryFailed(jobId)).rejects.toThrow('connection reset');
    });
  });

  describe('queries', () => {
    it('counts pending jobs, optionally by type', async () => {
      await queue.enqueue({ subjectId: 'doc1', operationType: 'EXTRACT' });
      await queue.enqueue({ subjectId: 'doc2', operationType: 'EXTRACT' });
      const cancelled = await queue.enqueue({
        subjectId: 'doc3',
        operationType: 'EXTRACT',
      });
      await queue.enqueue({ subjectId: 'doc1', operationType: 'CLASSIFY' });
      await queue.cancel(cancelled);

      expect(await queue.getPendingCount()).toBe(3);
      expect(await queue.getPendingCount('EXTRACT')).toBe(2);
      expect(await queue.getPendingCount('MISSING')).toBe(0);
    });

    it('aggregates stats by status and type', async () => {
      await queue.enqueue({ subjectId: 'doc1', operationType: 'EXTRACT' });
      const cancelled = await queue.enqueue({
        subjectId: 'doc2',
        operationType: 'EXTRACT',
      });
      await queue.enqueue({ subjectId: 'doc1', operationType: 'CLASSIFY' });
      await queue.cancel(cancelled);

      expect(await queue.getQueueStats()).toEqual({
        total: 3,
        by_status: { PENDING: 2, CANCELLED: 1 },
        by_type: { EXTRACT: 2, CLASSIFY: 1 },
      });
    });

    it('lists dead-lettered jobs filtered by type', async () => {
      const extract = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      const classify = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'CLASSIFY',
      });
      await deadLetter(extract);
      await deadLetter(classify);

      const jobs = await queue.getDeadLetterJobs('EXTRACT');

      expect(jobs).toHaveLength(1);
      expect(jobs[0].id).toBe(extract);
      expect(jobs[0].error).toBe('Max retries exceeded. Last error: boom');
      expect(typeof jobs[0].completed_at).toBe('string');
      expect(await queue.getDeadLetterJobs(undefined, 1)).toHaveLength(1);
    });

    it('returns null status for an unknown job', async () => {
      expect(await queue.getJobStatus('job_missing')).toBeNull();
    });

    it('renders job status timestamps as ISO strings', async () => {
      const jobId = await queue.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      const status = await queue.getJobStatus(jobId);
      expect(status?.status).toBe('PENDING');
      expect(status?.completed_at).toBeNull();
      expect(status?.created_at).toBe(
        (await store.get(jobId))?.created_at.toISOString(),
      );
    });
  });

  describe('clearCompleted', () => {
    it('deletes COMPLETED jobs older than the cutoff', async () => {
      const day = 24 * 60 * 60 * 1000;
      await store.create({
        id: 'job_old',
        subject_id: 'doc1',
        operation_type: 'EXTRACT',
        status: 'COMPLETED',
        details: {},
        created_at: new Date(Date.now() - 41 * day),
        completed_at: new Date(Date.now() - 40 * day),
      });
      await store.create({
        id: 'job_recent',
        subject_id: 'doc1',
        operation_type: 'EXTRACT',
        status: 'COMPLETED',
        details: {},
        created_at: new Date(Date.now() - 2 * day),
        completed_at: new Date(Date.now() - day),
      });

      expect(await queue.clearCompleted(30)).toBe(1);
      expect(await store.get('job_old')).toBeNull();
      expect(await store.get('job_recent')).not.toBeNull();
    });
  });
});
