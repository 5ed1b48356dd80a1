import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { InMemoryJobStore, JobQueue } from '@pipeline/jobs';
import { JobsService } from './jobs.service';

const MISSING_JOB_ID = `job_${'0'.repeat(32)}`;

describe('JobsService', () => {
  let store: InMemoryJobStore;
  let service: JobsService;

  beforeEach(() => {
    store = new InMemoryJobStore();
    service = new JobsService(new JobQueue(store));
  });

  describe('enqueue', () => {
    it('returns the id of the new job', async () => {
      const { job_id } = await service.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      expect(job_id).toMatch(/^job_[0-9a-f]{32}$/);
      expect((await store.get(job_id))?.status).toBe('PENDING');
    });

    it('rejects a dependency on an unknown job with 400', async () => {
      await expect(
        service.enqueue({
          subjectId: 'doc1',
          operationType: 'EXTRACT',
          dependsOn: [MISSING_JOB_ID],
        }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('enqueueBatch', () => {
    it('returns ids in request order, reusing the id for a repeated key', async () => {
      const { job_ids } = await service.enqueueBatch([
        { subjectId: 'doc1', operationType: 'EXTRACT', idempotencyKey: 'k1' },
        { subjectId: 'doc2', operationType: 'EXTRACT' },
        { subjectId: 'doc1', operationType: 'EXTRACT', idempotencyKey: 'k1' },
      ]);

      expect(job_ids).toHaveLength(3);
      expect(job_ids[2]).toBe(job_ids[0]);
      expect(job_ids[1]).not.toBe(job_ids[0]);
    });
  });

  describe('getJob', () => {
    it('returns the status view with dependencies', async () => {
      const { job_id: parent } = await service.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      const { job_id: child } = await service.enqueue({
        subjectId: 'doc1',
        operationType: 'CLASSIFY',
        dependsOn: [parent],
      });

      const view = await service.getJob(child);

      expect(view).toMatchObject({
        id: child,
        subject_id: 'doc1',
        operation_type: 'CLASSIFY',
        status: 'PENDING',
        error: null,
        depends_on: [parent],
        completed_at: null,
      });
    });

    it('throws NotFoundException for an unknown id', async () => {
      await expect(service.getJob(MISSING_JOB_ID)).rejects.toThrow(
        new NotFoundException(`Job with id ${MISSING_JOB_ID} not found`),
      );
    });
  });

  describe('cancel', () => {
    it('cancels a pending job', async () => {
      const { job_id } = await service.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });

      await expect(service.cancel(job_id)).resolves.toEqual({
        ok: true,
        id: job_id,
        status: 'CANCELLED',
      });
      expect((await store.get(job_id))?.status).toBe('CANCELLED');
    });

    it('throws ConflictException for a job already claimed', async () => {
      const { job_id } = await service.enqueue({
        subjectId: 'doc1',
        operationType: 'EXTRACT',
      });
      await store.claim(job_id);

      await expect(service.cancel(job_id)).rejects.toBeInstanceOf(
        ConflictException,
      );
      expect((await store.get(job_id))?.status).toBe('PROCESSING');
    });

    it('throws NotFoundException for an unknown id', async () => {
      await expect(service.cancel(MISSING_JOB_ID)).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });
  });
});
