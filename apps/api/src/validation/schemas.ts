import { z } from 'zod';
import { JobPriority } from '@pipeline/jobs';
import type { EnqueueRequest } from '@pipeline/jobs';

const nonEmpty = (field: string) =>
  z.string().trim().min(1, `${field} must be a non-empty string`);

export const limitSchema = z.preprocess(
  (val) => (val === undefined || val === null ? 100 : val),
  z.coerce
    .number()
    .int()
    .min(1, 'limit must be at least 1')
    .max(1000, 'limit must be at most 1000'),
);

export const jobIdSchema = z
  .string()
  .regex(/^job_[0-9a-f]{32}$/, 'id must be a job id (job_<32 hex>)');

export const enqueueJobBodySchema = z
  .object({
    subject_id: nonEmpty('subject_id'),
    operation_type: nonEmpty('operation_type'),
    priority: z
      .number()
      .int()
      .min(JobPriority.LOW, 'priority must be between 0 and 3')
      .max(JobPriority.URGENT, 'priority must be between 0 and 3')
      .default(JobPriority.NORMAL),
    depends_on: z.array(jobIdSchema).default([]),
    details: z.record(z.unknown()).default({}),
    idempotency_key: nonEmpty('idempotency_key').optional(),
  })
  .transform(
    (body): EnqueueRequest => ({
      subjectId: body.subject_id,
      operationType: body.operation_type,
      priority: body.priority,
      dependsOn: body.depends_on,
      details: body.details,
      idempotencyKey: body.idempotency_key ?? null,
    }),
  );

export const enqueueBatchBodySchema = z.object({
  jobs: z
    .array(enqueueJobBodySchema)
    .min(1, 'jobs must not be empty')
    .max(1000, 'jobs must hold at most 1000 entries'),
});

export const deadLetterQuerySchema = z.object({
  operation_type: nonEmpty('operation_type').optional(),
  limit: limitSchema,
});

export const retryJobBodySchema = z.preprocess(
  (val) => val ?? {},
  z.object({
    reset_retry_count: z.boolean().default(false),
  }),
);

export const cleanupBodySchema = z.preprocess(
  (val) => val ?? {},
  z.object({
    older_than_days: z.coerce
      .number()
      .int()
      .min(1, 'older_than_days must be at least 1')
      .default(30),
  }),
);
