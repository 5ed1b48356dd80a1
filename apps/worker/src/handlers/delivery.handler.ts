import type { Job } from '@pipeline/jobs';
import { DeliveryFailedError, PermanentJobError } from '../errors';
import type { BaseConnector } from '../connectors/base.connector';
import type { DeliveryResult } from '../connectors/delivery.types';
import type { RateLimiter } from '../rate-limit/rate-limiter';
import type { HandlerContext, JobHandler, Subject } from './handler.registry';

export const DELIVER_WEBHOOK = 'DELIVER_WEBHOOK';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Delivers `details.payload` for the job's subject through a connector, after
 * the rate limiter admits the job's tenant (`details.tenant_id`). A failed
 * delivery throws so the worker schedules a retry.
 */
export class DeliveryHandler implements JobHandler<DeliveryResult> {
  constructor(
    private readonly connector: BaseConnector,
    private readonly rateLimiter: RateLimiter,
  ) {}

  async execute(
    job: Job,
    subject: Subject,
    { signal }: HandlerContext,
  ): Promise<DeliveryResult> {
    const payload = job.details.payload;
    if (!isRecord(payload)) {
      throw new PermanentJobError(`Job ${job.id} has no payload to deliver`);
    }
    const tenantId =
      typeof job.details.tenant_id === 'string'
        ? job.details.tenant_id
        : undefined;
    const metadata = isRecord(job.details.metadata) ? job.details.metadata : {};

    await this.rateLimiter.acquire(tenantId);
    signal.throwIfAborted();

    const result = await this.connector.deliverWithRetry(subject.id, payload, {
      ...metadata,
      job_id: job.id,
    });
    if (!result.success) {
      throw new DeliveryFailedError(
        subject.id,
        this.connector.connectorType,
        result.error ?? 'unknown error',
      );
    }
    return result;
  }
}
