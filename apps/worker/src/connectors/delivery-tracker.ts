import { newJobId } from '@pipeline/jobs';
import type { JobStore } from '@pipeline/jobs';
import {
  DELIVERY_OPERATION_PREFIX,
  deliveryOperationType,
} from './delivery.types';
import type { DeliveryHistoryEntry, DeliveryResult } from './delivery.types';

const HISTORY_LIMIT = 1000;

/**
 * Records delivery outcomes as derived jobs (`DELIVERY_<CONNECTOR>`, COMPLETED
 * or FAILED) so later deliveries of the same subject can be skipped.
 */
export class DeliveryTracker {
  constructor(private readonly store: JobStore) {}

  async recordDelivery(
    subjectId: string,
    connectorType: string,
    result: DeliveryResult,
  ): Promise<string> {
    const now = new Date();
    const { job } = await this.store.create({
      id: newJobId(),
      subject_id: subjectId,
      operation_type: deliveryOperationType(connectorType),
      status: result.success ? 'COMPLETED' : 'FAILED',
      details: { connector_type: connectorType, ...result },
      error: result.error,
      created_at: now,
      completed_at: result.delivered_at ? new Date(result.delivered_at) : now,
    });
    return job.id;
  }

  async checkDelivered(
    subjectId: string,
    connectorType: string,
  ): Promise<boolean> {
    const delivered = await this.store.find({
      subjectId,
      operationType: deliveryOperationType(connectorType),
      status: 'COMPLETED',
      limit: 1,
    });
    return delivered.length > 0;
  }

  /** Newest first, across every connector. */
  async getDeliveryHistory(subjectId: string): Promise<DeliveryHistoryEntry[]> {
    const jobs = await this.store.find({
      subjectId,
      operationTypePrefix: DELIVERY_OPERATION_PREFIX,
      limit: HISTORY_LIMIT,
    });

    return jobs.map((job) => ({
      operation_id: job.id,
      connector_type: job.operation_type.slice(DELIVERY_OPERATION_PREFIX.length),
      status: job.status,
      details: job.details,
      error: job.error,
      created_at: job.created_at.toISOString(),
    }));
  }
}
