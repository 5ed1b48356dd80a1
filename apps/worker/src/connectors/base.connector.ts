import { logger, sleep } from '@pipeline/shared';
import { errorMessage } from '../errors';
import type { DeliveryTracker } from './delivery-tracker';
import { SKIPPED_ALREADY_DELIVERED, deliveryResult } from './delivery.types';
import type { Connector, DeliveryItem, DeliveryResult } from './delivery.types';

export type ConnectorOptions = {
  maxRetries: number;
  retryDelayMs: number;
  enableDeduplication: boolean;
};

export const DEFAULT_CONNECTOR_OPTIONS: ConnectorOptions = {
  maxRetries: 3,
  retryDelayMs: 5000,
  enableDeduplication: true,
};

/**
 * Shared delivery envelope: dedup against recorded deliveries, retries with
 * exponential backoff, and recording of the final outcome. Subclasses only
 * implement `deliver`.
 */
export abstract class BaseConnector implements Connector {
  abstract readonly connectorType: string;
  protected readonly options: ConnectorOptions;

  constructor(
    options: Partial<ConnectorOptions> = {},
    protected readonly tracker: DeliveryTracker | null = null,
  ) {
    this.options = { ...DEFAULT_CONNECTOR_OPTIONS, ...options };
  }

  abstract deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata?: Record<string, unknown>,
  ): Promise<DeliveryResult>;

  async deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    const results: DeliveryResult[] = [];
    for (const item of items) {
      results.push(await this.deliver(item.subjectId, item.data, item.metadata));
    }
    return results;
  }

  async shouldDeliver(subjectId: string): Promise<boolean> {
    if (!this.options.enableDeduplication || !this.tracker) {
      return true;
    }
    return !(await this.tracker.checkDelivered(subjectId, this.connectorType));
  }

  async deliverWithRetry(
    subjectId: string,
    data: Record<string, unknown>,
    metadata: Record<string, unknown> = {},
  ): Promise<DeliveryResult> {
    if (!(await this.shouldDeliver(subjectId))) {
      logger.info(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
        },
        'already delivered, skipping',
      );
      return deliveryResult({
        success: true,
        response_data: { ...SKIPPED_ALREADY_DELIVERED },
      });
    }

    const { maxRetries, retryDelayMs } = this.options;
    let last: DeliveryResult | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const result = await this.deliver(subjectId, data, metadata);
        last = { ...result, retry_count: attempt };
      } catch (error) {
        last = deliveryResult({
          success: false,
          error: errorMessage(error),
          retry_count: attempt,
        });
      }

      if (last.success) {
        break;
      }

      logger.warn(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
          attempt,
          error: last.error,
        },
        'delivery attempt failed',
      );
      if (attempt < maxRetries) {
        await sleep(retryDelayMs * 2 ** attempt);
      }
    }

    const final =
      last ?? deliveryResult({ success: false, error: 'Max retries exceeded' });
    await this.record(subjectId, final);
    return final;
  }

  private async record(subjectId: string, result: DeliveryResult): Promise<void> {
    if (!this.tracker) {
      return;
    }
    try {
      await this.tracker.recordDelivery(subjectId, this.connectorType, result);
    } catch (error) {
      // the delivery itself already happened; only the receipt is lost
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
          delivery_id: result.delivery_id,
          error,
        },
        'failed to record delivery',
      );
    }
  }
}
