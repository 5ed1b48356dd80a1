import { v4 as uuidv4 } from 'uuid';
import type { JobDetails, JobStatus } from '@pipeline/jobs';

export const DELIVERY_STATUSES = [
  'PENDING',
  'DELIVERED',
  'FAILED',
  'RETRYING',
] as const;

export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];

export type DeliveryResult = {
  success: boolean;
  delivery_id: string;
  status: DeliveryStatus;
  response_data: Record<string, unknown> | null;
  response_code: number | null;
  /** ISO-8601 */
  delivered_at: string | null;
  duration_ms: number | null;
  error: string | null;
  retry_count: number;
};

export type DeliveryItem = {
  subjectId: string;
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
};

export type DeliveryHistoryEntry = {
  operation_id: string;
  connector_type: string;
  status: JobStatus;
  details: JobDetails;
  error: string | null;
  created_at: string;
};

export interface Connector {
  readonly connectorType: string;
  deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata?: Record<string, unknown>,
  ): Promise<DeliveryResult>;
  deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]>;
}

export const DELIVERY_OPERATION_PREFIX = 'DELIVERY_';

export function deliveryOperationType(connectorType: string): string {
  return `${DELIVERY_OPERATION_PREFIX}${connectorType.toUpperCase()}`;
}

export function newDeliveryId(): string {
  return `dlv_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

export function deliveryResult(
  fields: Partial<DeliveryResult> & Pick<DeliveryResult, 'success'>,
): DeliveryResult {
  return {
    delivery_id: newDeliveryId(),
    status: fields.success ? 'DELIVERED' : 'FAILED',
    response_data: null,
    response_code: null,
    delivered_at: null,
    duration_ms: null,
    error: null,
    retry_count: 0,
    ...fields,
  };
}

export const SKIPPED_ALREADY_DELIVERED = { skipped: 'already_delivered' };
