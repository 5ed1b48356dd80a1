import { PutObjectCommand } from '@aws-sdk/client-s3';
import type {
  S3Client,
  ServerSideEncryption,
  StorageClass,
} from '@aws-sdk/client-s3';
import { logger } from '@pipeline/shared';
import { errorMessage } from '../errors';
import { Semaphore } from '../concurrency/semaphore';
import { BaseConnector } from './base.connector';
import type { ConnectorOptions } from './base.connector';
import type { DeliveryTracker } from './delivery-tracker';
import { deliveryResult } from './delivery.types';
import type { DeliveryItem, DeliveryResult } from './delivery.types';

export type S3ConnectorConfig = {
  bucket: string;
  keyPrefix?: string;
  serverSideEncryption?: ServerSideEncryption;
  kmsKeyId?: string;
  storageClass?: StorageClass;
  tags?: Record<string, string>;
  maxConcurrentUploads?: number;
};

const DEFAULT_KEY_PREFIX = 'exports/';
const MAX_METADATA_VALUE_LENGTH = 1024;

/** `<prefix>yyyy/mm/dd/<subject>.json`, UTC date. */
export function objectKey(prefix: string, subjectId: string, at: Date): string {
  const yyyy = at.getUTCFullYear();
  const mm = String(at.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(at.getUTCDate()).padStart(2, '0');
  return `${prefix}${yyyy}/${mm}/${dd}/${subjectId}.json`;
}

function objectMetadata(
  subjectId: string,
  metadata: Record<string, unknown>,
): Record<string, string> {
  const out: Record<string, string> = { 'subject-id': subjectId };
  for (const [key, value] of Object.entries(metadata)) {
    const text =
      typeof value === 'string' ? value : (JSON.stringify(value) ?? '');
    out[key.replace(/_/g, '-')] = text.slice(0, MAX_METADATA_VALUE_LENGTH);
  }
  return out;
}

export class S3Connector extends BaseConnector {
  readonly connectorType = 'S3';

  constructor(
    private readonly config: S3ConnectorConfig,
    private readonly client: S3Client,
    deps: {
      tracker?: DeliveryTracker | null;
      options?: Partial<ConnectorOptions>;
    } = {},
  ) {
    super(deps.options, deps.tracker ?? null);
  }

  async deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata: Record<string, unknown> = {},
  ): Promise<DeliveryResult> {
    const started = Date.now();
    const now = new Date();
    const key = objectKey(
      this.config.keyPrefix ?? DEFAULT_KEY_PREFIX,
      subjectId,
      now,
    );
    const sse = this.config.serverSideEncryption;

    try {
      const output = await this.client.send(
        new PutObjectCommand({
          Bucket: this.config.bucket,
          Key: key,
          Body: JSON.stringify(
            {
              subject_id: subjectId,
              data,
              metadata,
              uploaded_at: now.toISOString(),
            },
            null,
            2,
          ),
          ContentType: 'application/json',
          StorageClass: this.config.storageClass,
          ServerSideEncryption: sse,
          SSEKMSKeyId: sse === 'aws:kms' ? this.config.kmsKeyId : undefined,
          Metadata: objectMetadata(subjectId, metadata),
          Tagging: this.config.tags
            ? new URLSearchParams(this.config.tags).toString()
            : undefined,
        }),
      );

      return deliveryResult({
        success: true,
        response_data: {
          bucket: this.config.bucket,
          s3_key: key,
          etag: output.ETag ? output.ETag.replace(/"/g, '') : null,
          version_id: output.VersionId ?? null,
        },
        response_code: output.$metadata.httpStatusCode ?? null,
        delivered_at: new Date().toISOString(),
        duration_ms: Date.now() - started,
      });
    } catch (error) {
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
          key,
          error,
        },
        's3 upload failed',
      );
      return deliveryResult({
        success: false,
        error: errorMessage(error),
        duration_ms: Date.now() - started,
      });
    }
  }

  /** Uploads concurrently, bounded by `maxConcurrentUploads` (default 10). */
  async deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    const semaphore = new Semaphore(this.config.maxConcurrentUploads ?? 10);
    return Promise.all(
      items.map((item) =>
        semaphore.run(() =>
          this.deliver(item.subjectId, item.data, item.metadata),
        ),
      ),
    );
  }
}
