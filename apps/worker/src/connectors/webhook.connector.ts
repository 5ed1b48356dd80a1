import { createHmac } from 'crypto';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '@pipeline/shared';
import { errorMessage } from '../errors';
import { BaseConnector } from './base.connector';
import type { ConnectorOptions } from './base.connector';
import type { DeliveryTracker } from './delivery-tracker';
import { canonicalStringify } from './canonical-json';
import { SKIPPED_ALREADY_DELIVERED, deliveryResult } from './delivery.types';
import type { DeliveryItem, DeliveryResult } from './delivery.types';

export type WebhookAuth =
  | { type: 'bearer'; token: string }
  | { type: 'basic'; username: string; password: string }
  | { type: 'api_key'; key: string; header?: string };

export type WebhookConnectorConfig = {
  url: string;
  /** When set, `deliverBatch` sends every item in one request here. */
  batchUrl?: string;
  method?: 'POST' | 'PUT';
  headers?: Record<string, string>;
  auth?: WebhookAuth;
  hmacSecret?: string;
  hmacHeader?: string;
  timeoutMs?: number;
};

export type WebhookConnectorDeps = {
  tracker?: DeliveryTracker | null;
  options?: Partial<ConnectorOptions>;
  http?: AxiosInstance;
};

const DEFAULT_TIMEOUT_MS = 30_000;

export function signBody(secret: string, body: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

function authHeaders(auth: WebhookAuth | undefined): Record<string, string> {
  switch (auth?.type) {
    case 'bearer':
      return { Authorization: `Bearer ${auth.token}` };
    case 'basic': {
      const encoded = Buffer.from(`${auth.username}:${auth.password}`).toString(
        'base64',
      );
      return { Authorization: `Basic ${encoded}` };
    }
    case 'api_key':
      return { [auth.header ?? 'X-API-Key']: auth.key };
    default:
      return {};
  }
}

function responseData(data: unknown): Record<string, unknown> {
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...data };
  }
  return { text: typeof data === 'string' ? data : JSON.stringify(data) };
}

/**
 * Posts `{ subject_id, data, metadata, timestamp }` as canonical JSON. The
 * signature header, when configured, covers exactly the bytes sent.
 */
export class WebhookConnector extends BaseConnector {
  readonly connectorType = 'WEBHOOK';
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: WebhookConnectorConfig,
    deps: WebhookConnectorDeps = {},
  ) {
    super(deps.options, deps.tracker ?? null);
    this.http =
      deps.http ??
      axios.create({ timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS });
  }

  async deliver(
    subjectId: string,
    data: Record<string, unknown>,
    metadata: Record<string, unknown> = {},
  ): Promise<DeliveryResult> {
    const started = Date.now();
    const payload = {
      subject_id: subjectId,
      data,
      metadata,
      timestamp: new Date().toISOString(),
    };

    try {
      const response = await this.send(this.config.url, payload);
      return this.toResult(response, started);
    } catch (error) {
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          subject_id: subjectId,
          error,
        },
        'webhook request failed',
      );
      return deliveryResult({
        success: false,
        error: errorMessage(error),
        duration_ms: Date.now() - started,
      });
    }
  }

  async deliverBatch(items: readonly DeliveryItem[]): Promise<DeliveryResult[]> {
    const batchUrl = this.config.batchUrl;
    if (!batchUrl) {
      return super.deliverBatch(items);
    }

    const pending: DeliveryItem[] = [];
    const skipped = new Set<DeliveryItem>();
    for (const item of items) {
      if (await this.shouldDeliver(item.subjectId)) {
        pending.push(item);
      } else {
        skipped.add(item);
      }
    }

    const skippedResult = (): DeliveryResult =>
      deliveryResult({
        success: true,
        response_data: { ...SKIPPED_ALREADY_DELIVERED },
      });

    if (pending.length === 0) {
      return items.map(skippedResult);
    }

    const started = Date.now();
    const payload = {
      batch: pending.map((item) => ({
        subject_id: item.subjectId,
        data: item.data,
        metadata: item.metadata ?? {},
      })),
      timestamp: new Date().toISOString(),
    };

    try {
      const response = await this.send(batchUrl, payload);
      return items.map((item) =>
        skipped.has(item) ? skippedResult() : this.toResult(response, started),
      );
    } catch (error) {
      logger.error(
        {
          service: 'connector',
          connector_type: this.connectorType,
          size: pending.length,
          error,
        },
        'batch webhook request failed',
      );
      return items.map(() =>
        deliveryResult({ success: false, error: errorMessage(error) }),
      );
    }
  }

  private async send(url: string, payload: unknown): Promise<AxiosResponse> {
    const body = canonicalStringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.config.headers,
      ...authHeaders(this.config.auth),
    };
    if (this.config.hmacSecret) {
      headers[this.config.hmacHeader ?? 'X-Signature'] = signBody(
        this.config.hmacSecret,
        body,
      );
    }

    return this.http.request({
      method: this.config.method ?? 'POST',
      url,
      data: body,
      headers,
      validateStatus: () => true,
    });
  }

  private toResult(response: AxiosResponse, started: number): DeliveryResult {
    const success = response.status >= 200 && response.status < 300;
    return deliveryResult({
      success,
      response_data: responseData(response.data),
      response_code: response.status,
      delivered_at: success ? new Date().toISOString() : null,
      duration_ms: Date.now() - started,
      error: success ? null : `HTTP ${response.status}`,
    });
  }
}
