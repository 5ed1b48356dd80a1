import { Module } from '@nestjs/common';
import { JOB_STORE, jobStoreProvider } from '@pipeline/jobs';
import type { JobStore } from '@pipeline/jobs';
import {
  RATE_LIMIT_CONFIG,
  WEBHOOK_CONFIG,
  WORKER_CONFIG,
  loadConfig,
  rateLimitConfigSchema,
  webhookConfigSchema,
  workerConfigSchema,
} from './config';
import type { RateLimitConfig, WebhookConfig } from './config';
import { DeliveryTracker } from './connectors/delivery-tracker';
import { WebhookConnector } from './connectors/webhook.connector';
import { DELIVER_WEBHOOK, DeliveryHandler } from './handlers/delivery.handler';
import {
  HandlerRegistry,
  PassThroughSubjectResolver,
  SUBJECT_RESOLVER,
} from './handlers/handler.registry';
import { RateLimiter } from './rate-limit/rate-limiter';
import { WorkerService } from './worker.service';

@Module({
  providers: [
    jobStoreProvider,
    { provide: WORKER_CONFIG, useFactory: () => loadConfig(workerConfigSchema) },
    {
      provide: RATE_LIMIT_CONFIG,
      useFactory: () => loadConfig(rateLimitConfigSchema),
    },
    { provide: WEBHOOK_CONFIG, useFactory: () => loadConfig(webhookConfigSchema) },
    {
      provide: RateLimiter,
      inject: [RATE_LIMIT_CONFIG],
      useFactory: (config: RateLimitConfig) => new RateLimiter(config),
    },
    {
      provide: DeliveryTracker,
      inject: [JOB_STORE],
      useFactory: (store: JobStore) => new DeliveryTracker(store),
    },
    {
      provide: HandlerRegistry,
      inject: [WEBHOOK_CONFIG, RateLimiter, DeliveryTracker],
      useFactory: (
        webhook: WebhookConfig,
        rateLimiter: RateLimiter,
        tracker: DeliveryTracker,
      ) => {
        const registry = new HandlerRegistry();
        if (webhook.url) {
          const connector = new WebhookConnector(
            {
              url: webhook.url,
              hmacSecret: webhook.hmacSecret,
              timeoutMs: webhook.timeoutMs,
            },
            {
              tracker,
              options: {
                maxRetries: webhook.maxRetries,
                retryDelayMs: webhook.retryDelayMs,
              },
            },
          );
          registry.register(
            DELIVER_WEBHOOK,
            new DeliveryHandler(connector, rateLimiter),
          );
        }
        return registry;
      },
    },
    { provide: SUBJECT_RESOLVER, useClass: PassThroughSubjectResolver },
    WorkerService,
  ],
})
export class AppModule {}
