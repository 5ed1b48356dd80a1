import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { JOB_STORE } from '@pipeline/jobs';
import type { JobStore } from '@pipeline/jobs';
import { logger, onShutdown } from '@pipeline/shared';
import { AppModule } from './app.module';
import { loadApiConfig } from './config';

async function bootstrap() {
  const { port } = loadApiConfig();
  const app = await NestFactory.create(AppModule, { logger: false });
  const store = app.get<JobStore>(JOB_STORE);

  await app.listen(port);
  logger.info({ service: 'api', port }, 'api listening');

  onShutdown(async (signal) => {
    logger.info({ service: 'api', signal }, 'api stopping');
    await app.close();
    await store.close();
    logger.info({ service: 'api' }, 'api stopped');
  });
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ service: 'api', error }, 'api failed to start');
  process.exit(1);
});
