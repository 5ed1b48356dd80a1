import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { JOB_STORE } from '@pipeline/jobs';
import type { JobStore } from '@pipeline/jobs';
import { logger, onShutdown } from '@pipeline/shared';
import { AppModule } from './app.module';
import { WorkerService } from './worker.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });

  const workerService = app.get(WorkerService);
  const store = app.get<JobStore>(JOB_STORE);

  onShutdown(async (signal) => {
    logger.info({ service: 'worker', signal }, 'worker stopping');
    const abandoned = await workerService.stop();
    await app.close();
    await store.close();
    logger.info(
      { service: 'worker', abandoned_jobs: abandoned.length },
      'shutdown complete',
    );
  });
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ service: 'worker', error }, 'worker failed to start');
  process.exit(1);
});
