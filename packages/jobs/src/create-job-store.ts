import type { Provider } from '@nestjs/common';
import { JOB_STORE } from './job.store';
import type { JobStore } from './job.store';
import { InMemoryJobStore } from './memory/memory-job.store';
import { PgJobStore } from './pg/pg-job.store';
import { createPool } from './pg/db';
import { UnknownStoreKindError } from './errors';

export function createJobStore(env: NodeJS.ProcessEnv = process.env): JobStore {
  const kind = env.JOB_STORE ?? 'postgres';
  switch (kind) {
    case 'postgres':
      return new PgJobStore(createPool(env));
    case 'memory':
      return new InMemoryJobStore();
    default:
      throw new UnknownStoreKindError(kind);
  }
}

export const jobStoreProvider: Provider = {
  provide: JOB_STORE,
  useFactory: (): JobStore => createJobStore(),
};
