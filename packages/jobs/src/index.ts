export * from './job.types';
export * from './job.store';
export * from './errors';
export { JobQueue, newJobId } from './job-queue';
export { InMemoryJobStore } from './memory/memory-job.store';
export { PgJobStore } from './pg/pg-job.store';
export { createPool } from './pg/db';
export { createJobStore, jobStoreProvider } from './create-job-store';
