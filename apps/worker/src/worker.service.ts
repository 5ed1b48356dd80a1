import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { JOB_STORE, retryCountOf } from '@pipeline/jobs';
import type { Job, JobStore } from '@pipeline/jobs';
import { logger } from '@pipeline/shared';
import { WORKER_CONFIG } from './config';
import type { WorkerConfig } from './config';
import { Semaphore } from './concurrency/semaphore';
import { withTimeout } from './concurrency/with-timeout';
import {
  JobTimeoutError,
  NoHandlerError,
  StaleJobError,
  SubjectNotFoundError,
  errorMessage,
} from './errors';
import { HandlerRegistry, SUBJECT_RESOLVER } from './handlers/handler.registry';
import type { SubjectResolver } from './handlers/handler.registry';
import { classifyFailure } from './retry/failure-classifier';
import { computeRetryDelay, shouldRetry } from './retry/retry.policy';

export type WorkerStats = {
  running: boolean;
  active_jobs: string[];
  processed: number;
  succeeded: number;
  retried: number;
  failed: number;
  dead_lettered: number;
  recovered: number;
};

@Injectable()
export class WorkerService implements OnModuleInit {
  private isRunning = false;
  private isIdle = false;
  private isErrorIdle = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private readonly active = new Map<string, Promise<void>>();
  private readonly semaphore: Semaphore;
  private readonly counters = {
    processed: 0,
    succeeded: 0,
    retried: 0,
    failed: 0,
    dead_lettered: 0,
    recovered: 0,
  };

  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    private readonly registry: HandlerRegistry,
    @Inject(SUBJECT_RESOLVER) private readonly subjects: SubjectResolver,
    @Inject(WORKER_CONFIG) private readonly config: WorkerConfig,
  ) {
    this.semaphore = new Semaphore(config.maxConcurrent);
  }

  onModuleInit(): void {
    this.start();
  }

  start(): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;
    logger.info(
      {
        service: 'worker',
        operation_types: this.operationTypes(),
        max_concurrent: this.config.maxConcurrent,
      },
      'worker started',
    );
    this.loop = this.poll();
  }

  /**
   * Stops polling and waits up to `shutdownTimeoutMs` for running jobs.
   * Returns the ids of jobs still running after that; they stay PROCESSING
   * until stale recovery picks them up.
   */
  async stop(): Promise<string[]> {
    this.isRunning = false;
    this.isIdle = false;
    this.isErrorIdle = false;
    this.wake?.();
    await this.loop;
    this.loop = null;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.shutdownTimeoutMs);
    });
    const drained = await Promise.race([
      this.drain().then(() => true),
      timedOut,
    ]);
    clearTimeout(timer);

    const abandoned = drained ? [] : Array.from(this.active.keys());
    if (abandoned.length > 0) {
      logger.warn(
        { service: 'worker', job_ids: abandoned },
        'jobs abandoned at shutdown',
      );
    }
    logger.info({ service: 'worker' }, 'worker stopped');
    return abandoned;
  }

  /**
   * One cycle: recover stale jobs, then claim as many due jobs as there is
   * free capacity and dispatch them. Resolves once claimed jobs are
   * dispatched, not finished; see `drain`.
   */
  async pollOnce(): Promise<number> {
    await this.recoverStaleJobs();

    const capacity = Math.min(
      this.config.batchSize,
      this.config.maxConcurrent - this.active.size,
    );
    const operationTypes = this.operationTypes();
    if (capacity <= 0 || operationTypes.length === 0) {
      return 0;
    }

    const candidates = await this.store.listPending({
      operationTypes,
      limit: capacity,
      now: new Date(),
    });

    let claimed = 0;
    for (const candidate of candidates) {
      // requeued after a timeout while its first run is still going
      if (this.active.has(candidate.id)) {
        continue;
      }
      const job = await this.store.claim(candidate.id);
      if (!job) {
        logger.debug(
          { service: 'worker', job_id: candidate.id },
          'job claimed elsewhere',
        );
        continue;
      }

      claimed++;
      logger.info(
        {
          service: 'worker',
          job_id: job.id,
          operation_type: job.operation_type,
          retry_count: retryCountOf(job),
        },
        'job claimed',
      );
      this.dispatch(job);
    }
    return claimed;
  }

  /** Waits until no job is running. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all(this.active.values());
    }
  }

  getStats(): WorkerStats {
    return {
      running: this.isRunning,
      active_jobs: Array.from(this.active.keys()),
      ...this.counters,
    };
  }

  private async poll(): Promise<void> {
    while (this.isRunning) {
      try {
        const claimed = await this.pollOnce();
        if (claimed === 0 && this.active.size === 0) {
          if (!this.isIdle) {
            logger.info({ service: 'worker' }, 'no jobs available');
            this.isIdle = true;
          }
        } else {
          this.isIdle = false;
        }
        this.isErrorIdle = false;
      } catch (error) {
        if (!this.isErrorIdle) {
          logger.error({ service: 'worker', error }, 'error in poll loop');
          this.isErrorIdle = true;
        }
        this.isIdle = false;
      }

      if (this.isRunning) {
        await this.pause(this.config.pollIntervalMs);
      }
    }
  }

  /** Like sleep, but `stop` can cut it short. */
  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    }).finally(() => {
      this.wake = null;
    });
  }

  private operationTypes(): string[] {
    return this.config.operationTypes.length > 0
      ? this.config.operationTypes
      : this.registry.operationTypes();
  }

  private dispatch(job: Job): void {
    const run = this.semaphore
      .run(() => this.execute(job))
      .finally(() => this.active.delete(job.id));
    this.active.set(job.id, run);
  }

  /**
   * The timeout outcome is recorded as soon as the timer fires, but the slot
   * and the `active` entry stay held until the handler itself settles.
   */
  private async execute(job: Job): Promise<void> {
    this.counters.processed++;
    let handlerRun: Promise<unknown> = Promise.resolve();
    let result: unknown;
    try {
      result = await this.runHandler(job, (run) => {
        handlerRun = run;
      });
    } catch (error) {
      await this.record(job, () => this.handleFailure(job, error));
      if (error instanceof JobTimeoutError) {
        await this.awaitTimedOutHandler(job, handlerRun);
      }
      return;
    }
    await this.record(job, () => this.complete(job, result));
  }

  private async runHandler(
    job: Job,
    track: (run: Promise<unknown>) => void,
  ): Promise<unknown> {
    const handler = this.registry.get(job.operation_type);
    if (!handler) {
      throw new NoHandlerError(job.operation_type);
    }
    const subject = await this.subjects.load(job.subject_id);
    if (!subject) {
      throw new SubjectNotFoundError(job.subject_id);
    }

    const timeoutMs = this.config.jobTimeoutMs;
    return withTimeout(
      timeoutMs,
      () => new JobTimeoutError(job.id, timeoutMs),
      (signal) => {
        const run = handler.execute(job, subject, { signal });
        track(run);
        return run;
      },
    );
  }

  private async awaitTimedOutHandler(
    job: Job,
    run: Promise<unknown>,
  ): Promise<void> {
    try {
      await run;
      logger.warn(
        { service: 'worker', job_id: job.id },
        'timed out handler finished, result dropped',
      );
    } catch (error) {
      logger.warn(
        { service: 'worker', job_id: job.id, error },
        'timed out handler failed, error dropped',
      );
    }
  }

  /** A store failure here leaves the job PROCESSING for stale recovery. */
  private async record(job: Job, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.error(
        { service: 'worker', job_id: job.id, error },
        'failed to record job outcome',
      );
    }
  }

  private async complete(job: Job, result: unknown): Promise<void> {
    const updated = await this.store.transition(job.id, {
      from: ['PROCESSING'],
      to: 'COMPLETED',
      error: null,
      completedAt: new Date(),
      details: { result: result ?? null },
    });
    if (!updated) {
      this.logLostClaim(job, 'COMPLETED');
      return;
    }

    this.counters.succeeded++;
    logger.info(
      {
        service: 'worker',
        job_id: job.id,
        operation_type: job.operation_type,
      },
      'job completed',
    );
  }

  private async handleFailure(job: Job, error: unknown): Promise<void> {
    const message = errorMessage(error);
    const retryCount = retryCountOf(job);
    const failureType = classifyFailure(error);

    if (failureType === 'permanent') {
      const updated = await this.store.transition(job.id, {
        from: ['PROCESSING'],
        to: 'FAILED',
        error: message,
        completedAt: new Date(),
        details: { last_error: message },
      });
      if (!updated) {
        this.logLostClaim(job, 'FAILED');
        return;
      }
      this.counters.failed++;
      logger.error(
        { service: 'worker', job_id: job.id, error },
        'job failed permanently',
      );
      return;
    }

    if (shouldRetry(retryCount, this.config.maxRetries, failureType)) {
      const delayMs = computeRetryDelay(retryCount, this.config);
      const retryAfter = new Date(Date.now() + delayMs).toISOString();
      const updated = await this.store.transition(job.id, {
        from: ['PROCESSING'],
        to: 'PENDING',
        error: message,
        details: {
          retry_count: retryCount + 1,
          last_error: message,
          retry_after: retryAfter,
        },
      });
      if (!updated) {
        this.logLostClaim(job, 'PENDING');
        return;
      }
      this.counters.retried++;
      logger.warn(
        {
          service: 'worker',
          job_id: job.id,
          retry_count: retryCount + 1,
          retry_after: retryAfter,
          error,
        },
        'job scheduled for retry',
      );
      return;
    }

    const updated = await this.store.transition(job.id, {
      from: ['PROCESSING'],
      to: 'DEAD_LETTER',
      error: `Max retries exceeded. Last error: ${message}`,
      completedAt: new Date(),
      details: { last_error: message },
    });
    if (!updated) {
      this.logLostClaim(job, 'DEAD_LETTER');
      return;
    }
    this.counters.dead_lettered++;
    logger.error(
      { service: 'worker', job_id: job.id, retry_count: retryCount, error },
      'job moved to dead letter',
    );
  }

  private async recoverStaleJobs(): Promise<void> {
    const stale = await this.store.listStale({
      claimedBefore: new Date(Date.now() - this.config.staleJobTimeoutMs),
      limit: this.config.batchSize,
    });

    for (const job of stale) {
      if (this.active.has(job.id)) {
        continue;
      }
      const claimedAt = job.details.claimed_at ?? 'unknown';
      logger.warn(
        { service: 'worker', job_id: job.id, claimed_at: claimedAt },
        'recovering stale job',
      );
      this.counters.recovered++;
      await this.handleFailure(job, new StaleJobError(job.id, claimedAt));
    }
  }

  private logLostClaim(job: Job, target: string): void {
    logger.warn(
      { service: 'worker', job_id: job.id, target },
      'job no longer PROCESSING, outcome dropped',
    );
  }
}
