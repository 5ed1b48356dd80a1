import { logger } from '@pipeline/shared';
import { BatchResultMismatchError } from '../errors';

export type BatchAggregatorOptions = {
  batchSize?: number;
  maxWaitMs?: number;
};

type Waiter<I, R> = {
  item: I;
  resolve: (result: R) => void;
  reject: (error: unknown) => void;
};

/**
 * Coalesces single `add` calls into `processBatch` calls of up to `batchSize`
 * items, flushing early after `maxWaitMs`. Caller i of a batch receives
 * `results[i]`; a failed batch rejects every caller in it. Batches run one at
 * a time, in the order they were flushed.
 */
export class BatchAggregator<I, R> {
  private readonly batchSize: number;
  private readonly maxWaitMs: number;
  private pending: Array<Waiter<I, R>> = [];
  private timer: NodeJS.Timeout | null = null;
  private processing: Promise<void> = Promise.resolve();

  constructor(
    private readonly processBatch: (items: I[]) => Promise<R[]>,
    options: BatchAggregatorOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 10;
    this.maxWaitMs = options.maxWaitMs ?? 1000;
  }

  get size(): number {
    return this.pending.length;
  }

  add(item: I): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.pending.push({ item, resolve, reject });
      if (this.pending.length >= this.batchSize) {
        this.flushPending();
      } else if (this.timer === null) {
        this.timer = setTimeout(() => this.flushPending(), this.maxWaitMs);
      }
    });
  }

  /** Sends whatever is pending now and waits for every queued batch. */
  async flush(): Promise<void> {
    this.flushPending();
    await this.processing;
  }

  private flushPending(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.length === 0) {
      return;
    }

    const batch = this.pending;
    this.pending = [];
    this.processing = this.processing.then(() => this.run(batch));
  }

  private async run(batch: Array<Waiter<I, R>>): Promise<void> {
    try {
      const results = await this.processBatch(batch.map((waiter) => waiter.item));
      if (results.length !== batch.length) {
        throw new BatchResultMismatchError(batch.length, results.length);
      }
      batch.forEach((waiter, index) => waiter.resolve(results[index]));
    } catch (error) {
      logger.warn(
        { service: 'batch-aggregator', size: batch.length, error },
        'batch failed',
      );
      for (const waiter of batch) {
        waiter.reject(error);
      }
    }
  }
}
