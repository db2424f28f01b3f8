import { validateBatchingOptions } from '../config.js';
import { SinkConfigurationError } from '../types/sink-configuration-error.js';
import type { BatchFlushCallback, BatchScheduler } from '../interfaces/batch-scheduler.interface.js';
import type { BatchingOptions } from '../types/sink.types.js';
import type { Logger } from '../types/logger.types.js';

export interface PeriodicBatchSchedulerOptions extends BatchingOptions {
  logger: Logger;
}

/**
 * Timer-driven batch scheduler.
 *
 * A drain starts when `periodMs` has passed since the last drain or as soon
 * as the queue holds `batchSizeLimit` items, whichever happens first. One
 * drain hands the queue to the callback in slices of at most `batchSizeLimit`
 * items until it is empty. Drains never overlap.
 *
 * Overflow policy: when the queue is at `queueLimit`, the oldest item is
 * dropped to make room for the new one. Drops are reported once per drain.
 */
export class PeriodicBatchScheduler<T> implements BatchScheduler<T> {
  private readonly batchSizeLimit: number;
  private readonly periodMs: number;
  private readonly queueLimit: number;
  private readonly logger: Logger;
  private readonly queue: T[] = [];
  private callback: BatchFlushCallback<T> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private pendingDrain: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private droppedCount = 0;
  private unreportedDrops = 0;
  private started = false;

  /**
   * @throws SinkConfigurationError unless the limits and period are positive
   * integers and `queueLimit >= batchSizeLimit`
   */
  constructor(options: PeriodicBatchSchedulerOptions) {
    const issues = validateBatchingOptions(options);
    if (issues.length > 0) {
      throw new SinkConfigurationError(issues, 'Invalid batching options');
    }
    this.batchSizeLimit = options.batchSizeLimit;
    this.periodMs = options.periodMs;
    this.queueLimit = options.queueLimit;
    this.logger = options.logger;
  }

  get size(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  onFlush(callback: BatchFlushCallback<T>): void {
    this.callback = callback;
  }

  start(): void {
    if (this.started || this.stopping) {
      return;
    }
    this.started = true;
    this.scheduleTick();
  }

  enqueue(item: T): void {
    if (this.stopping) {
      this.logger.debug('Ignoring item enqueued after stop');
      return;
    }

    if (!this.started) {
      this.start();
    }

    if (this.queue.length >= this.queueLimit) {
      this.queue.shift();
      this.droppedCount += 1;
      this.unreportedDrops += 1;
    }

    this.queue.push(item);

    if (this.queue.length >= this.batchSizeLimit) {
      this.requestDrain().catch(error => {
        this.logger.error('Size-triggered flush failed', error);
      });
    }
  }

  flush(): Promise<void> {
    return this.requestDrain();
  }

  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }

    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.stopping = this.requestDrain().then(() => {
      if (this.queue.length > 0) {
        this.logger.warn('Discarding items left after final flush', { count: this.queue.length });
        this.queue.length = 0;
      }
    });
    return this.stopping;
  }

  private scheduleTick(): void {
    if (this.stopping || this.timer !== null) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.requestDrain().catch(error => {
        this.logger.error('Periodic flush failed', error);
      });
    }, this.periodMs);
    this.timer.unref();
  }

  /** The period counts from the end of the last drain. */
  private restartTimer(): void {
    if (!this.started || this.stopping) {
      return;
    }
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.scheduleTick();
  }

  /**
   * Queue a drain behind the one in progress. Requests made before the queued
   * drain starts share it.
   */
  private requestDrain(): Promise<void> {
    if (this.pendingDrain) {
      return this.pendingDrain;
    }

    const drain = this.tail.then(async () => {
      this.pendingDrain = null;
      try {
        await this.drainQueue();
      } finally {
        this.restartTimer();
      }
    });
    this.pendingDrain = drain;
    this.tail = drain;
    return drain;
  }

  private async drainQueue(): Promise<void> {
    if (this.unreportedDrops > 0) {
      this.logger.warn('Batch queue full, dropped oldest items', {
        queueLimit: this.queueLimit,
        droppedSinceLastFlush: this.unreportedDrops,
        dropped: this.droppedCount,
      });
      this.unreportedDrops = 0;
    }

    const callback = this.callback;
    if (!callback) {
      return;
    }

    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.batchSizeLimit);
      try {
        await callback(batch);
      } catch (error) {
        this.logger.error('Batch flush callback failed', error, { batchSize: batch.length });
      }
    }
  }
}
