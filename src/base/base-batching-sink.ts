/**
 * Base Batching Sink
 *
 * Abstract base class for sinks that deliver events in batches.
 * Buffering and timing are delegated to a BatchScheduler; subclasses only
 * implement what happens to one batch.
 */

import type { BatchScheduler } from '../interfaces/batch-scheduler.interface.js';

export abstract class BaseBatchingSink<T, R = void> {
  protected readonly scheduler: BatchScheduler<T>;
  private disposing: Promise<void> | null = null;

  protected constructor(scheduler: BatchScheduler<T>) {
    this.scheduler = scheduler;
    this.scheduler.onFlush(async batch => {
      await this.emitBatch(batch);
    });
    this.scheduler.start();
  }

  /**
   * Deliver one batch, in order.
   * Must be implemented by subclasses
   */
  abstract emitBatch(batch: T[]): Promise<R>;

  emit(item: T): void {
    this.scheduler.enqueue(item);
  }

  flush(): Promise<void> {
    return this.scheduler.flush();
  }

  /**
   * Final flush, then release subclass resources. Safe to call more than once.
   */
  dispose(): Promise<void> {
    if (!this.disposing) {
      this.disposing = this.scheduler.stop().then(
        () => this.releaseResources(),
        async (error: unknown) => {
          await this.releaseResources();
          throw error;
        }
      );
    }
    return this.disposing;
  }

  /**
   * Release anything the subclass owns. Runs once, after the final flush.
   */
  protected async releaseResources(): Promise<void> {}
}
