export type BatchFlushCallback<T> = (batch: T[]) => Promise<void>;

/**
 * Buffers items and hands them to a flush callback in bounded batches.
 */
export interface BatchScheduler<T> {
  /** Buffer one item. Never blocks and never throws. */
  enqueue(item: T): void;
  /** Register the consumer. Only one callback is kept. */
  onFlush(callback: BatchFlushCallback<T>): void;
  /** Drain everything buffered now. Resolves once the callbacks are done. */
  flush(): Promise<void>;
  start(): void;
  /** Final drain, then release timers. Items enqueued afterwards are ignored. */
  stop(): Promise<void>;
  /** Items currently buffered */
  readonly size: number;
  /** Items discarded because the queue was full */
  readonly dropped: number;
}
