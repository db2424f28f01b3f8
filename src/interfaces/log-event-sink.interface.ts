import type { LogEvent } from '../types/log-event.types.js';

/**
 * What the host logging pipeline sees of a sink.
 */
export interface LogEventSink {
  /** Fire-and-forget; must not block or throw */
  emit(event: LogEvent): void;
  flush(): Promise<void>;
  dispose(): Promise<void>;
}
