import type { DestinationStream } from 'pino';
import { LogEventLevel, type LogEvent } from '../types/log-event.types.js';
import { logger as defaultLogger } from '../utils/logger.util.js';
import type { LogEventSink } from '../interfaces/log-event-sink.interface.js';
import type { Logger } from '../types/logger.types.js';

const RESERVED_KEYS = new Set(['level', 'time', 'msg', 'err', 'pid', 'hostname']);

/**
 * Map a pino numeric level onto the sink's levels. Custom levels fall into
 * the nearest standard level below them.
 */
export function fromPinoLevel(level: number): LogEventLevel {
  if (level >= 60) return LogEventLevel.Fatal;
  if (level >= 50) return LogEventLevel.Error;
  if (level >= 40) return LogEventLevel.Warning;
  if (level >= 30) return LogEventLevel.Information;
  if (level >= 20) return LogEventLevel.Debug;
  return LogEventLevel.Verbose;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toTimestamp(value: unknown): Date {
  if (typeof value === 'number' || typeof value === 'string') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  return new Date();
}

/** Rebuild an Error from pino's serialized `err` ({ type, message, stack }). */
function toError(value: unknown): Error | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const error = new Error(typeof value.message === 'string' ? value.message : '');
  if (typeof value.type === 'string') {
    error.name = value.type;
  } else if (typeof value.name === 'string') {
    error.name = value.name;
  }
  error.stack = typeof value.stack === 'string' ? value.stack : undefined;
  return error;
}

/**
 * Parse one line written by pino into a LogEvent.
 * @returns undefined when the line is not a pino JSON object
 */
export function parsePinoLine(line: string): LogEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || typeof parsed.level !== 'number') {
    return undefined;
  }

  const properties: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!RESERVED_KEYS.has(key)) {
      properties[key] = value;
    }
  }

  return {
    timestamp: toTimestamp(parsed.time),
    level: fromPinoLevel(parsed.level),
    messageTemplate: typeof parsed.msg === 'string' ? parsed.msg : '',
    properties,
    exception: toError(parsed.err),
  };
}

/**
 * pino destination that forwards every log line to a sink.
 *
 * ```ts
 * const sink = createSlackSink({ webhookUrl });
 * const log = pino(pino.multistream([{ stream: process.stdout }, { level: 'error', stream: createPinoDestination(sink) }]));
 * ```
 */
export function createPinoDestination(sink: LogEventSink, logger: Logger = defaultLogger): DestinationStream {
  const log = logger.child({ adapter: 'pino-destination' });

  return {
    write(chunk: string): void {
      for (const line of chunk.split('\n')) {
        if (line.trim().length === 0) {
          continue;
        }
        const event = parsePinoLine(line);
        if (!event) {
          log.warn('Skipping log line that is not pino JSON', { length: line.length });
          continue;
        }
        sink.emit(event);
      }
    },
  };
}
