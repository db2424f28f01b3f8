export enum LogEventLevel {
  Verbose = 'Verbose',
  Debug = 'Debug',
  Information = 'Information',
  Warning = 'Warning',
  Error = 'Error',
  Fatal = 'Fatal',
}

const LEVEL_ORDER: Record<LogEventLevel, number> = {
  [LogEventLevel.Verbose]: 0,
  [LogEventLevel.Debug]: 1,
  [LogEventLevel.Information]: 2,
  [LogEventLevel.Warning]: 3,
  [LogEventLevel.Error]: 4,
  [LogEventLevel.Fatal]: 5,
};

export function isLevelEnabled(level: LogEventLevel, minimumLevel: LogEventLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

export function isLogEventLevel(value: unknown): value is LogEventLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * A single structured log event as produced by the host logging pipeline.
 * Treated as read-only by the sink.
 */
export interface LogEvent {
  readonly timestamp: Date;
  readonly level: LogEventLevel;
  /** Message template, e.g. `User {UserId} signed in from {Ip}` */
  readonly messageTemplate: string;
  readonly properties: Readonly<Record<string, unknown>>;
  readonly exception?: Error;
}

/**
 * Culture-like settings used when rendering numbers and dates.
 */
export interface FormatProvider {
  /** BCP 47 locale passed to Intl, e.g. `de-DE` */
  locale?: string;
  /** IANA time zone, e.g. `Europe/Berlin`. UTC when omitted. */
  timeZone?: string;
}
