import type { FormatProvider, LogEvent, LogEventLevel } from './log-event.types.js';
import type { SlackAttachment, SlackBlock, SlackParseMode, SlackResponseType } from './slack.types.js';

export interface BatchingOptions {
  /** Maximum number of events handed to one flush */
  batchSizeLimit: number;
  /** Time between periodic flushes (ms) */
  periodMs: number;
  /** Maximum number of buffered events before the oldest are dropped */
  queueLimit: number;
}

export interface SlackSinkOptions extends BatchingOptions {
  webhookUrl: string;
  connectionTimeoutMs: number;
  channels: string[];
  username: string | undefined;
  iconEmoji: string | undefined;
  iconUrl: string | undefined;
  markdown: boolean;
  linkNames: boolean;
  parse: SlackParseMode | undefined;
  threadId: string | undefined;
  replaceOriginal: boolean;
  deleteOriginal: boolean;
  responseType: SlackResponseType | undefined;
  minimumLevel: LogEventLevel;

  showDefaultAttachments: boolean;
  displayDefaultAttachmentsShortened: boolean;
  showPropertyAttachments: boolean;
  displayPropertyAttachmentsShortened: boolean;
  propertyDenyList: string[];
  showExceptionAttachments: boolean;
  displayExceptionAttachmentsShortened: boolean;
  showExceptionBlocks: boolean;
  attachmentColors: Record<LogEventLevel, string>;
  attachmentFooter: string | undefined;
  /** dayjs format string used for timestamps in attachments */
  timestampFormat: string;
}

export type SlackSinkOptionsInput = Partial<Omit<SlackSinkOptions, 'attachmentColors'>> & {
  webhookUrl: string;
  attachmentColors?: Partial<Record<LogEventLevel, string>>;
};

export type SlackTextGenerator = (
  event: LogEvent,
  formatProvider: FormatProvider,
  options: SlackSinkOptions
) => string;

export type SlackAttachmentsGenerator = (
  event: LogEvent,
  formatProvider: FormatProvider,
  options: SlackSinkOptions
) => SlackAttachment[];

export type SlackBlocksGenerator = (
  event: LogEvent,
  formatProvider: FormatProvider,
  options: SlackSinkOptions
) => SlackBlock[];

/**
 * Per-instance message generators. Any generator left out falls back to the
 * default one.
 */
export interface SlackMessageGenerators {
  text?: SlackTextGenerator;
  attachments?: SlackAttachmentsGenerator;
  blocks?: SlackBlocksGenerator;
}
