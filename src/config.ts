import dotenv from 'dotenv';
import { z } from 'zod';
import { LogEventLevel } from './types/log-event.types.js';
import { SinkConfigurationError } from './types/sink-configuration-error.js';
import type { BatchingOptions, SlackSinkOptions, SlackSinkOptionsInput } from './types/sink.types.js';

dotenv.config();

export interface AppConfig {
  logging: {
    level: string;
    pretty: boolean;
  };
  environment: string;
}

export const config: AppConfig = {
  logging: {
    level: process.env.LOG_LEVEL ?? 'info',
    pretty: process.env.NODE_ENV === 'development',
  },
  environment: process.env.NODE_ENV ?? 'development',
};

export const DEFAULT_ATTACHMENT_COLORS: Record<LogEventLevel, string> = {
  [LogEventLevel.Verbose]: '#777777',
  [LogEventLevel.Debug]: '#777777',
  [LogEventLevel.Information]: '#2eb886',
  [LogEventLevel.Warning]: '#daa038',
  [LogEventLevel.Error]: '#a30200',
  [LogEventLevel.Fatal]: '#5c0000',
};

export const DEFAULT_SLACK_SINK_OPTIONS: Omit<SlackSinkOptions, 'webhookUrl'> = {
  connectionTimeoutMs: 2_000,
  batchSizeLimit: 50,
  periodMs: 2_000,
  queueLimit: 100_000,
  channels: [],
  username: undefined,
  iconEmoji: undefined,
  iconUrl: undefined,
  markdown: true,
  linkNames: false,
  parse: undefined,
  threadId: undefined,
  replaceOriginal: false,
  deleteOriginal: false,
  responseType: undefined,
  minimumLevel: LogEventLevel.Verbose,
  showDefaultAttachments: true,
  displayDefaultAttachmentsShortened: false,
  showPropertyAttachments: true,
  displayPropertyAttachmentsShortened: false,
  propertyDenyList: [],
  showExceptionAttachments: true,
  displayExceptionAttachmentsShortened: false,
  showExceptionBlocks: false,
  attachmentColors: DEFAULT_ATTACHMENT_COLORS,
  attachmentFooter: undefined,
  timestampFormat: 'YYYY-MM-DD HH:mm:ss.SSS Z',
};

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function checkPositiveInteger(issues: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    issues.push(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * @returns one line per invalid batching setting; empty when all are valid
 */
export function validateBatchingOptions(options: BatchingOptions): string[] {
  const issues: string[] = [];
  checkPositiveInteger(issues, 'batchSizeLimit', options.batchSizeLimit);
  checkPositiveInteger(issues, 'periodMs', options.periodMs);
  checkPositiveInteger(issues, 'queueLimit', options.queueLimit);
  if (options.queueLimit < options.batchSizeLimit) {
    issues.push('queueLimit must not be smaller than batchSizeLimit');
  }
  return issues;
}

/**
 * Merge caller options over the defaults and validate the result.
 * @throws SinkConfigurationError listing every invalid setting
 */
export function resolveSlackSinkOptions(input: SlackSinkOptionsInput): SlackSinkOptions {
  const defaults = DEFAULT_SLACK_SINK_OPTIONS;
  const options: SlackSinkOptions = {
    webhookUrl: input.webhookUrl,
    connectionTimeoutMs: input.connectionTimeoutMs ?? defaults.connectionTimeoutMs,
    batchSizeLimit: input.batchSizeLimit ?? defaults.batchSizeLimit,
    periodMs: input.periodMs ?? defaults.periodMs,
    queueLimit: input.queueLimit ?? defaults.queueLimit,
    channels: [...(input.channels ?? defaults.channels)],
    username: input.username ?? defaults.username,
    iconEmoji: input.iconEmoji ?? defaults.iconEmoji,
    iconUrl: input.iconUrl ?? defaults.iconUrl,
    markdown: input.markdown ?? defaults.markdown,
    linkNames: input.linkNames ?? defaults.linkNames,
    parse: input.parse ?? defaults.parse,
    threadId: input.threadId ?? defaults.threadId,
    replaceOriginal: input.replaceOriginal ?? defaults.replaceOriginal,
    deleteOriginal: input.deleteOriginal ?? defaults.deleteOriginal,
    responseType: input.responseType ?? defaults.responseType,
    minimumLevel: input.minimumLevel ?? defaults.minimumLevel,
    showDefaultAttachments: input.showDefaultAttachments ?? defaults.showDefaultAttachments,
    displayDefaultAttachmentsShortened:
      input.displayDefaultAttachmentsShortened ?? defaults.displayDefaultAttachmentsShortened,
    showPropertyAttachments: input.showPropertyAttachments ?? defaults.showPropertyAttachments,
    displayPropertyAttachmentsShortened:
      input.displayPropertyAttachmentsShortened ?? defaults.displayPropertyAttachmentsShortened,
    propertyDenyList: [...(input.propertyDenyList ?? defaults.propertyDenyList)],
    showExceptionAttachments: input.showExceptionAttachments ?? defaults.showExceptionAttachments,
    displayExceptionAttachmentsShortened:
      input.displayExceptionAttachmentsShortened ?? defaults.displayExceptionAttachmentsShortened,
    showExceptionBlocks: input.showExceptionBlocks ?? defaults.showExceptionBlocks,
    attachmentColors: { ...defaults.attachmentColors, ...input.attachmentColors },
    attachmentFooter: input.attachmentFooter ?? defaults.attachmentFooter,
    timestampFormat: input.timestampFormat ?? defaults.timestampFormat,
  };

  const issues: string[] = [];
  if (!isHttpUrl(options.webhookUrl)) {
    issues.push('webhookUrl must be an http(s) URL');
  }
  checkPositiveInteger(issues, 'connectionTimeoutMs', options.connectionTimeoutMs);
  issues.push(...validateBatchingOptions(options));
  if (options.channels.some(channel => channel.trim().length === 0)) {
    issues.push('channels must not contain empty names');
  }

  if (issues.length > 0) {
    throw new SinkConfigurationError(issues);
  }

  return Object.freeze(options);
}

const booleanFlag = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

const slackEnvSchema = z.object({
  SLACK_WEBHOOK_URL: z.string().url(),
  SLACK_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SLACK_BATCH_SIZE_LIMIT: z.coerce.number().int().positive().optional(),
  SLACK_PERIOD_MS: z.coerce.number().int().positive().optional(),
  SLACK_QUEUE_LIMIT: z.coerce.number().int().positive().optional(),
  SLACK_CHANNELS: z
    .string()
    .transform(value =>
      value
        .split(',')
        .map(channel => channel.trim())
        .filter(channel => channel.length > 0)
    )
    .optional(),
  SLACK_USERNAME: z.string().min(1).optional(),
  SLACK_ICON_EMOJI: z.string().min(1).optional(),
  SLACK_ICON_URL: z.string().url().optional(),
  SLACK_MARKDOWN: booleanFlag.optional(),
  SLACK_LINK_NAMES: booleanFlag.optional(),
  SLACK_MINIMUM_LEVEL: z.nativeEnum(LogEventLevel).optional(),
});

/**
 * Read sink options from environment variables (`SLACK_*`).
 * @throws SinkConfigurationError when a variable is missing or malformed
 */
export function loadSlackSinkOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): SlackSinkOptions {
  const parsed = slackEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new SinkConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      'Invalid Slack sink environment'
    );
  }

  const vars = parsed.data;
  return resolveSlackSinkOptions({
    webhookUrl: vars.SLACK_WEBHOOK_URL,
    connectionTimeoutMs: vars.SLACK_CONNECTION_TIMEOUT_MS,
    batchSizeLimit: vars.SLACK_BATCH_SIZE_LIMIT,
    periodMs: vars.SLACK_PERIOD_MS,
    queueLimit: vars.SLACK_QUEUE_LIMIT,
    channels: vars.SLACK_CHANNELS,
    username: vars.SLACK_USERNAME,
    iconEmoji: vars.SLACK_ICON_EMOJI,
    iconUrl: vars.SLACK_ICON_URL,
    markdown: vars.SLACK_MARKDOWN,
    linkNames: vars.SLACK_LINK_NAMES,
    minimumLevel: vars.SLACK_MINIMUM_LEVEL,
  });
}
