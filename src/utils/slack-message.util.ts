import { inTimeZone, renderMessageTemplate, renderPropertyValue } from './message-template.util.js';
import { LogEventLevel, type FormatProvider, type LogEvent } from '../types/log-event.types.js';
import type { SlackAttachment, SlackAttachmentField, SlackBlock, SlackMessage } from '../types/slack.types.js';
import type {
  SlackAttachmentsGenerator,
  SlackBlocksGenerator,
  SlackMessageGenerators,
  SlackSinkOptions,
  SlackTextGenerator,
} from '../types/sink.types.js';

/** Slack rejects section blocks whose text exceeds this length */
export const SLACK_SECTION_TEXT_LIMIT = 3000;
export const SLACK_HEADER_TEXT_LIMIT = 150;
const MAX_CAUSE_DEPTH = 5;

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

export function formatTimestamp(timestamp: Date, options: SlackSinkOptions, formatProvider: FormatProvider): string {
  return inTimeZone(timestamp, formatProvider.timeZone).format(options.timestampFormat);
}

function exceptionChain(exception: Error): Error[] {
  const chain: Error[] = [exception];
  let current: unknown = exception.cause;
  while (current instanceof Error && chain.length < MAX_CAUSE_DEPTH && !chain.includes(current)) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

function codeBlock(text: string): string {
  return '```' + text.replace(/```/g, "'''") + '```';
}

export const generateSlackMessageText: SlackTextGenerator = (event, formatProvider) =>
  renderMessageTemplate(event.messageTemplate, event.properties, formatProvider);

function buildDefaultAttachment(event: LogEvent, formatProvider: FormatProvider, options: SlackSinkOptions): SlackAttachment {
  const short = options.displayDefaultAttachmentsShortened;
  return {
    fallback: `[${event.level}] ${event.messageTemplate}`,
    color: options.attachmentColors[event.level],
    fields: [
      { title: 'Level', value: event.level, short },
      { title: 'Timestamp', value: formatTimestamp(event.timestamp, options, formatProvider), short },
    ],
    footer: options.attachmentFooter,
    ts: Math.floor(event.timestamp.getTime() / 1000),
  };
}

function buildPropertyAttachment(
  event: LogEvent,
  formatProvider: FormatProvider,
  options: SlackSinkOptions
): SlackAttachment | undefined {
  const short = options.displayPropertyAttachmentsShortened;
  const fields: SlackAttachmentField[] = Object.entries(event.properties)
    .filter(([name]) => !options.propertyDenyList.includes(name))
    .map(([name, value]) => ({ title: name, value: renderPropertyValue(value, formatProvider), short }));

  if (fields.length === 0) {
    return undefined;
  }

  return {
    fallback: `Properties: ${fields.map(field => field.title).join(', ')}`,
    color: options.attachmentColors[event.level],
    title: 'Properties',
    fields,
  };
}

function buildExceptionAttachment(exception: Error, options: SlackSinkOptions): SlackAttachment {
  const short = options.displayExceptionAttachmentsShortened;
  const chain = exceptionChain(exception);
  const fields: SlackAttachmentField[] = [
    { title: 'Type', value: exception.name, short },
    { title: 'Message', value: exception.message, short },
  ];

  if (exception.stack) {
    fields.push({ title: 'Stack Trace', value: codeBlock(exception.stack), short: false });
  }

  for (const cause of chain.slice(1)) {
    fields.push({ title: 'Caused by', value: `${cause.name}: ${cause.message}`, short: false });
  }

  return {
    fallback: `${exception.name}: ${exception.message}`,
    color: options.attachmentColors[LogEventLevel.Error],
    title: 'Exception',
    fields,
    mrkdwnIn: ['fields'],
  };
}

export const generateSlackMessageAttachments: SlackAttachmentsGenerator = (event, formatProvider, options) => {
  const attachments: SlackAttachment[] = [];

  if (options.showDefaultAttachments) {
    attachments.push(buildDefaultAttachment(event, formatProvider, options));
  }

  if (options.showPropertyAttachments) {
    const propertyAttachment = buildPropertyAttachment(event, formatProvider, options);
    if (propertyAttachment) {
      attachments.push(propertyAttachment);
    }
  }

  if (options.showExceptionAttachments && event.exception) {
    attachments.push(buildExceptionAttachment(event.exception, options));
  }

  return attachments;
};

export const generateSlackMessageBlocks: SlackBlocksGenerator = (event, formatProvider, options) => {
  if (!options.showExceptionBlocks || !event.exception) {
    return [];
  }

  const exception = event.exception;
  const blocks: SlackBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: truncate(`${event.level}: ${exception.name}`, SLACK_HEADER_TEXT_LIMIT) },
    },
    {
      type: 'section',
      text: { type: 'mrkdwn', text: truncate(exception.message || '(no message)', SLACK_SECTION_TEXT_LIMIT) },
    },
  ];

  if (exception.stack) {
    // six characters of backticks wrap the stack
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: codeBlock(truncate(exception.stack, SLACK_SECTION_TEXT_LIMIT - 6)) },
    });
  }

  blocks.push({
    type: 'context',
    elements: [{ type: 'mrkdwn', text: formatTimestamp(event.timestamp, options, formatProvider) }],
  });

  return blocks;
};

export const DEFAULT_SLACK_MESSAGE_GENERATORS: Required<SlackMessageGenerators> = {
  text: generateSlackMessageText,
  attachments: generateSlackMessageAttachments,
  blocks: generateSlackMessageBlocks,
};

export type SlackMessagePart = keyof SlackMessageGenerators;

/** Called when a generator throws; the part falls back to a plain value. */
export type SlackMessagePartErrorHandler = (part: SlackMessagePart, error: unknown) => void;

function generatePart<T>(
  part: SlackMessagePart,
  generate: () => T,
  fallback: () => T,
  onError: SlackMessagePartErrorHandler | undefined
): T {
  try {
    return generate();
  } catch (error) {
    onError?.(part, error);
    return fallback();
  }
}

/**
 * Build the message for one log event. Channel is left to the caller when
 * fanning out.
 *
 * Each generator runs on its own: a throwing text generator falls back to the
 * raw message template, throwing attachments or blocks generators to no
 * attachments or blocks.
 */
export function buildSlackMessage(
  event: LogEvent,
  formatProvider: FormatProvider,
  options: SlackSinkOptions,
  generators: Required<SlackMessageGenerators>,
  onError?: SlackMessagePartErrorHandler
): SlackMessage {
  return {
    text: generatePart(
      'text',
      () => generators.text(event, formatProvider, options),
      () => event.messageTemplate,
      onError
    ),
    attachments: generatePart(
      'attachments',
      () => generators.attachments(event, formatProvider, options),
      () => [],
      onError
    ),
    blocks: generatePart('blocks', () => generators.blocks(event, formatProvider, options), () => [], onError),
    channel: options.channels.length > 0 ? options.channels[0] : undefined,
    username: options.username,
    iconEmoji: options.iconEmoji,
    iconUrl: options.iconUrl,
    markdown: options.markdown,
    linkNames: options.linkNames,
    parse: options.parse,
    threadId: options.threadId,
    replaceOriginal: options.replaceOriginal,
    deleteOriginal: options.deleteOriginal,
    responseType: options.responseType,
  };
}

/**
 * Slack wire format (snake_case). Undefined values and empty lists are left
 * out of the payload.
 */
export function toSlackPayload(message: SlackMessage): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    text: message.text,
    channel: message.channel,
    username: message.username,
    icon_emoji: message.iconEmoji,
    icon_url: message.iconUrl,
    mrkdwn: message.markdown,
    link_names: message.linkNames,
    parse: message.parse,
    thread_ts: message.threadId,
    replace_original: message.replaceOriginal,
    delete_original: message.deleteOriginal,
    response_type: message.responseType,
  };

  if (message.attachments && message.attachments.length > 0) {
    payload.attachments = message.attachments.map(attachment => ({
      fallback: attachment.fallback,
      color: attachment.color,
      pretext: attachment.pretext,
      title: attachment.title,
      text: attachment.text,
      fields: attachment.fields,
      footer: attachment.footer,
      ts: attachment.ts,
      mrkdwn_in: attachment.mrkdwnIn,
    }));
  }

  if (message.blocks && message.blocks.length > 0) {
    payload.blocks = message.blocks;
  }

  for (const key of Object.keys(payload)) {
    if (payload[key] === undefined) {
      delete payload[key];
    }
  }

  return payload;
}
