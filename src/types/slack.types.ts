export interface SlackAttachmentField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackAttachment {
  fallback?: string;
  color?: string;
  pretext?: string;
  title?: string;
  text?: string;
  fields?: SlackAttachmentField[];
  footer?: string;
  /** Unix epoch seconds */
  ts?: number;
  mrkdwnIn?: Array<'pretext' | 'text' | 'fields'>;
}

export interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: SlackTextObject & { type: 'plain_text' } }
  | { type: 'section'; text: SlackTextObject }
  | { type: 'context'; elements: SlackTextObject[] }
  | { type: 'divider' };

export type SlackParseMode = 'full' | 'none';

export type SlackResponseType = 'in_channel' | 'ephemeral';

/**
 * Outgoing Slack message. Built once per log event and not modified after it
 * has been handed to the webhook client.
 */
export interface SlackMessage {
  text?: string;
  attachments?: SlackAttachment[];
  blocks?: SlackBlock[];
  channel?: string;
  username?: string;
  iconEmoji?: string;
  iconUrl?: string;
  markdown?: boolean;
  linkNames?: boolean;
  parse?: SlackParseMode;
  threadId?: string;
  replaceOriginal?: boolean;
  deleteOriginal?: boolean;
  responseType?: SlackResponseType;
}
