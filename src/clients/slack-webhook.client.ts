import { BaseClient } from './base.client.js';
import { safeHost, type HttpTransport } from './http-transport.client.js';
import { toSlackPayload } from '../utils/slack-message.util.js';
import type { Logger } from '../types/logger.types.js';
import type { SlackMessage } from '../types/slack.types.js';

export interface SlackWebhookClientOptions {
  webhookUrl: string;
  timeoutMs: number;
  transport: HttpTransport;
  logger: Logger;
}

/**
 * Posts messages to a Slack incoming webhook.
 *
 * Every post resolves to a boolean: `true` for a 2xx answer, `false` for a
 * non-2xx answer, a timeout or a network error. Failures are logged, never
 * thrown, and never retried.
 */
export class SlackWebhookClient extends BaseClient {
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;

  constructor(options: SlackWebhookClientOptions) {
    super('SlackWebhook', options.logger);
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs;
    this.transport = options.transport;
  }

  async postAsync(message: SlackMessage): Promise<boolean> {
    if (this.isDisposed) {
      this.logger.warn('Dropping Slack message, client is disposed', { channel: message.channel });
      return false;
    }

    let body: string;
    try {
      body = JSON.stringify(toSlackPayload(message));
    } catch (error) {
      this.logger.error('Failed to serialize Slack message', error, { channel: message.channel });
      return false;
    }

    try {
      const response = await this.transport.post(this.webhookUrl, body, { timeoutMs: this.timeoutMs });
      if (response.ok) {
        return true;
      }

      const failure = this.createError(`Slack webhook answered ${response.status}`, {
        statusCode: response.status,
        metadata: { channel: message.channel, host: safeHost(this.webhookUrl), response: response.body },
      });
      this.logger.warn(failure.message, { err: failure, statusCode: response.status, channel: message.channel });
      return false;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const failure = this.createError(`Slack webhook request failed: ${cause.message}`, {
        cause,
        metadata: { channel: message.channel, host: safeHost(this.webhookUrl) },
      });
      this.logger.warn('Slack webhook request failed', {
        err: failure,
        timedOut: failure.isTimeout,
        channel: message.channel,
      });
      return false;
    }
  }

  /**
   * Post the same message to every channel, overriding `channel` per request.
   * Requests run concurrently; results are in channel order.
   */
  async postToChannels(message: SlackMessage, channels: readonly string[]): Promise<boolean[]> {
    return Promise.all(channels.map(channel => this.postAsync({ ...message, channel })));
  }
}
