import { BaseBatchingSink } from '../base/base-batching-sink.js';
import { SlackWebhookClient } from '../clients/slack-webhook.client.js';
import { UndiciHttpTransport, type HttpTransport } from '../clients/http-transport.client.js';
import { PeriodicBatchScheduler } from '../schedulers/periodic-batch.scheduler.js';
import { SlackSinkActivationSwitch } from './slack-sink-activation-switch.js';
import { resolveSlackSinkOptions } from '../config.js';
import { logger as defaultLogger } from '../utils/logger.util.js';
import { buildSlackMessage, DEFAULT_SLACK_MESSAGE_GENERATORS } from '../utils/slack-message.util.js';
import { isLevelEnabled, type FormatProvider, type LogEvent } from '../types/log-event.types.js';
import type { BatchScheduler } from '../interfaces/batch-scheduler.interface.js';
import type { LogEventSink } from '../interfaces/log-event-sink.interface.js';
import type { Logger } from '../types/logger.types.js';
import type { SlackMessage } from '../types/slack.types.js';
import type { SlackMessageGenerators, SlackSinkOptions, SlackSinkOptionsInput } from '../types/sink.types.js';

export interface SlackSinkParams {
  options: SlackSinkOptions;
  formatProvider?: FormatProvider;
  activationSwitch?: SlackSinkActivationSwitch;
  /**
   * Owned by the sink and closed on dispose, also when supplied by the caller.
   * A default transport is only created when the sink creates the client.
   */
  transport?: HttpTransport;
  generators?: SlackMessageGenerators;
  logger?: Logger;
  scheduler?: BatchScheduler<LogEvent>;
  client?: SlackWebhookClient;
}

export interface SlackSinkStats {
  delivered: number;
  failed: number;
  /** Events discarded because the sink was inactive at flush time */
  discarded: number;
  /** Events dropped because the queue was full */
  dropped: number;
  queued: number;
}

export class SlackSink extends BaseBatchingSink<LogEvent, boolean[]> implements LogEventSink {
  private readonly options: SlackSinkOptions;
  private readonly formatProvider: FormatProvider;
  private readonly activationSwitch: SlackSinkActivationSwitch;
  private readonly transport: HttpTransport | null;
  private readonly client: SlackWebhookClient;
  private readonly generators: Required<SlackMessageGenerators>;
  private readonly logger: Logger;
  private delivered = 0;
  private failed = 0;
  private discarded = 0;

  constructor(params: SlackSinkParams) {
    const logger = (params.logger ?? defaultLogger).child({ sink: 'slack' });
    super(
      params.scheduler ??
        new PeriodicBatchScheduler<LogEvent>({
          batchSizeLimit: params.options.batchSizeLimit,
          periodMs: params.options.periodMs,
          queueLimit: params.options.queueLimit,
          logger,
        })
    );

    this.logger = logger;
    this.options = params.options;
    this.formatProvider = params.formatProvider ?? {};
    this.activationSwitch = params.activationSwitch ?? new SlackSinkActivationSwitch();
    if (params.client) {
      this.client = params.client;
      this.transport = params.transport ?? null;
    } else {
      const transport = params.transport ?? new UndiciHttpTransport();
      this.transport = transport;
      this.client = new SlackWebhookClient({
        webhookUrl: params.options.webhookUrl,
        timeoutMs: params.options.connectionTimeoutMs,
        transport,
        logger,
      });
    }
    this.generators = {
      text: params.generators?.text ?? DEFAULT_SLACK_MESSAGE_GENERATORS.text,
      attachments: params.generators?.attachments ?? DEFAULT_SLACK_MESSAGE_GENERATORS.attachments,
      blocks: params.generators?.blocks ?? DEFAULT_SLACK_MESSAGE_GENERATORS.blocks,
    };
  }

  /** Events below the configured minimum level are ignored. */
  emit(event: LogEvent): void {
    if (!isLevelEnabled(event.level, this.options.minimumLevel)) {
      return;
    }
    super.emit(event);
  }

  /**
   * Send a batch, one event at a time. The activation switch is read once,
   * before the first event.
   * @returns per-event delivery result (every channel succeeded); empty when
   * the sink is inactive
   */
  async emitBatch(events: LogEvent[]): Promise<boolean[]> {
    if (!this.activationSwitch.isActive()) {
      this.discarded += events.length;
      this.logger.debug('Slack sink inactive, discarding batch', { size: events.length });
      return [];
    }

    const results: boolean[] = [];
    for (const event of events) {
      const message = this.buildMessage(event);
      let success: boolean;
      if (this.options.channels.length > 0) {
        const channelResults = await this.client.postToChannels(message, this.options.channels);
        success = channelResults.every(Boolean);
      } else {
        success = await this.client.postAsync(message);
      }

      if (success) {
        this.delivered += 1;
      } else {
        this.failed += 1;
      }
      results.push(success);
    }
    return results;
  }

  getStats(): SlackSinkStats {
    return {
      delivered: this.delivered,
      failed: this.failed,
      discarded: this.discarded,
      dropped: this.scheduler.dropped,
      queued: this.scheduler.size,
    };
  }

  protected async releaseResources(): Promise<void> {
    const failures: unknown[] = [];

    try {
      this.client.dispose();
    } catch (error) {
      failures.push(error);
    }

    if (this.transport) {
      try {
        await this.transport.close();
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, 'Failed to release Slack sink resources');
    }
  }

  private buildMessage(event: LogEvent): SlackMessage {
    return buildSlackMessage(event, this.formatProvider, this.options, this.generators, (part, error) => {
      this.logger.error('Slack message generator failed, using fallback', error, { part, level: event.level });
    });
  }
}

/**
 * Build a sink from partial options; defaults are filled in and validated.
 * @throws SinkConfigurationError for invalid options
 */
export function createSlackSink(
  input: SlackSinkOptionsInput,
  overrides: Omit<SlackSinkParams, 'options'> = {}
): SlackSink {
  return new SlackSink({ ...overrides, options: resolveSlackSinkOptions(input) });
}
