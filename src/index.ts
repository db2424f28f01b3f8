export { SlackSink, createSlackSink } from './sinks/slack.sink.js';
export type { SlackSinkParams, SlackSinkStats } from './sinks/slack.sink.js';
export { SlackSinkActivationSwitch, SlackSinkActivationStatus } from './sinks/slack-sink-activation-switch.js';
export { BaseBatchingSink } from './base/base-batching-sink.js';
export { PeriodicBatchScheduler } from './schedulers/periodic-batch.scheduler.js';
export type { PeriodicBatchSchedulerOptions } from './schedulers/periodic-batch.scheduler.js';
export { SlackWebhookClient } from './clients/slack-webhook.client.js';
export type { SlackWebhookClientOptions } from './clients/slack-webhook.client.js';
export { UndiciHttpTransport } from './clients/http-transport.client.js';
export type {
  HttpPostOptions,
  HttpTransport,
  HttpTransportResponse,
  UndiciHttpTransportOptions,
} from './clients/http-transport.client.js';
export { ClientError } from './clients/errors/client-error.js';
export { SinkConfigurationError } from './types/sink-configuration-error.js';
export {
  DEFAULT_ATTACHMENT_COLORS,
  DEFAULT_SLACK_SINK_OPTIONS,
  loadSlackSinkOptionsFromEnv,
  resolveSlackSinkOptions,
} from './config.js';
export {
  DEFAULT_SLACK_MESSAGE_GENERATORS,
  buildSlackMessage,
  generateSlackMessageAttachments,
  generateSlackMessageBlocks,
  generateSlackMessageText,
  toSlackPayload,
} from './utils/slack-message.util.js';
export { renderMessageTemplate } from './utils/message-template.util.js';
export { createPinoDestination, fromPinoLevel, parsePinoLine } from './adapters/pino-destination.adapter.js';
export { createLogger } from './utils/logger.util.js';
export { LogEventLevel, isLevelEnabled } from './types/log-event.types.js';
export type { FormatProvider, LogEvent } from './types/log-event.types.js';
export type { Logger, LoggerLevel } from './types/logger.types.js';
export type * from './types/slack.types.js';
export type * from './types/sink.types.js';
export type { BatchFlushCallback, BatchScheduler } from './interfaces/batch-scheduler.interface.js';
export type { LogEventSink } from './interfaces/log-event-sink.interface.js';
