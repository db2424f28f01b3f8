import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SlackSink, createSlackSink } from '../sinks/slack.sink.js';
import { SlackSinkActivationSwitch } from '../sinks/slack-sink-activation-switch.js';
import { SlackWebhookClient } from '../clients/slack-webhook.client.js';
import { ClientError } from '../clients/errors/client-error.js';
import { UndiciHttpTransport } from '../clients/http-transport.client.js';
import { resolveSlackSinkOptions } from '../config.js';
import { LogEventLevel, type LogEvent } from '../types/log-event.types.js';
import { SinkConfigurationError } from '../types/sink-configuration-error.js';
import type { SlackSinkOptionsInput } from '../types/sink.types.js';
import { FakeTransport, ManualScheduler, TEST_WEBHOOK_URL, createTestLogger, delay, makeEvent } from './test-helpers.js';

describe('SlackSink', () => {
  let transport: FakeTransport;
  let scheduler: ManualScheduler<LogEvent>;
  let logger: ReturnType<typeof createTestLogger>;

  const createSink = (input: Partial<SlackSinkOptionsInput> = {}, activationSwitch?: SlackSinkActivationSwitch) =>
    new SlackSink({
      options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL, ...input }),
      activationSwitch,
      transport,
      scheduler,
      logger,
    });

  beforeEach(() => {
    transport = new FakeTransport();
    scheduler = new ManualScheduler<LogEvent>();
    logger = createTestLogger();
  });

  it('should register with the scheduler and start it', () => {
    createSink();
    expect(scheduler.callback).not.toBeNull();
    expect(scheduler.started).toBe(true);
  });

  describe('emit', () => {
    it('should hand events to the scheduler', () => {
      const sink = createSink();
      const event = makeEvent();

      sink.emit(event);

      expect(scheduler.items).toEqual([event]);
    });

    it('should ignore events below the minimum level', () => {
      const sink = createSink({ minimumLevel: LogEventLevel.Warning });

      sink.emit(makeEvent({ level: LogEventLevel.Information }));
      sink.emit(makeEvent({ level: LogEventLevel.Error }));

      expect(scheduler.items.map(event => event.level)).toEqual([LogEventLevel.Error]);
    });
  });

  describe('emitBatch', () => {
    it('should send nothing while inactive', async () => {
      const activationSwitch = new SlackSinkActivationSwitch();
      const sink = createSink({}, activationSwitch);
      activationSwitch.setInactive();

      const results = await sink.emitBatch([makeEvent(), makeEvent()]);

      expect(results).toEqual([]);
      expect(transport.requests).toHaveLength(0);
      expect(sink.getStats().discarded).toBe(2);
    });

    it('should send again once reactivated', async () => {
      const activationSwitch = new SlackSinkActivationSwitch();
      const sink = createSink({}, activationSwitch);

      activationSwitch.setInactive();
      await sink.emitBatch([makeEvent()]);
      activationSwitch.setActive();
      await sink.emitBatch([makeEvent()]);

      expect(transport.requests).toHaveLength(1);
    });

    it('should post one request per event in order', async () => {
      const sink = createSink();
      const events = [1, 2, 3].map(id => makeEvent({ properties: { UserId: id } }));

      const results = await sink.emitBatch(events);

      expect(results).toEqual([true, true, true]);
      expect(transport.requests.map(request => request.payload.text)).toEqual([
        'User 1 signed in',
        'User 2 signed in',
        'User 3 signed in',
      ]);
    });

    it('should finish the channel fan-out of one event before the next event', async () => {
      const order: string[] = [];
      transport.responder = async request => {
        const label = `${String(request.payload.text)}@${String(request.payload.channel)}`;
        order.push(`start ${label}`);
        await delay(5);
        order.push(`end ${label}`);
        return { status: 200, ok: true, body: 'ok' };
      };
      const sink = createSink({ channels: ['#a', '#b', '#c'] });

      const results = await sink.emitBatch([
        makeEvent({ messageTemplate: 'first', properties: {} }),
        makeEvent({ messageTemplate: 'second', properties: {} }),
      ]);

      expect(results).toEqual([true, true]);
      expect(order).toEqual([
        'start first@#a',
        'start first@#b',
        'start first@#c',
        'end first@#a',
        'end first@#b',
        'end first@#c',
        'start second@#a',
        'start second@#b',
        'start second@#c',
        'end second@#a',
        'end second@#b',
        'end second@#c',
      ]);
    });

    it('should keep going after a timeout', async () => {
      transport.responder = async request => {
        if (request.payload.text === 'User 2 signed in') {
          const cause = new Error('The operation was aborted due to timeout');
          cause.name = 'TimeoutError';
          throw new ClientError({ clientName: 'HttpTransport', message: 'Request timed out after 2000ms', cause });
        }
        return { status: 200, ok: true, body: 'ok' };
      };
      const sink = createSink();

      const results = await sink.emitBatch([1, 2, 3].map(id => makeEvent({ properties: { UserId: id } })));

      expect(results).toEqual([true, false, true]);
      expect(transport.requests).toHaveLength(3);
      expect(sink.getStats()).toMatchObject({ delivered: 2, failed: 1 });
    });

    it('should use a custom text generator and default the others', async () => {
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL, showPropertyAttachments: false }),
        transport,
        scheduler,
        logger,
        generators: { text: event => `:fire: ${event.level}` },
      });

      await sink.emitBatch([makeEvent({ level: LogEventLevel.Error })]);

      const { payload } = transport.requests[0];
      expect(payload.text).toBe(':fire: Error');
      expect(payload.attachments).toEqual([
        expect.objectContaining({ fallback: '[Error] User {UserId} signed in', color: '#a30200' }),
      ]);
    });

    it('should keep the rendered text when the attachments generator throws', async () => {
      const failure = new Error('generator broke');
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        transport,
        scheduler,
        logger,
        generators: {
          attachments: () => {
            throw failure;
          },
        },
      });

      const results = await sink.emitBatch([makeEvent()]);

      expect(results).toEqual([true]);
      expect(transport.requests[0].payload.text).toBe('User 42 signed in');
      expect(transport.requests[0].payload.attachments).toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith('Slack message generator failed, using fallback', failure, {
        part: 'attachments',
        level: LogEventLevel.Information,
      });
    });

    it('should send the bare template and keep the attachments when the text generator throws', async () => {
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL, showPropertyAttachments: false }),
        transport,
        scheduler,
        logger,
        generators: {
          text: () => {
            throw new Error('generator broke');
          },
        },
      });

      await sink.emitBatch([makeEvent()]);

      const { payload } = transport.requests[0];
      expect(payload.text).toBe('User {UserId} signed in');
      expect(payload.attachments).toEqual([expect.objectContaining({ fallback: '[Information] User {UserId} signed in' })]);
    });

    it('should render in UTC when the format provider names an unknown time zone', async () => {
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL, showPropertyAttachments: false }),
        formatProvider: { timeZone: 'Mars/Olympus' },
        transport,
        scheduler,
        logger,
      });

      await sink.emitBatch([makeEvent()]);

      const { payload } = transport.requests[0];
      expect(payload.text).toBe('User 42 signed in');
      expect(payload.attachments).toEqual([
        expect.objectContaining({
          fields: [
            { title: 'Level', value: 'Information', short: false },
            { title: 'Timestamp', value: '2024-03-05 10:20:30.456 +00:00', short: false },
          ],
        }),
      ]);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should finish the current batch when switched off mid-batch', async () => {
      const activationSwitch = new SlackSinkActivationSwitch();
      transport.responder = async () => {
        activationSwitch.setInactive();
        return { status: 200, ok: true, body: 'ok' };
      };
      const sink = createSink({}, activationSwitch);

      const results = await sink.emitBatch([1, 2, 3].map(id => makeEvent({ properties: { UserId: id } })));
      const nextResults = await sink.emitBatch([makeEvent()]);

      expect(results).toEqual([true, true, true]);
      expect(nextResults).toEqual([]);
      expect(transport.requests).toHaveLength(3);
      expect(sink.getStats()).toMatchObject({ delivered: 3, discarded: 1 });
    });

    it('should be called with the batches the scheduler flushes', async () => {
      const sink = createSink();
      sink.emit(makeEvent());
      sink.emit(makeEvent());

      await sink.flush();

      expect(transport.requests).toHaveLength(2);
      expect(sink.getStats()).toEqual({ delivered: 2, failed: 0, discarded: 0, dropped: 0, queued: 0 });
    });
  });

  describe('dispose', () => {
    it('should flush pending events, then release the client and the transport', async () => {
      const client = new SlackWebhookClient({ webhookUrl: TEST_WEBHOOK_URL, timeoutMs: 2000, transport, logger });
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        transport,
        scheduler,
        logger,
        client,
      });
      sink.emit(makeEvent());

      await sink.dispose();

      expect(scheduler.stopped).toBe(true);
      expect(transport.requests).toHaveLength(1);
      expect(client.isDisposed).toBe(true);
      expect(transport.closeCalls).toBe(1);
    });

    it('should not create a transport of its own when a client is supplied', async () => {
      const close = vi.spyOn(UndiciHttpTransport.prototype, 'close');
      const client = new SlackWebhookClient({ webhookUrl: TEST_WEBHOOK_URL, timeoutMs: 2000, transport, logger });
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        scheduler,
        logger,
        client,
      });

      await sink.dispose();

      expect(client.isDisposed).toBe(true);
      expect(close).not.toHaveBeenCalled();
      expect(transport.closeCalls).toBe(0);
      close.mockRestore();
    });

    it('should release only once', async () => {
      const sink = createSink();

      await Promise.all([sink.dispose(), sink.dispose()]);
      await sink.dispose();

      expect(transport.closeCalls).toBe(1);
    });

    it('should close the transport when disposing the client throws', async () => {
      const client = new SlackWebhookClient({ webhookUrl: TEST_WEBHOOK_URL, timeoutMs: 2000, transport, logger });
      vi.spyOn(client, 'dispose').mockImplementation(() => {
        throw new Error('client dispose failed');
      });
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        transport,
        scheduler,
        logger,
        client,
      });

      await expect(sink.dispose()).rejects.toThrow('client dispose failed');
      expect(transport.closeCalls).toBe(1);
    });

    it('should dispose the client when closing the transport throws', async () => {
      const client = new SlackWebhookClient({ webhookUrl: TEST_WEBHOOK_URL, timeoutMs: 2000, transport, logger });
      transport.closeError = new Error('close failed');
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        transport,
        scheduler,
        logger,
        client,
      });

      await expect(sink.dispose()).rejects.toThrow('close failed');
      expect(client.isDisposed).toBe(true);
    });

    it('should report both failures together', async () => {
      const client = new SlackWebhookClient({ webhookUrl: TEST_WEBHOOK_URL, timeoutMs: 2000, transport, logger });
      vi.spyOn(client, 'dispose').mockImplementation(() => {
        throw new Error('client dispose failed');
      });
      transport.closeError = new Error('close failed');
      const sink = new SlackSink({
        options: resolveSlackSinkOptions({ webhookUrl: TEST_WEBHOOK_URL }),
        transport,
        scheduler,
        logger,
        client,
      });

      const failure = await sink.dispose().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(AggregateError);
      if (failure instanceof AggregateError) {
        expect(failure.errors.map((error: Error) => error.message)).toEqual(['client dispose failed', 'close failed']);
      }
    });
  });
});

describe('createSlackSink', () => {
  it('should resolve defaults and build a working sink', async () => {
    const transport = new FakeTransport();
    const scheduler = new ManualScheduler<LogEvent>();
    const sink = createSlackSink(
      { webhookUrl: TEST_WEBHOOK_URL, username: 'log-bot' },
      { transport, scheduler, logger: createTestLogger() }
    );

    sink.emit(makeEvent());
    await sink.dispose();

    expect(transport.requests[0].payload).toMatchObject({ username: 'log-bot', mrkdwn: true });
  });

  it('should reject invalid options', () => {
    expect(() => createSlackSink({ webhookUrl: 'not-a-url' })).toThrow(SinkConfigurationError);
  });
});
