import { describe, it, expect } from 'vitest';
import { ClientError } from '../clients/errors/client-error.js';

describe('ClientError', () => {
  describe('constructor', () => {
    it('should create error with client name and message', () => {
      const error = new ClientError({
        clientName: 'SlackWebhook',
        message: 'Slack webhook answered 500',
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ClientError);
      expect(error.name).toBe('SlackWebhookError');
      expect(error.message).toBe('Slack webhook answered 500');
      expect(error.clientName).toBe('SlackWebhook');
      expect(error.statusCode).toBeUndefined();
    });

    it('should format client name correctly in error name', () => {
      expect(new ClientError({ clientName: 'HttpTransport', message: 'x' }).name).toBe('HttpTransportError');
    });

    it('should include cause error if provided', () => {
      const cause = new Error('socket hang up');
      const error = new ClientError({
        clientName: 'HttpTransport',
        message: 'Request failed: socket hang up',
        cause,
      });

      expect(error.cause).toBe(cause);
      expect(error.stack).toContain('Caused by:');
      expect(error.stack).toContain('socket hang up');
    });

    it('should keep status code and metadata', () => {
      const metadata = { channel: '#alerts', host: 'hooks.example.test' };
      const error = new ClientError({
        clientName: 'SlackWebhook',
        message: 'Slack webhook answered 404',
        statusCode: 404,
        metadata,
      });

      expect(error.statusCode).toBe(404);
      expect(error.metadata).toEqual(metadata);
    });
  });

  describe('isTimeout', () => {
    it('should be true when the cause is a timeout', () => {
      const cause = new Error('The operation was aborted due to timeout');
      cause.name = 'TimeoutError';

      expect(new ClientError({ clientName: 'HttpTransport', message: 'timed out', cause }).isTimeout).toBe(true);
    });

    it('should follow a wrapped client error to its timeout', () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      const transportError = new ClientError({ clientName: 'HttpTransport', message: 'timed out', cause: timeout });
      const wrapped = new ClientError({ clientName: 'SlackWebhook', message: 'request failed', cause: transportError });

      expect(wrapped.isTimeout).toBe(true);
      expect(
        new ClientError({
          clientName: 'SlackWebhook',
          message: 'request failed',
          cause: new ClientError({ clientName: 'HttpTransport', message: 'refused' }),
        }).isTimeout
      ).toBe(false);
    });

    it('should be false for other failures', () => {
      const cause = new Error('connection refused');

      expect(new ClientError({ clientName: 'HttpTransport', message: 'failed', cause }).isTimeout).toBe(false);
      expect(new ClientError({ clientName: 'HttpTransport', message: 'failed' }).isTimeout).toBe(false);
    });
  });
});
