import { Agent, fetch, type Dispatcher } from 'undici';
import { ClientError } from './errors/client-error.js';

export interface HttpPostOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface HttpTransportResponse {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * Minimal HTTP transport shared by every request of one sink.
 * `post` rejects with a ClientError when no response arrives (network
 * error, timeout); any HTTP status resolves.
 */
export interface HttpTransport {
  post(url: string, body: string, options: HttpPostOptions): Promise<HttpTransportResponse>;
  close(): Promise<void>;
}

export interface UndiciHttpTransportOptions {
  /** Use an existing dispatcher (e.g. a MockAgent). It is closed by `close()` as well. */
  dispatcher?: Dispatcher;
  /** Keep-alive connections per origin */
  connections?: number;
  keepAliveTimeoutMs?: number;
  userAgent?: string;
}

export class UndiciHttpTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly userAgent: string;
  private closed = false;

  constructor(options: UndiciHttpTransportOptions = {}) {
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connections: options.connections ?? 8,
        keepAliveTimeout: options.keepAliveTimeoutMs ?? 10_000,
      });
    this.userAgent = options.userAgent ?? 'slack-webhook-log-sink/1.0.0';
  }

  async post(url: string, body: string, options: HttpPostOptions): Promise<HttpTransportResponse> {
    if (this.closed) {
      throw new ClientError({ clientName: 'HttpTransport', message: 'Transport is closed' });
    }

    const signal = AbortSignal.timeout(options.timeoutMs);
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': this.userAgent,
          ...options.headers,
        },
        body,
        dispatcher: this.dispatcher,
        signal,
      });

      return {
        status: response.status,
        ok: response.ok,
        body: await response.text(),
      };
    } catch (error) {
      const timedOut = signal.aborted;
      const cause = toCause(error, timedOut);
      throw new ClientError({
        clientName: 'HttpTransport',
        message: timedOut ? `Request timed out after ${options.timeoutMs}ms` : `Request failed: ${cause.message}`,
        cause,
        metadata: { host: safeHost(url), timeoutMs: options.timeoutMs },
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.dispatcher.close();
  }
}

function toCause(error: unknown, timedOut: boolean): Error {
  if (error instanceof Error) {
    return error;
  }
  const cause = new Error(String(error));
  if (timedOut) {
    cause.name = 'TimeoutError';
  }
  return cause;
}

export function safeHost(url: string): string | undefined {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
}
