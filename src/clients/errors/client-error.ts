export interface ClientErrorOptions {
  clientName: string;
  message: string;
  statusCode?: number;
  cause?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Error raised or reported by outbound HTTP clients.
 *
 * The name is derived from the client (`SlackWebhook` -> `SlackWebhookError`),
 * `statusCode` is set when the remote answered with a non-success status and
 * the cause's stack is appended to this error's stack.
 */
export class ClientError extends Error {
  public readonly clientName: string;
  public readonly statusCode?: number;
  public readonly metadata?: Record<string, unknown>;

  constructor(options: ClientErrorOptions) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.clientName = options.clientName;
    this.statusCode = options.statusCode;
    this.metadata = options.metadata;
    this.name = `${options.clientName}Error`;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ClientError);
    }

    if (options.cause && options.cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }

  /**
   * True when the request never got an answer because the deadline passed,
   * here or in a wrapped ClientError.
   */
  get isTimeout(): boolean {
    if (this.cause instanceof ClientError) {
      return this.cause.isTimeout;
    }
    return this.cause instanceof Error && (this.cause.name === 'TimeoutError' || this.cause.name === 'AbortError');
  }
}
