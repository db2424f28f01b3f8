import { ClientError } from './errors/client-error.js';
import type { Logger } from '../types/logger.types.js';

/**
 * Base class for outbound clients
 *
 * Provides:
 * - A logger child bound to the client name
 * - Standardized ClientError creation
 * - Disposal bookkeeping
 */
export abstract class BaseClient {
  protected readonly clientName: string;
  protected readonly logger: Logger;
  private disposed = false;

  protected constructor(clientName: string, logger: Logger) {
    this.clientName = clientName;
    this.logger = logger.child({ client: clientName });
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    this.disposed = true;
  }

  protected createError(
    message: string,
    options: { cause?: Error; statusCode?: number; metadata?: Record<string, unknown> } = {}
  ): ClientError {
    return new ClientError({
      clientName: this.clientName,
      message,
      cause: options.cause,
      statusCode: options.statusCode,
      metadata: options.metadata,
    });
  }
}
