/**
 * layerline - Retry Decorator
 *
 * Re-attempts a failing inner call a fixed number of times. Attempts are
 * immediate unless a delay is configured.
 */

import type { ICapability } from '../../domain/capability';
import {
  CallbackException,
  requireNonNegative,
  requirePositiveInteger,
} from '../../domain/exceptions';
import { nullLogger, type ILogger } from '../../application/logging';
import { CapabilityDecoratorBase } from './CapabilityDecoratorBase';

/**
 * Retry decorator options
 */
export interface RetryOptions {
  /** Total number of attempts, including the first one */
  retries: number;

  /** Wait between attempts in milliseconds (default: 0) */
  delayMs?: number;

  /**
   * Return false to stop retrying and re-throw the error at once.
   * A throwing predicate rejects the call with CallbackException.
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  /** Receives a debug line per failed attempt and a warning on exhaustion */
  logger?: ILogger;
}

/**
 * RetryDecorator - attempts the inner call up to `retries` times
 *
 * The first success is returned immediately. When every attempt fails the
 * error of the last attempt is re-thrown unchanged. A retry count below 1
 * is rejected at construction with ConfigurationException.
 *
 * @example
 * ```typescript
 * const client = new RetryDecorator(httpClient, { retries: 3 });
 * const response = await client.invoke(request);
 * ```
 */
export class RetryDecorator<TInput, TOutput> extends CapabilityDecoratorBase<TInput, TOutput> {
  private readonly retries: number;
  private readonly delayMs: number;
  private readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  private readonly logger: ILogger;

  constructor(inner: ICapability<TInput, TOutput>, options: RetryOptions) {
    super(inner);
    const { retries, delayMs = 0, shouldRetry = () => true, logger = nullLogger } = options;

    this.retries = requirePositiveInteger('retries', retries);
    this.delayMs = requireNonNegative('delayMs', delayMs);
    this.shouldRetry = shouldRetry;
    this.logger = logger;
  }

  /**
   * Configured number of attempts
   */
  get attempts(): number {
    return this.retries;
  }

  async invoke(input: TInput): Promise<TOutput> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        return await this.inner.invoke(input);
      } catch (error) {
        lastError = error;
        this.logger.debug(`Attempt ${attempt}/${this.retries} failed`, error);

        if (attempt === this.retries) {
          break;
        }

        if (!this.retryAllowed(error, attempt)) {
          throw error;
        }

        if (this.delayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.delayMs));
        }
      }
    }

    this.logger.warn(`All ${this.retries} attempts failed`);
    throw lastError;
  }

  private retryAllowed(error: unknown, attempt: number): boolean {
    try {
      return this.shouldRetry(error, attempt);
    } catch (callbackError) {
      throw new CallbackException('shouldRetry', callbackError);
    }
  }
}
