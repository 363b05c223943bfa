/**
 * layerline - Console Publisher
 *
 * Leaf IPublisher that "publishes" by writing a line to a logger.
 */

import type { IPublisher } from '../../application/publishing/IPublisher';
import { requireNonEmpty } from '../../domain/exceptions';
import { consoleLogger, type ILogger } from '../../application/logging';

/**
 * Returns the current time in nanoseconds since the epoch
 */
export type EpochClock = () => bigint;

const epochOriginNs = BigInt(Date.now()) * 1_000_000n;
const hrtimeOriginNs = process.hrtime.bigint();

/**
 * Epoch nanoseconds: the wall clock read once at load, advanced by
 * process.hrtime.bigint() so consecutive readings keep nanosecond resolution
 */
export const epochNanoseconds: EpochClock = () =>
  epochOriginNs + (process.hrtime.bigint() - hrtimeOriginNs);

/**
 * Console publisher options
 */
export interface ConsolePublisherOptions {
  /** Sink for published lines (default: consoleLogger) */
  logger?: ILogger;

  clock?: EpochClock;
}

/**
 * ConsolePublisher - writes `[<ns>] Publishing message to <dest>: <msg>`
 *
 * @example
 * ```typescript
 * const publisher = new ConsolePublisher('dest-1');
 * await publisher.invoke('hello');
 * // [INFO] [1760000000000000000] Publishing message to dest-1: hello
 * ```
 */
export class ConsolePublisher implements IPublisher {
  readonly destination: string;
  private readonly logger: ILogger;
  private readonly clock: EpochClock;

  constructor(destination: string, options: ConsolePublisherOptions = {}) {
    this.destination = requireNonEmpty('destination', destination);
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? epochNanoseconds;
  }

  async invoke(message: string): Promise<void> {
    this.logger.info(`[${this.clock()}] Publishing message to ${this.destination}: ${message}`);
  }
}
