/**
 * layerline - Publisher Port
 *
 * Publishing specialization of ICapability plus a mockable implementation
 * and the decorator helpers used by composition roots.
 */

import type { ICapability } from '../../domain/capability';
import {
  BatchingDecorator,
  MultiplexDecorator,
  TransformDecorator,
  joinWith,
  type TransformFunction,
} from '../../infrastructure/decorators';

/**
 * Publishes basic string messages
 */
export type IPublisher = ICapability<string, void>;

/**
 * Behavior injected into a MockPublisher
 */
export type PublishFunction = (message: string) => void | Promise<void>;

/**
 * MockPublisher - publisher whose behavior is a function-valued field
 *
 * @example
 * ```typescript
 * const failing = new MockPublisher((msg) => {
 *   throw new Error(`failed to send msg: ${msg}`);
 * });
 * ```
 */
export class MockPublisher implements IPublisher {
  constructor(public publishFn: PublishFunction) {}

  async invoke(message: string): Promise<void> {
    await this.publishFn(message);
  }
}

/**
 * Wrap a publisher with a message transform
 */
export function transformPublisher(
  publisher: IPublisher,
  transform: TransformFunction<string>,
): IPublisher {
  return new TransformDecorator(publisher, transform);
}

/**
 * Wrap several publishers into one; stops at the first failing publisher
 */
export function multiPublisher(...publishers: IPublisher[]): IPublisher {
  return new MultiplexDecorator(publishers);
}

/**
 * Batch messages and publish each full batch as one comma-joined message
 */
export function batchPublisher(
  publisher: IPublisher,
  batchSize: number,
): BatchingDecorator<string, string, void> {
  return new BatchingDecorator(publisher, { batchSize, combine: joinWith(',') });
}

/**
 * Capitalize the first letter of every word; letters and digits of any
 * script belong to a word
 */
export function titleCase(message: string): string {
  return message.replace(
    /(^|[^\p{L}\p{N}_])(\p{Ll})/gu,
    (_match, separator: string, letter: string) => separator + letter.toUpperCase(),
  );
}
