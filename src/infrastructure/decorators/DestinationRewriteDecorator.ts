/**
 * layerline - Destination Rewrite Decorator
 */

import type { ICapability } from '../../domain/capability';
import { requireNonEmpty } from '../../domain/exceptions';
import { CapabilityDecoratorBase } from './CapabilityDecoratorBase';

/**
 * Knows how to re-address one input type
 */
export interface DestinationAccessor<TInput> {
  /**
   * Return a copy of the input addressed to the given destination
   */
  withDestination(input: TInput, destination: string): TInput;

  /**
   * Throw ConfigurationException when the destination cannot address this input type
   */
  validate?(destination: string): void;
}

/**
 * Destination rewrite options
 */
export interface DestinationRewriteOptions<TInput> {
  /** Replacement destination (a host for HTTP requests) */
  destination: string;

  /** Strategy that re-addresses an input */
  accessor: DestinationAccessor<TInput>;
}

/**
 * DestinationRewriteDecorator - re-addresses every input before delegating
 *
 * The inner capability receives the rewritten copy; the caller's input is
 * left as it was.
 *
 * @example
 * ```typescript
 * const staging = new DestinationRewriteDecorator(client, {
 *   destination: 'staging.internal:8080',
 *   accessor: hostRewrite,
 * });
 * ```
 */
export class DestinationRewriteDecorator<TInput, TOutput> extends CapabilityDecoratorBase<
  TInput,
  TOutput
> {
  readonly destination: string;
  private readonly accessor: DestinationAccessor<TInput>;

  constructor(inner: ICapability<TInput, TOutput>, options: DestinationRewriteOptions<TInput>) {
    super(inner);
    this.destination = requireNonEmpty('destination', options.destination);
    this.accessor = options.accessor;
    this.accessor.validate?.(this.destination);
  }

  async invoke(input: TInput): Promise<TOutput> {
    return this.inner.invoke(this.accessor.withDestination(input, this.destination));
  }
}
