/**
 * layerline - Decorator Base
 *
 * Abstract base for decorators that wrap exactly one inner capability of
 * the same shape.
 */

import type { ICapability } from '../../domain/capability';

/**
 * Abstract base class for single-inner decorators
 *
 * @example
 * ```typescript
 * class TimingDecorator<I, O> extends CapabilityDecoratorBase<I, O> {
 *   async invoke(input: I): Promise<O> {
 *     const start = Date.now();
 *     try {
 *       return await this.inner.invoke(input);
 *     } finally {
 *       console.log(`Completed in ${Date.now() - start}ms`);
 *     }
 *   }
 * }
 * ```
 */
export abstract class CapabilityDecoratorBase<TInput, TOutput>
  implements ICapability<TInput, TOutput>
{
  constructor(protected readonly inner: ICapability<TInput, TOutput>) {}

  /**
   * Implement this method in derived classes
   */
  abstract invoke(input: TInput): Promise<TOutput>;
}
