/**
 * layerline - Multiplexing Decorator
 */

import type { ICapability } from '../../domain/capability';

/**
 * MultiplexDecorator - sends the same input to every target in order
 *
 * Targets are awaited one after another. The first rejection stops the
 * fan-out and is re-thrown as is; targets after the failing one are never
 * invoked. Results of the targets are discarded.
 *
 * @example
 * ```typescript
 * const all = new MultiplexDecorator([audit, primary, replica]);
 * await all.invoke('order-created');
 * ```
 */
export class MultiplexDecorator<TInput> implements ICapability<TInput, void> {
  private readonly targets: ReadonlyArray<ICapability<TInput, unknown>>;

  constructor(targets: ReadonlyArray<ICapability<TInput, unknown>>) {
    this.targets = [...targets];
  }

  /**
   * Number of wrapped targets
   */
  get size(): number {
    return this.targets.length;
  }

  async invoke(input: TInput): Promise<void> {
    for (const target of this.targets) {
      await target.invoke(input);
    }
  }
}
