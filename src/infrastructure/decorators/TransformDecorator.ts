/**
 * layerline - Transform Decorator
 */

import { toError, type ICapability } from '../../domain/capability';
import { TransformException } from '../../domain/exceptions';
import { CapabilityDecoratorBase } from './CapabilityDecoratorBase';

/**
 * Pure mapping applied to every input before it is forwarded
 */
export type TransformFunction<TInput> = (input: TInput) => TInput;

/**
 * TransformDecorator - maps the input, then delegates
 *
 * The inner result is returned unmodified and inner errors propagate
 * unchanged. A throwing transform rejects with TransformException and the
 * inner capability is not called.
 *
 * @example
 * ```typescript
 * const loud = new TransformDecorator(publisher, (msg: string) => msg.toUpperCase());
 * await loud.invoke('hello'); // publisher receives 'HELLO'
 * ```
 */
export class TransformDecorator<TInput, TOutput> extends CapabilityDecoratorBase<TInput, TOutput> {
  constructor(
    inner: ICapability<TInput, TOutput>,
    private readonly transform: TransformFunction<TInput>,
  ) {
    super(inner);
  }

  async invoke(input: TInput): Promise<TOutput> {
    let transformed: TInput;
    try {
      transformed = this.transform(input);
    } catch (error) {
      throw new TransformException(`Transform failed: ${toError(error).message}`, error);
    }

    return this.inner.invoke(transformed);
  }
}
