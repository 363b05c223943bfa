/**
 * layerline - Batching Decorator
 *
 * Accumulates inputs and forwards them downstream as one aggregate once
 * the configured batch size is reached. There is no time-based flush: a
 * partially filled batch stays buffered until more calls arrive or
 * flush() is called.
 */

import { toError, type ICapability } from '../../domain/capability';
import { TransformException, requirePositiveInteger } from '../../domain/exceptions';
import { nullLogger, type ILogger } from '../../application/logging';

/**
 * Combines a full batch into the aggregate forwarded downstream
 */
export type CombineFunction<TInput, TAggregate> = (inputs: readonly TInput[]) => TAggregate;

/**
 * Batching decorator options
 */
export interface BatchingOptions<TInput, TAggregate> {
  /** Number of inputs per forwarded batch */
  batchSize: number;

  /** Combination policy for a batch */
  combine: CombineFunction<TInput, TAggregate>;

  /** Receives a debug line per flush */
  logger?: ILogger;
}

/**
 * Combination policy joining strings in call order
 */
export function joinWith(delimiter: string = ','): CombineFunction<string, string> {
  return (inputs) => inputs.join(delimiter);
}

/**
 * BatchingDecorator - absorbs inputs until a batch is full
 *
 * Calls below the threshold resolve with undefined without touching the
 * inner capability. The call that fills the batch clears the buffer,
 * forwards exactly one aggregate and resolves with the inner result.
 * The buffer is appended to and cleared synchronously, so it never holds
 * more than batchSize entries. Overlapping calls on one instance are only
 * defined in terms of call order.
 *
 * @example
 * ```typescript
 * const batched = new BatchingDecorator(publisher, {
 *   batchSize: 3,
 *   combine: joinWith(','),
 * });
 *
 * await batched.invoke('a');
 * await batched.invoke('b');
 * await batched.invoke('c'); // publisher receives 'a,b,c'
 * ```
 */
export class BatchingDecorator<TInput, TAggregate, TOutput>
  implements ICapability<TInput, TOutput | undefined>
{
  private buffer: TInput[] = [];
  private readonly batchSize: number;
  private readonly combine: CombineFunction<TInput, TAggregate>;
  private readonly logger: ILogger;

  constructor(
    private readonly inner: ICapability<TAggregate, TOutput>,
    options: BatchingOptions<TInput, TAggregate>,
  ) {
    this.batchSize = requirePositiveInteger('batchSize', options.batchSize);
    this.combine = options.combine;
    this.logger = options.logger ?? nullLogger;
  }

  /**
   * Number of inputs waiting for the batch to fill
   */
  get pending(): number {
    return this.buffer.length;
  }

  async invoke(input: TInput): Promise<TOutput | undefined> {
    this.buffer.push(input);

    if (this.buffer.length < this.batchSize) {
      return undefined;
    }

    return this.forward();
  }

  /**
   * Forward whatever is buffered as one aggregate.
   * Resolves with undefined and forwards nothing when the buffer is empty.
   */
  async flush(): Promise<TOutput | undefined> {
    if (this.buffer.length === 0) {
      return undefined;
    }

    return this.forward();
  }

  private async forward(): Promise<TOutput> {
    const batch = this.buffer;
    this.buffer = [];

    let aggregate: TAggregate;
    try {
      aggregate = this.combine(batch);
    } catch (error) {
      throw new TransformException(`Batch combine failed: ${toError(error).message}`, error);
    }

    this.logger.debug(`Flushing batch of ${batch.length}`);
    return this.inner.invoke(aggregate);
  }
}
