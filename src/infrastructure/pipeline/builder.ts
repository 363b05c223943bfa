/**
 * layerline - Pipeline Utilities
 *
 * Utilities for stacking decorator layers around a leaf capability.
 */

import type { CapabilityLayer, ICapability } from '../../domain/capability';
import { requireNonEmpty, requirePositiveInteger } from '../../domain/exceptions';
import type { TransformFunction } from '../decorators/TransformDecorator';
import type { RetryOptions } from '../decorators/RetryDecorator';
import type { DestinationAccessor } from '../decorators/DestinationRewriteDecorator';
import { TransformDecorator } from '../decorators/TransformDecorator';
import { RetryDecorator } from '../decorators/RetryDecorator';
import { DestinationRewriteDecorator } from '../decorators/DestinationRewriteDecorator';

/**
 * Pipeline builder for composing decorator layers
 *
 * The first layer added is the outermost one: a call enters it first and
 * reaches the leaf last.
 *
 * @example
 * ```typescript
 * const client = createPipeline<HttpRequest, HttpResponse>()
 *   .use(withRetry({ retries: 3 }))
 *   .use(withDestination('staging.internal', hostRewrite))
 *   .build(new FetchHttpClient());
 * ```
 */
export class CapabilityPipelineBuilder<TInput, TOutput> {
  private layers: CapabilityLayer<TInput, TOutput>[] = [];

  /**
   * Add a layer below the ones already added
   */
  use(layer: CapabilityLayer<TInput, TOutput>): this {
    this.layers.push(layer);
    return this;
  }

  /**
   * Add a layer conditionally
   */
  useIf(condition: boolean | (() => boolean), layer: CapabilityLayer<TInput, TOutput>): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(layer);
    }
    return this;
  }

  /**
   * Add a layer as the new outermost one
   */
  prepend(layer: CapabilityLayer<TInput, TOutput>): this {
    this.layers.unshift(layer);
    return this;
  }

  /**
   * Add a layer at a specific position
   */
  insertAt(index: number, layer: CapabilityLayer<TInput, TOutput>): this {
    this.layers.splice(index, 0, layer);
    return this;
  }

  /**
   * Wrap the leaf in every layer and return the outermost capability
   */
  build(leaf: ICapability<TInput, TOutput>): ICapability<TInput, TOutput> {
    return this.layers.reduceRight<ICapability<TInput, TOutput>>(
      (inner, layer) => layer(inner),
      leaf,
    );
  }

  /**
   * Get the number of layers
   */
  get length(): number {
    return this.layers.length;
  }

  /**
   * Clear all layers
   */
  clear(): this {
    this.layers = [];
    return this;
  }
}

/**
 * Create a new pipeline builder
 */
export function createPipeline<TInput, TOutput>(): CapabilityPipelineBuilder<TInput, TOutput> {
  return new CapabilityPipelineBuilder<TInput, TOutput>();
}

/**
 * Wrap a leaf in the given layers, first layer outermost
 */
export function compose<TInput, TOutput>(
  leaf: ICapability<TInput, TOutput>,
  ...layers: Array<CapabilityLayer<TInput, TOutput>>
): ICapability<TInput, TOutput> {
  const pipeline = createPipeline<TInput, TOutput>();
  for (const layer of layers) {
    pipeline.use(layer);
  }
  return pipeline.build(leaf);
}

/**
 * Layer that maps every input before it is forwarded
 */
export function withTransform<TInput, TOutput>(
  transform: TransformFunction<TInput>,
): CapabilityLayer<TInput, TOutput> {
  return (inner) => new TransformDecorator(inner, transform);
}

/**
 * Layer with retry logic
 */
export function withRetry<TInput, TOutput>(options: RetryOptions): CapabilityLayer<TInput, TOutput> {
  // Fail where the pipeline is declared, not where it is built
  requirePositiveInteger('retries', options.retries);
  return (inner) => new RetryDecorator(inner, options);
}

/**
 * Layer that re-addresses every input
 */
export function withDestination<TInput, TOutput>(
  destination: string,
  accessor: DestinationAccessor<TInput>,
): CapabilityLayer<TInput, TOutput> {
  requireNonEmpty('destination', destination);
  accessor.validate?.(destination);
  return (inner) => new DestinationRewriteDecorator(inner, { destination, accessor });
}
