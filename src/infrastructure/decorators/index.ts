/**
 * layerline - Decorator Module
 *
 * Decorators implementing ICapability around an inner implementer:
 * - **Transform**: map the input before delegating
 * - **Multiplex**: fan the same input out to several targets, stopping on the first failure
 * - **Batching**: buffer inputs and forward one aggregate per full batch
 * - **Retry**: re-attempt a failing call a fixed number of times
 * - **Destination Rewrite**: re-address the input before delegating
 */

export { CapabilityDecoratorBase } from './CapabilityDecoratorBase';
export { TransformDecorator } from './TransformDecorator';
export { MultiplexDecorator } from './MultiplexDecorator';
export { BatchingDecorator, joinWith } from './BatchingDecorator';
export { RetryDecorator } from './RetryDecorator';
export { DestinationRewriteDecorator } from './DestinationRewriteDecorator';

export type { TransformFunction } from './TransformDecorator';
export type { BatchingOptions, CombineFunction } from './BatchingDecorator';
export type { RetryOptions } from './RetryDecorator';
export type {
  DestinationAccessor,
  DestinationRewriteOptions,
} from './DestinationRewriteDecorator';
