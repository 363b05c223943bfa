/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Decorators, layer composition, and the leaf implementers that perform
 * real effects:
 *
 * - **Decorators**: Transform, Multiplex, Batching, Retry, Destination Rewrite
 * - **Pipeline**: Builder stacking layers around a leaf
 * - **Leaves**: ConsolePublisher and FetchHttpClient
 *
 * @packageDocumentation
 * @module layerline/infrastructure
 *
 * @example
 * ```typescript
 * import {
 *   ConsolePublisher,
 *   BatchingDecorator,
 *   joinWith,
 * } from 'layerline/infrastructure';
 *
 * const batched = new BatchingDecorator(new ConsolePublisher('dest-1'), {
 *   batchSize: 3,
 *   combine: joinWith(','),
 * });
 * ```
 */

export * from './decorators';
export * from './pipeline';
export * from './publishing';
export * from './http';
