/**
 * @fileoverview layerline - Decorator-composable capability interfaces
 * @description
 * A single-operation capability contract, leaves that perform an effect,
 * and decorators that wrap another implementer of the same contract to
 * transform, multiplex, batch, retry or re-address calls.
 *
 * @packageDocumentation
 * @module layerline
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

// ** 1. Capability Contract **
export { isCapability, createCapability, settle, toError } from './domain/capability';

export type {
  ICapability,
  CapabilityFunction,
  CapabilityLayer,
  OperationResult,
} from './domain/capability';

// ** 2. Exceptions **
export {
  ErrorCode,
  LayerlineException,
  ConfigurationException,
  TransformException,
  CallbackException,
  HttpTransportException,
} from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

// ** 1. Logging **
export { consoleLogger, nullLogger } from './application/logging';
export type { ILogger } from './application/logging';

// ** 2. Publishing **
export {
  MockPublisher,
  transformPublisher,
  multiPublisher,
  batchPublisher,
  titleCase,
} from './application/publishing';
export type { IPublisher, PublishFunction } from './application/publishing';

// ** 3. HTTP **
export {
  createRequest,
  MockHttpClient,
  fromString,
  hostRewrite,
  requireHost,
  retryHttpClient,
  rewriteHostHttpClient,
  fetchPageLength,
  fetchPageLengthBasic,
} from './application/http';
export type { HttpRequest, HttpResponse, IHttpClient, DoFunction } from './application/http';

// ** 4. Speaker **
export { Person, say, sayLoud, sayMute } from './application/speaker';
export type { SayFunction } from './application/speaker';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

// ** 1. Decorators **
export {
  CapabilityDecoratorBase,
  TransformDecorator,
  MultiplexDecorator,
  BatchingDecorator,
  joinWith,
  RetryDecorator,
  DestinationRewriteDecorator,
} from './infrastructure/decorators';

export type {
  TransformFunction,
  BatchingOptions,
  CombineFunction,
  RetryOptions,
  DestinationAccessor,
  DestinationRewriteOptions,
} from './infrastructure/decorators';

// ** 2. Pipeline **
export {
  CapabilityPipelineBuilder,
  createPipeline,
  compose,
  withTransform,
  withRetry,
  withDestination,
} from './infrastructure/pipeline';

// ** 3. Leaves **
export { ConsolePublisher, epochNanoseconds } from './infrastructure/publishing';
export type { ConsolePublisherOptions, EpochClock } from './infrastructure/publishing';

export { FetchHttpClient } from './infrastructure/http';
export type { HttpTransport, FetchHttpClientOptions } from './infrastructure/http';

// ==================== Version ====================
export const VERSION = '1.0.0';
