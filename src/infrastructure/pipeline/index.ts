/**
 * layerline - Pipeline Module
 *
 * Decorator layer composition utilities
 */

export {
  CapabilityPipelineBuilder,
  createPipeline,
  compose,
  withTransform,
  withRetry,
  withDestination,
} from './builder';
