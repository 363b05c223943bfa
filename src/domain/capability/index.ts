/**
 * layerline - Capability Module
 *
 * The capability contract and helpers for inline implementers
 */

export {
  isCapability,
  createCapability,
  settle,
  toError,
} from './ICapability';

export type {
  ICapability,
  CapabilityFunction,
  CapabilityLayer,
  OperationResult,
} from './ICapability';
