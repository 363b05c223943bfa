/**
 * @module layerline/domain
 * @description Domain layer exports
 */

// ============================================================================
// Capability Contract
// ============================================================================

export * from './capability';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
