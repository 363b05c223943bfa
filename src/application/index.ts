/**
 * @module layerline/application
 * @description Application layer exports: logging port and the publishing,
 * HTTP and speaker examples built on the capability contract
 */

export * from './logging';
export * from './publishing';
export * from './http';
export * from './speaker';
