/**
 * layerline - Logging Module
 */

export { consoleLogger, nullLogger } from './logger';
export type { ILogger } from './logger';
