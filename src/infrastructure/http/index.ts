/**
 * layerline - HTTP Transport Module
 */

export { FetchHttpClient } from './FetchHttpClient';
export type { HttpTransport, FetchHttpClientOptions } from './FetchHttpClient';
