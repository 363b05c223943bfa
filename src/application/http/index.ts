/**
 * layerline - HTTP Module
 */

export {
  createRequest,
  MockHttpClient,
  fromString,
  hostRewrite,
  requireHost,
  retryHttpClient,
  rewriteHostHttpClient,
} from './IHttpClient';
export { fetchPageLength, fetchPageLengthBasic } from './fetchPageLength';

export type { HttpRequest, HttpResponse, IHttpClient, DoFunction } from './IHttpClient';
