/**
 * layerline - Page Length Use Case
 */

import { FetchHttpClient } from '../../infrastructure/http';
import { createRequest, type IHttpClient } from './IHttpClient';

/**
 * Fetch a page through the given client and return its size in bytes
 */
export async function fetchPageLength(client: IHttpClient, url: string): Promise<number> {
  const response = await client.invoke(createRequest('GET', url));
  return Buffer.byteLength(response.body, 'utf8');
}

/**
 * Fetch a page with a default FetchHttpClient
 */
export async function fetchPageLengthBasic(url: string): Promise<number> {
  return fetchPageLength(new FetchHttpClient(), url);
}
