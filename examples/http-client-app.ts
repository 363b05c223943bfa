/**
 * layerline - HTTP Client Example
 *
 * Fetches a page length through a mocked client, a given client, and the
 * same client wrapped with retry and host-rewrite decorators.
 */

import {
  FetchHttpClient,
  MockHttpClient,
  fetchPageLength,
  retryHttpClient,
  rewriteHostHttpClient,
  consoleLogger,
  toError,
  ILogger,
  IHttpClient,
} from '../src/index';

export interface HttpClientDemoOptions {
  logger?: ILogger;

  /** Client standing in for the network (default: FetchHttpClient with a 3s timeout) */
  client?: IHttpClient;
}

/**
 * Run every variant and return the page length each one saw (undefined on failure)
 */
export async function runHttpClientDemo(
  url: string,
  options: HttpClientDemoOptions = {},
): Promise<Record<string, number | undefined>> {
  const logger = options.logger ?? consoleLogger;
  const client = options.client ?? new FetchHttpClient({ timeoutMs: 3000 });

  const mock = new MockHttpClient(() => ({
    status: 200,
    headers: {},
    body: 'test response',
  }));

  // Answers with the host it was asked for
  const echoHost = new MockHttpClient((req) => ({ status: 200, headers: {}, body: req.url.host }));

  const variants: Record<string, IHttpClient> = {
    'mock-client': mock,
    'given-client': client,
    'retry-client': retryHttpClient(client, 3),
    'rewrite-client': rewriteHostHttpClient(echoHost, 'mirror.example.org'),
  };

  const lengths: Record<string, number | undefined> = {};
  for (const [method, variant] of Object.entries(variants)) {
    try {
      const n = await fetchPageLength(variant, url);
      logger.info(`Fetched page ${url} length using ${method} method: ${n}`);
      lengths[method] = n;
    } catch (error) {
      logger.error(`Failed to fetch page ${url} length using ${method} method: ${toError(error).message}`);
      lengths[method] = undefined;
    }
  }

  return lengths;
}

if (require.main === module) {
  runHttpClientDemo('http://www.example.com').catch((error: unknown) => {
    consoleLogger.error('HTTP client demo failed', error);
    process.exitCode = 1;
  });
}
