/**
 * layerline - HTTP Client Port
 *
 * Request/response specialization of ICapability. Any transport, test
 * double or decorator implementing IHttpClient can be handed to code that
 * needs to perform requests.
 */

import type { ICapability } from '../../domain/capability';
import { ConfigurationException, requireNonEmpty } from '../../domain/exceptions';
import {
  DestinationRewriteDecorator,
  RetryDecorator,
  type DestinationAccessor,
} from '../../infrastructure/decorators';

/**
 * Outgoing request
 */
export interface HttpRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * Response with the body read into memory
 */
export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/**
 * General interface for HTTP clients
 */
export type IHttpClient = ICapability<HttpRequest, HttpResponse>;

/**
 * Behavior injected into a MockHttpClient
 */
export type DoFunction = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * Build a request. Header names are lower-cased.
 * Throws TypeError when the URL cannot be parsed.
 */
export function createRequest(
  method: string,
  url: string | URL,
  init: { headers?: Record<string, string>; body?: string } = {},
): HttpRequest {
  return {
    method: method.toUpperCase(),
    url: new URL(url),
    headers: Object.fromEntries(
      Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value]),
    ),
    body: init.body,
  };
}

/**
 * MockHttpClient - HTTP client whose behavior is a function-valued field
 *
 * @example
 * ```typescript
 * const client = new MockHttpClient(() => ({
 *   status: 503,
 *   headers: {},
 *   body: 'unavailable',
 * }));
 * ```
 */
export class MockHttpClient implements IHttpClient {
  constructor(public doFn: DoFunction) {}

  async invoke(request: HttpRequest): Promise<HttpResponse> {
    return this.doFn(request);
  }
}

/**
 * HTTP client that always answers with the given body
 */
export function fromString(body: string, status: number = 200): IHttpClient {
  return new MockHttpClient(() => ({ status, headers: {}, body }));
}

/**
 * Require a bare `host[:port]` with nothing the URL host setter would drop
 */
export function requireHost(option: string, host: string): string {
  requireNonEmpty(option, host);

  const invalid = () =>
    new ConfigurationException(option, `${option} must be a host[:port], got ${host}`, host);

  if (/[\s/?#@\\]/.test(host)) {
    throw invalid();
  }

  let parsed: URL;
  try {
    parsed = new URL(`http://${host}`);
  } catch {
    throw invalid();
  }

  if (parsed.pathname !== '/' || parsed.search !== '' || parsed.hash !== '') {
    throw invalid();
  }
  return host;
}

/**
 * Re-addresses a request to another host (host[:port]).
 * A `host` header, in any letter case, is replaced as well.
 */
export const hostRewrite: DestinationAccessor<HttpRequest> = {
  withDestination(request, host) {
    requireHost('host', host);

    const url = new URL(request.url.href);
    url.host = host;

    const expected = new URL(`${url.protocol}//${host}`);
    if (url.host !== expected.host) {
      throw new ConfigurationException(
        'host',
        `Cannot address ${url.protocol} request to ${host}`,
        host,
      );
    }

    const names = Object.keys(request.headers);
    if (!names.some((name) => name.toLowerCase() === 'host')) {
      return { ...request, url };
    }

    const headers: Record<string, string> = { host: url.host };
    for (const name of names) {
      if (name.toLowerCase() !== 'host') {
        headers[name] = request.headers[name];
      }
    }
    return { ...request, url, headers };
  },

  validate(host) {
    requireHost('host', host);
  },
};

/**
 * Wrap an HTTP client with retry functionality
 */
export function retryHttpClient(client: IHttpClient, retries: number): IHttpClient {
  return new RetryDecorator(client, { retries });
}

/**
 * Rewrite the host of any request passing through
 */
export function rewriteHostHttpClient(client: IHttpClient, host: string): IHttpClient {
  return new DestinationRewriteDecorator(client, { destination: host, accessor: hostRewrite });
}
