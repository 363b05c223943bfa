/**
 * layerline - Fetch HTTP Client
 *
 * Leaf IHttpClient performing real requests through a fetch-shaped
 * transport (the platform fetch by default).
 */

import type { HttpRequest, HttpResponse, IHttpClient } from '../../application/http/IHttpClient';
import { HttpTransportException, requireNonNegative } from '../../domain/exceptions';
import { nullLogger, type ILogger } from '../../application/logging';

/**
 * fetch-shaped transport
 */
export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Fetch client options
 */
export interface FetchHttpClientOptions {
  /** Transport performing the call (default: global fetch) */
  transport?: HttpTransport;

  /** Abort the call after this many milliseconds */
  timeoutMs?: number;

  logger?: ILogger;
}

/**
 * FetchHttpClient - IHttpClient over fetch
 *
 * Non-2xx statuses are returned as responses, not errors. A transport
 * failure (DNS, connection reset, timeout), including one while the body
 * is read, rejects with HttpTransportException carrying the original
 * error as `cause`.
 */
export class FetchHttpClient implements IHttpClient {
  private readonly transport: HttpTransport;
  private readonly timeoutMs?: number;
  private readonly logger: ILogger;

  constructor(options: FetchHttpClientOptions = {}) {
    this.transport = options.transport ?? ((url, init) => fetch(url, init));
    this.timeoutMs =
      options.timeoutMs === undefined ? undefined : requireNonNegative('timeoutMs', options.timeoutMs);
    this.logger = options.logger ?? nullLogger;
  }

  async invoke(request: HttpRequest): Promise<HttpResponse> {
    const url = request.url.href;
    this.logger.debug(`${request.method} ${url}`);

    try {
      const response = await this.transport(url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });

      // The body streams in after the status line, so reading it can still fail
      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return { status: response.status, headers, body };
    } catch (error) {
      throw new HttpTransportException(request.method, url, error);
    }
  }
}
