import type { CredentialChain } from '../credentials/chain.js';
import type { FetchLike } from '../credentials/types.js';
import {
  CancelledError,
  InvalidResponseError,
  SecretResolverError,
  TimeoutError,
  UnavailableError,
  toError,
} from '../error.js';
import { forwardAbort, raceAbort } from './abort.js';

export interface HttpTransportConfig {
  baseUrl: string;
  apiVersion?: string;
  /** Per-call timeout in milliseconds */
  timeout: number;
  credentials: CredentialChain;
  fetch?: FetchLike;
}

export interface HttpRequest {
  method: 'GET' | 'PUT';
  /** Path relative to the base URL, or an absolute URL (paging links) */
  path: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
  /** Secret the request concerns, attached to any error raised */
  secretName?: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Authenticated JSON transport.
 *
 * Every call, token acquisition included, is bounded by the configured
 * timeout; a 401 drops the cached token and the request is replayed once
 * with a fresh one.
 */
export class HttpTransport {
  private readonly config: HttpTransportConfig;
  private readonly httpFetch: FetchLike;

  constructor(config: HttpTransportConfig) {
    this.config = {
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
    this.httpFetch = config.fetch ?? fetch;
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const url = this.buildUrl(req.path, req.query);

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);
    const detach = forwardAbort(req.signal, controller);

    try {
      const token = await raceAbort(this.config.credentials.resolve(), controller.signal);
      let response = await this.send(url, req, token.token, controller.signal);

      // Handle 401 - refresh token and retry once
      if (response.status === 401) {
        this.config.credentials.invalidate();
        const fresh = await raceAbort(this.config.credentials.resolve(), controller.signal);
        response = await this.send(url, req, fresh.token, controller.signal);
      }

      return await this.parseResponse(response, req.secretName);
    } catch (error) {
      // Failures classified on the way (credential chain, parsing) keep their type
      if (error instanceof SecretResolverError || !controller.signal.aborted) {
        throw error;
      }
      if (timedOut) {
        throw new TimeoutError({
          message: `Request timeout after ${this.config.timeout}ms`,
          timeoutMs: this.config.timeout,
          secretName: req.secretName,
          cause: toError(error),
        });
      }
      throw new CancelledError({
        message: 'Request cancelled by caller',
        secretName: req.secretName,
        cause: toError(error),
      });
    } finally {
      clearTimeout(timeoutId);
      detach();
    }
  }

  async get(path: string, options: Omit<HttpRequest, 'method' | 'path'> = {}): Promise<HttpResponse> {
    return this.request({ ...options, method: 'GET', path });
  }

  async put(
    path: string,
    body: unknown,
    options: Omit<HttpRequest, 'method' | 'path' | 'body'> = {}
  ): Promise<HttpResponse> {
    return this.request({ ...options, method: 'PUT', path, body });
  }

  private async send(
    url: string,
    req: HttpRequest,
    token: string,
    signal: AbortSignal
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Authorization': `Bearer ${token}`,
      'Accept': 'application/json',
      ...req.headers,
    };

    if (req.method === 'PUT' && req.body !== undefined) {
      headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
    }

    try {
      return await this.httpFetch(url, {
        method: req.method,
        headers,
        body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      throw new UnavailableError({
        message: `Request to ${new URL(url).host} failed: ${toError(error).message}`,
        secretName: req.secretName,
        cause: toError(error),
      });
    }
  }

  private async parseResponse(response: Response, secretName?: string): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const text = await response.text();
    let body: unknown = text;

    const contentType = response.headers.get('content-type');
    if (contentType && contentType.includes('application/json') && text) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new InvalidResponseError({
          message: `Response with status ${response.status} is not valid JSON`,
          statusCode: response.status,
          secretName,
          cause: toError(error),
        });
      }
    } else if (!text) {
      body = null;
    }

    return {
      status: response.status,
      headers,
      body,
    };
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    const url = /^https?:\/\//i.test(path)
      ? new URL(path)
      : new URL(`${this.config.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);

    if (this.config.apiVersion && !url.searchParams.has('api-version')) {
      url.searchParams.set('api-version', this.config.apiVersion);
    }

    if (query) {
      Object.entries(query).forEach(([key, value]) => {
        url.searchParams.set(key, value);
      });
    }

    return url.toString();
  }
}
