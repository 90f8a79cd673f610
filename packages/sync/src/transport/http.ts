import {
  ConfigurationError,
  SyncCancelledError,
  TransportError,
  formatETag,
  resolveLogger,
  toError,
  type Logger,
  type SyncEntity,
} from '@tablesync/core';
import type { z } from 'zod';
import { linkSignals } from '../cancellation.js';
import {
  pageSchema,
  remoteEntitySchema,
  type FetchFunction,
  type Page,
  type PageQuery,
  type RemoteTransport,
  type ServiceResponse,
  type TransportConfig,
} from './types.js';

interface RequestOptions {
  body?: unknown;
  ifMatch?: string | null;
  signal?: AbortSignal;
}

/** Response with its body already read */
interface ReceivedResponse {
  status: number;
  ok: boolean;
  etag: string | null;
  text: string;
}

/**
 * Table service client over HTTP.
 *
 * ## Wire protocol
 *
 * | Operation | Request |
 * |-----------|---------|
 * | page      | `GET {endpoint}?$filter=..&$orderby=..&$top=..&$count=true&__includedeleted=true` |
 * | create    | `POST {endpoint}` |
 * | replace   | `PUT {endpoint}/{id}` with `If-Match: "<version>"` |
 * | delete    | `DELETE {endpoint}/{id}` with `If-Match: "<version>"` |
 *
 * Any HTTP status is returned as a {@link ServiceResponse}. A request
 * that produced no response throws a retryable `TransportError`
 * (`TS_N200`, or `TS_N201` after `timeout` ms); a 2xx body that is not
 * what the protocol promises throws a non-retryable one (`TS_N202`).
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: 'https://api.example.com/',
 *   authToken: 'user-token',
 * });
 *
 * const page = await transport.getPage('tables/todos', {
 *   orderBy: 'updatedAt,id',
 *   top: 100,
 *   includeDeleted: true,
 *   count: true,
 * });
 * ```
 */
export class HttpTransport implements RemoteTransport {
  private readonly config: Required<Omit<TransportConfig, 'logger'>>;
  private readonly logger: Logger;

  constructor(config: TransportConfig) {
    if (!config.baseUrl) {
      throw new ConfigurationError([{ path: 'baseUrl', message: 'is required' }], 'TS_C101');
    }
    if (!isAbsoluteUrl(config.baseUrl)) {
      throw new ConfigurationError([
        { path: 'baseUrl', message: `"${config.baseUrl}" is not an absolute URL` },
      ]);
    }
    if (config.timeout !== undefined && !(config.timeout > 0)) {
      throw new ConfigurationError([{ path: 'timeout', message: 'must be a positive number' }]);
    }

    this.config = {
      baseUrl: config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`,
      authToken: config.authToken ?? '',
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
      fetch: config.fetch ?? defaultFetch,
    };
    this.logger = resolveLogger(config.logger, 'HttpTransport');
  }

  async getPage(
    endpoint: string,
    query: PageQuery,
    signal?: AbortSignal
  ): Promise<ServiceResponse<Page>> {
    const url = this.resolve(endpoint);
    if (query.filter) {
      url.searchParams.set('$filter', query.filter);
    }
    url.searchParams.set('$orderby', query.orderBy);
    url.searchParams.set('$top', String(query.top));
    if (query.count) {
      url.searchParams.set('$count', 'true');
    }
    if (query.includeDeleted) {
      url.searchParams.set('__includedeleted', 'true');
    }

    const response = await this.send('GET', url, { signal });
    return this.toServiceResponse(response, url, pageSchema);
  }

  async create(
    endpoint: string,
    entity: SyncEntity,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>> {
    const url = this.resolve(endpoint);
    const response = await this.send('POST', url, { body: entity, signal });
    return this.toServiceResponse(response, url, remoteEntitySchema);
  }

  async replace(
    endpoint: string,
    entity: SyncEntity,
    version: string | null,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>> {
    const url = this.resolve(endpoint, entity.id);
    const response = await this.send('PUT', url, { body: entity, ifMatch: version, signal });
    return this.toServiceResponse(response, url, remoteEntitySchema);
  }

  async delete(
    endpoint: string,
    id: string,
    version: string | null,
    signal?: AbortSignal
  ): Promise<ServiceResponse<SyncEntity>> {
    const url = this.resolve(endpoint, id);
    const response = await this.send('DELETE', url, { ifMatch: version, signal });
    return this.toServiceResponse(response, url, remoteEntitySchema);
  }

  private resolve(endpoint: string, id?: string): URL {
    const path =
      id === undefined ? endpoint : `${endpoint.replace(/\/+$/, '')}/${encodeURIComponent(id)}`;
    return new URL(path, this.config.baseUrl);
  }

  /**
   * Sends the request and reads the body. The timeout and the caller's
   * signal cover both.
   */
  private async send(
    method: string,
    url: URL,
    options: RequestOptions
  ): Promise<ReceivedResponse> {
    const timeout = new AbortController();
    const linked = linkSignals(options.signal, timeout.signal);
    const timer = setTimeout(() => timeout.abort(), this.config.timeout);

    try {
      const response = await this.config.fetch(url.toString(), {
        method,
        headers: this.getHeaders(options),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: linked.signal,
      });
      const text = await readText(response, linked.signal);
      this.logger.debug('Request completed', {
        method,
        url: url.toString(),
        status: response.status,
      });
      return {
        status: response.status,
        ok: response.ok,
        etag: response.headers.get('etag'),
        text,
      };
    } catch (error) {
      const cause = toError(error);

      if (options.signal?.aborted) {
        throw new SyncCancelledError(`${method} ${url.pathname} cancelled`, cause);
      }

      if (timeout.signal.aborted) {
        this.logger.warn('Request timed out', { method, url: url.toString() });
        throw new TransportError(
          'TS_N201',
          `${method} ${url.pathname} timed out after ${this.config.timeout}ms`,
          { method, url: url.toString(), timeout: this.config.timeout },
          cause
        );
      }

      this.logger.warn('Request failed', { method, url: url.toString(), error: cause.message });
      throw new TransportError(
        'TS_N200',
        `${method} ${url.pathname} failed: ${cause.message}`,
        { method, url: url.toString() },
        cause
      );
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }
  }

  private toServiceResponse<S extends z.ZodTypeAny>(
    response: ReceivedResponse,
    url: URL,
    schema: S
  ): ServiceResponse<z.output<S>> {
    const { etag } = response;
    const body = parseJson(response, url);

    if (!response.ok) {
      // Error bodies are informational; 409 and 412 carry the server entity
      const parsed = body === null ? null : schema.safeParse(body);
      return {
        status: response.status,
        isSuccessful: false,
        content: parsed?.success ? parsed.data : null,
        etag,
      };
    }

    if (body === null) {
      return { status: response.status, isSuccessful: true, content: null, etag };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        'TS_N202',
        `Unexpected response body from ${url.pathname}`,
        { url: url.toString(), status: response.status, issues: parsed.error.issues },
        undefined,
        false
      );
    }

    return { status: response.status, isSuccessful: true, content: parsed.data, etag };
  }

  private getHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.headers,
    };

    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    if (options.ifMatch) {
      headers['If-Match'] = formatETag(options.ifMatch);
    }

    if (this.config.authToken) {
      headers.Authorization = `Bearer ${this.config.authToken}`;
    }

    return headers;
  }
}

function parseJson(response: ReceivedResponse, url: URL): unknown {
  if (response.text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(response.text);
  } catch (error) {
    if (!response.ok) {
      return null;
    }
    throw new TransportError(
      'TS_N202',
      `Response from ${url.pathname} is not JSON`,
      { url: url.toString(), status: response.status },
      toError(error),
      false
    );
  }
}

/**
 * Reads the body, giving up when the signal aborts. A custom fetch may
 * hand back a body that ignores the signal.
 */
function readText(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => reject(toError(signal.reason));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      }
    );
  });
}

function isAbsoluteUrl(value: string): boolean {
  try {
    return new URL(value).protocol.length > 0;
  } catch {
    return false;
  }
}

const defaultFetch: FetchFunction = (input, init) => fetch(input, init);

/**
 * Creates an HTTP transport for a table service
 */
export function createHttpTransport(config: TransportConfig): HttpTransport {
  return new HttpTransport(config);
}
