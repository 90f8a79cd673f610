import * as http from 'node:http';
import { resolveLogger, toError, type Logger, type LoggerSetting } from '@tablesync/core';
import { Subject } from 'rxjs';
import { HttpError } from './http-error.js';
import type { TableEndpoint, TableResult } from './table-controller.js';

/**
 * Lifecycle and request events of a table server
 */
export type TableServerEvent =
  | { type: 'server:started'; port: number }
  | { type: 'server:stopped' }
  | { type: 'request'; method: string; path: string; status: number; durationMs: number }
  | { type: 'error'; message: string };

export interface TableServerConfig {
  /** Controllers by table name; names match case-insensitively */
  tables: Record<string, TableEndpoint>;
  /** Path the tables are served under (default: '/tables') */
  basePath?: string;
  /** Port to listen on (default: 8080; 0 picks a free port) */
  port?: number;
  host?: string;
  /**
   * Check the bearer token of a request. Without it every request is
   * accepted.
   */
  authenticate?: (token: string | null, request: Request) => boolean | Promise<boolean>;
  logger?: LoggerSetting;
}

/**
 * Parsed route information from a URL path.
 */
interface ParsedRoute {
  pattern: string;
  params: Record<string, string>;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/**
 * HTTP front of a set of table controllers.
 *
 * ## Routes
 *
 * | Method | Path | Action |
 * |--------|------|--------|
 * | GET | /tables/:table | query |
 * | POST | /tables/:table | create |
 * | GET | /tables/:table/:id | read |
 * | PUT | /tables/:table/:id | replace |
 * | DELETE | /tables/:table/:id | delete |
 *
 * `fetch()` answers a standard `Request` in process; `start()` serves the
 * same routes over node:http.
 *
 * @example
 * ```typescript
 * const server = createTableServer({
 *   port: 8080,
 *   tables: { todos: todoController },
 *   authenticate: (token) => token === process.env.API_TOKEN,
 * });
 *
 * await server.start();
 * ```
 */
export class TableServer {
  private readonly config: Required<Omit<TableServerConfig, 'tables' | 'authenticate' | 'logger'>> & {
    authenticate?: TableServerConfig['authenticate'];
  };
  private readonly tables = new Map<string, TableEndpoint>();
  private readonly logger: Logger;
  private readonly events$ = new Subject<TableServerEvent>();

  private server: http.Server | null = null;

  constructor(config: TableServerConfig) {
    this.config = {
      basePath: `/${(config.basePath ?? '/tables').replace(/^\/+|\/+$/g, '')}`,
      port: config.port ?? 8080,
      host: config.host ?? 'localhost',
      authenticate: config.authenticate,
    };
    for (const [name, endpoint] of Object.entries(config.tables)) {
      this.tables.set(name.toLowerCase(), endpoint);
    }
    this.logger = resolveLogger(config.logger, 'TableServer');
  }

  /**
   * Get the event stream for server lifecycle events.
   */
  get events(): Subject<TableServerEvent> {
    return this.events$;
  }

  /**
   * Port the server listens on, once started
   */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Start the HTTP server.
   */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.server = http.createServer((req, res) => {
        void this.handleRequest(req, res);
      });

      this.server.on('error', (err) => {
        this.events$.next({ type: 'error', message: err.message });
        reject(err);
      });

      this.server.listen(this.config.port, this.config.host, () => {
        const port = this.port ?? this.config.port;
        this.logger.info('Table server listening', { host: this.config.host, port });
        this.events$.next({ type: 'server:started', port });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server.
   */
  async stop(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close(() => {
        this.server = null;
        this.events$.next({ type: 'server:stopped' });
        resolve();
      });
    });
  }

  /**
   * Whether the server is currently running.
   */
  get isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Destroy the server and clean up resources.
   */
  async destroy(): Promise<void> {
    await this.stop();
    this.events$.complete();
  }

  /**
   * Answer a request without going through a socket
   */
  async fetch(request: Request): Promise<Response> {
    const started = Date.now();
    const url = new URL(request.url);

    let response: Response;
    try {
      response = await this.routeRequest(request, url);
    } catch (error) {
      response = this.errorResponse(error);
    }

    this.events$.next({
      type: 'request',
      method: request.method,
      path: url.pathname,
      status: response.status,
      durationMs: Date.now() - started,
    });
    return response;
  }

  /**
   * Handle an incoming HTTP request.
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      const request = await this.toRequest(req);
      const response = await this.fetch(request);

      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.writeHead(response.status);
      res.end(await response.text());
    } catch (error) {
      const message = toError(error).message;
      this.events$.next({ type: 'error', message });
      this.sendJson(res, 500, { error: message });
    }
  }

  private async toRequest(req: http.IncomingMessage): Promise<Request> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    const headers = new Headers();
    for (const [name, value] of Object.entries(req.headers)) {
      if (value === undefined) continue;
      headers.set(name, Array.isArray(value) ? value.join(', ') : value);
    }

    const body = method === 'GET' || method === 'HEAD' ? undefined : await this.readBody(req);
    return new Request(url, { method, headers, body: body || undefined });
  }

  private async readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      req.on('end', () => {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      req.on('error', reject);
    });
  }

  private async routeRequest(request: Request, url: URL): Promise<Response> {
    const route = this.matchRoute(url.pathname);
    if (!route) {
      return this.json(404, { error: 'Not found' });
    }

    const endpoint = this.tables.get((route.params.table ?? '').toLowerCase());
    if (!endpoint) {
      return this.json(404, { error: `Unknown table "${route.params.table ?? ''}"` });
    }

    if (this.config.authenticate) {
      const header = request.headers.get('authorization');
      const token = header?.startsWith('Bearer ') ? header.slice(7) : null;
      if (!(await this.config.authenticate(token, request))) {
        return this.json(401, { error: 'Unauthorized' });
      }
    }

    const method = request.method.toUpperCase();
    const id: string | undefined = route.params.id;

    if (id === undefined) {
      switch (method) {
        case 'GET':
          return this.toResponse(await endpoint.query(request));
        case 'POST':
          return this.toResponse(await endpoint.create(request));
        default:
          return this.json(405, { error: 'Method not allowed' });
      }
    }

    switch (method) {
      case 'GET':
        return this.toResponse(await endpoint.read(request, id));
      case 'PUT':
        return this.toResponse(await endpoint.replace(request, id));
      case 'DELETE':
        return this.toResponse(await endpoint.delete(request, id));
      default:
        return this.json(405, { error: 'Method not allowed' });
    }
  }

  /**
   * Match a URL pathname to a known route pattern.
   */
  private matchRoute(pathname: string): ParsedRoute | null {
    const routes = [`${this.config.basePath}/:table`, `${this.config.basePath}/:table/:id`];

    for (const pattern of routes) {
      const match = this.matchPattern(pathname, pattern);
      if (match) {
        return { pattern, params: match };
      }
    }
    return null;
  }

  /**
   * Match a URL pathname against a route pattern with :param placeholders.
   */
  private matchPattern(pathname: string, pattern: string): Record<string, string> | null {
    const pathParts = pathname.split('/').filter(Boolean);
    const patternParts = pattern.split('/').filter(Boolean);

    if (pathParts.length !== patternParts.length) {
      return null;
    }

    const params: Record<string, string> = {};
    for (let i = 0; i < patternParts.length; i++) {
      const patternPart = patternParts[i] ?? '';
      const pathPart = pathParts[i] ?? '';

      if (patternPart.startsWith(':')) {
        try {
          params[patternPart.slice(1)] = decodeURIComponent(pathPart);
        } catch {
          throw new HttpError(400, 'Malformed path');
        }
      } else if (patternPart !== pathPart) {
        return null;
      }
    }

    return params;
  }

  private toResponse(result: TableResult): Response {
    if (result.body === undefined) {
      return new Response(null, { status: result.status, headers: result.headers });
    }
    return this.json(result.status, result.body, result.headers);
  }

  private errorResponse(error: unknown): Response {
    if (error instanceof HttpError) {
      if (error.status === 304) {
        return new Response(null, { status: 304 });
      }
      return this.json(error.status, error.payload ?? { error: error.message });
    }

    const err = toError(error);
    this.logger.error('Request failed', err);
    this.events$.next({ type: 'error', message: err.message });
    return this.json(500, { error: err.message });
  }

  private json(status: number, data: unknown, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(data), {
      status,
      headers: { ...headers, ...JSON_HEADERS },
    });
  }

  private sendJson(res: http.ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, JSON_HEADERS);
    res.end(JSON.stringify(data));
  }
}

/**
 * Create a table server
 */
export function createTableServer(config: TableServerConfig): TableServer {
  return new TableServer(config);
}
