import {
  ConfigurationError,
  conditionMatches,
  formatETag,
  parseETagHeader,
  parseTimestamp,
  resolveLogger,
  type ETagCondition,
  type Logger,
  type LoggerSetting,
} from '@tablesync/core';
import { Subject, type Observable } from 'rxjs';
import { z } from 'zod';
import {
  FilterSyntaxError,
  compareByOrder,
  evaluateFilter,
  parseFilter,
  parseOrderBy,
  type FilterNode,
  type OrderByClause,
} from './filter.js';
import { HttpError } from './http-error.js';
import type {
  AccessControlProvider,
  Repository,
  RepositoryUpdatedEvent,
  TableData,
  TableOperation,
} from './repository.js';

export const DEFAULT_SERVER_PAGE_SIZE = 100;
export const DEFAULT_MAX_TOP = 128000;

/**
 * Outcome of a controller action, before it is written to the wire
 */
export interface TableResult {
  status: number;
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * Body of a query response
 */
export interface PagedResult<T> {
  items: T[];
  /** Matching items before paging, when `$count=true` */
  count?: number;
  /** Query string of the next page, or null on the last one */
  nextLink: string | null;
}

/**
 * What the table server routes requests to
 */
export interface TableEndpoint {
  readonly entityName: string;
  query(request: Request): Promise<TableResult>;
  read(request: Request, id: string): Promise<TableResult>;
  create(request: Request): Promise<TableResult>;
  replace(request: Request, id: string): Promise<TableResult>;
  delete(request: Request, id: string): Promise<TableResult>;
}

export interface TableControllerOptions<T extends TableData> {
  /** Validates request bodies; see `tableDataSchema` */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  accessControl?: AccessControlProvider<T>;
  /** Name reported in repository updates (default: 'Entity') */
  entityName?: string;
  /** Most items in one query response (default: 100) */
  pageSize?: number;
  /** Largest accepted `$top` (default: 128000) */
  maxTop?: number;
  /** Mark deleted entities instead of removing them (default: false) */
  enableSoftDelete?: boolean;
  /** Status of a refused request (default: 401) */
  unauthorizedStatusCode?: number;
  logger?: LoggerSetting;
}

const controllerOptionsSchema = z.object({
  pageSize: z.number().int().min(1).max(DEFAULT_MAX_TOP).default(DEFAULT_SERVER_PAGE_SIZE),
  maxTop: z.number().int().min(1).default(DEFAULT_MAX_TOP),
  enableSoftDelete: z.boolean().default(false),
  unauthorizedStatusCode: z.number().int().min(400).max(599).default(401),
});

type ControllerSettings = z.output<typeof controllerOptionsSchema>;

interface QueryOptions {
  filter: FilterNode | null;
  orderBy: OrderByClause[];
  top: number | null;
  skip: number | null;
  count: boolean;
}

const INCLUDE_DELETED_PARAMETER = '__includedeleted';

function shouldIncludeDeleted(params: URLSearchParams): boolean {
  return params.getAll(INCLUDE_DELETED_PARAMETER).some((value) => value.toLowerCase() === 'true');
}

function parseNonNegativeInteger(params: URLSearchParams, name: string): number | null {
  const raw = params.get(name);
  if (raw === null) {
    return null;
  }
  if (!/^\d+$/.test(raw)) {
    throw new HttpError(400, `${name} must be a non-negative integer`, undefined, 'TS_H601');
  }
  return Number(raw);
}

function parseHttpDate(value: string | null): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Whether an entity changed after `since`. HTTP dates carry whole
 * seconds, so the entity time is truncated before comparing.
 */
function modifiedAfter(entity: TableData, since: number): boolean {
  const updatedAt = parseTimestamp(entity.updatedAt);
  if (updatedAt === null) return true;
  return Math.floor(updatedAt / 1000) * 1000 > since;
}

/**
 * Continuation link: the request query string with `$skip` and `$top`
 * replaced
 */
export function createNextLink(url: URL, skip: number, top: number): string {
  const query = url.search
    .replace(/^\?/, '')
    .split('&')
    .filter((part) => {
      if (part.length === 0) return false;
      const [key] = [...new URLSearchParams(part).keys()];
      return key !== '$skip' && key !== '$top';
    });

  if (skip > 0) {
    query.push(`$skip=${skip}`);
  }
  if (top > 0) {
    query.push(`$top=${top}`);
  }
  return query.join('&');
}

/**
 * REST controller of one table.
 *
 * | Action  | Method | Success | Failures |
 * |---------|--------|---------|----------|
 * | query   | GET    | 200     | 400 |
 * | read    | GET    | 200     | 304, 404, 410, 412 |
 * | create  | POST   | 201     | 400, 409, 415 |
 * | replace | PUT    | 200     | 400, 404, 410, 412, 415 |
 * | delete  | DELETE | 204     | 404, 410, 412 |
 *
 * Every action is authorized by the access control provider first, which
 * answers `unauthorizedStatusCode` when it refuses. With soft delete
 * enabled, deleted entities stay in the repository with `deleted: true`;
 * reads and queries hide them unless `__includedeleted=true` is given.
 *
 * @example
 * ```typescript
 * const todos = new TableController(new InMemoryRepository<Todo>(), {
 *   schema: tableDataSchema.extend({ title: z.string() }),
 *   enableSoftDelete: true,
 * });
 *
 * todos.repositoryUpdated$.subscribe((event) => {
 *   console.log(event.operation, event.entity.id);
 * });
 * ```
 */
export class TableController<T extends TableData> implements TableEndpoint {
  readonly entityName: string;
  private readonly repository: Repository<T>;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly accessControl: AccessControlProvider<T> | null;
  private readonly settings: ControllerSettings;
  private readonly logger: Logger;
  private readonly updates = new Subject<RepositoryUpdatedEvent<T>>();

  /** Every successful write */
  readonly repositoryUpdated$: Observable<RepositoryUpdatedEvent<T>>;

  constructor(repository: Repository<T>, options: TableControllerOptions<T>) {
    const parsed = controllerOptionsSchema.safeParse({
      pageSize: options.pageSize,
      maxTop: options.maxTop,
      enableSoftDelete: options.enableSoftDelete,
      unauthorizedStatusCode: options.unauthorizedStatusCode,
    });
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    this.repository = repository;
    this.schema = options.schema;
    this.accessControl = options.accessControl ?? null;
    this.entityName = options.entityName ?? 'Entity';
    this.settings = parsed.data;
    this.logger = resolveLogger(options.logger, 'TableController');
    this.repositoryUpdated$ = this.updates.asObservable();
  }

  get options(): Readonly<ControllerSettings> {
    return this.settings;
  }

  async query(request: Request): Promise<TableResult> {
    const url = new URL(request.url);
    this.logger.info('Query', { entity: this.entityName, query: url.search });

    await this.authorize('query', null);
    const options = this.parseQueryOptions(url.searchParams);
    const includeDeleted = shouldIncludeDeleted(url.searchParams);

    let dataset = (await this.repository.query()).filter(
      (entity) =>
        this.isInView(entity) &&
        (!this.settings.enableSoftDelete || includeDeleted || !entity.deleted)
    );
    const filter = options.filter;
    if (filter) {
      dataset = dataset.filter((entity) => evaluateFilter(filter, entity));
    }

    const count = dataset.length;
    dataset.sort(compareByOrder(options.orderBy));

    const skip = options.skip ?? 0;
    const take = Math.min(this.settings.pageSize, options.top ?? Number.POSITIVE_INFINITY);
    const items = dataset.slice(skip, skip + take);

    const result: PagedResult<T> = {
      items,
      nextLink: this.getNextLink(url, options, items.length, count),
    };
    if (options.count) {
      result.count = count;
    }

    this.logger.info('Query returned', { entity: this.entityName, items: items.length, count });
    return { status: 200, headers: {}, body: result };
  }

  async read(request: Request, id: string): Promise<TableResult> {
    this.logger.info('Read', { entity: this.entityName, id });

    const entity = await this.repository.read(id);
    if (!this.isInView(entity)) {
      throw new HttpError(404);
    }
    await this.authorize('read', entity);
    this.assertNotDeleted(entity, request);
    this.checkPreconditions(request, entity);

    return { status: 200, headers: this.entityHeaders(entity), body: entity };
  }

  async create(request: Request): Promise<TableResult> {
    const body = await this.readEntity(request);
    this.logger.info('Create', { entity: this.entityName, id: body.id });

    await this.authorize('create', body);
    const entity = await this.preCommit('create', body);
    const created = await this.repository.create(entity);
    await this.postCommit('create', created);

    const url = new URL(request.url);
    const location = `${url.origin}${url.pathname.replace(/\/+$/, '')}/${encodeURIComponent(created.id)}`;
    return {
      status: 201,
      headers: { ...this.entityHeaders(created), Location: location },
      body: created,
    };
  }

  async replace(request: Request, id: string): Promise<TableResult> {
    const body = await this.readEntity(request);
    this.logger.info('Replace', { entity: this.entityName, id });

    if (body.id !== id) {
      throw new HttpError(400, 'Entity id does not match the request path');
    }

    const existing = await this.repository.read(id);
    if (!this.isInView(existing)) {
      throw new HttpError(404);
    }
    await this.authorize('update', body);
    this.assertNotDeleted(existing, request);
    const version = this.checkPreconditions(request, existing);

    const entity = await this.preCommit('update', body);
    const replaced = await this.repository.replace(entity, version);
    await this.postCommit('update', replaced);

    return { status: 200, headers: this.entityHeaders(replaced), body: replaced };
  }

  async delete(request: Request, id: string): Promise<TableResult> {
    this.logger.info('Delete', { entity: this.entityName, id });

    const existing = await this.repository.read(id);
    if (!this.isInView(existing)) {
      throw new HttpError(404);
    }
    await this.authorize('delete', existing);
    if (this.settings.enableSoftDelete && existing.deleted) {
      throw new HttpError(410);
    }
    const version = this.checkPreconditions(request, existing);

    if (this.settings.enableSoftDelete) {
      const marked = await this.preCommit('delete', { ...existing, deleted: true });
      const stored = await this.repository.replace(marked, version);
      await this.postCommit('delete', stored);
    } else {
      const entity = await this.preCommit('delete', existing);
      await this.repository.delete(id, version);
      await this.postCommit('delete', entity);
    }

    return { status: 204, headers: {} };
  }

  destroy(): void {
    this.updates.complete();
  }

  private parseQueryOptions(params: URLSearchParams): QueryOptions {
    let filter: FilterNode | null = null;
    let orderBy: OrderByClause[] = [];
    try {
      const rawFilter = params.get('$filter');
      if (rawFilter !== null) {
        filter = parseFilter(rawFilter);
      }
      const rawOrderBy = params.get('$orderby');
      if (rawOrderBy !== null) {
        orderBy = parseOrderBy(rawOrderBy);
      }
    } catch (error) {
      if (error instanceof FilterSyntaxError) {
        this.logger.warn('Invalid query', { message: error.message, position: error.position });
        throw new HttpError(400, error.message, undefined, 'TS_H601');
      }
      throw error;
    }

    // Stable paging needs a total order
    if (!orderBy.some((clause) => clause.field === 'id')) {
      orderBy.push({ field: 'id', descending: false });
    }

    const top = parseNonNegativeInteger(params, '$top');
    if (top !== null && top > this.settings.maxTop) {
      throw new HttpError(
        400,
        `The limit of ${this.settings.maxTop} for $top has been exceeded`,
        undefined,
        'TS_H601'
      );
    }

    const rawCount = params.get('$count');
    if (rawCount !== null && rawCount !== 'true' && rawCount !== 'false') {
      throw new HttpError(400, '$count must be true or false', undefined, 'TS_H601');
    }

    return {
      filter,
      orderBy,
      top,
      skip: parseNonNegativeInteger(params, '$skip'),
      count: rawCount === 'true',
    };
  }

  private getNextLink(
    url: URL,
    options: QueryOptions,
    resultCount: number,
    count: number
  ): string | null {
    const skip = (options.skip ?? 0) + resultCount;
    if (options.top !== null) {
      const top = options.top - resultCount;
      return skip >= count || top <= 0 ? null : createNextLink(url, skip, top);
    }
    return skip >= count ? null : createNextLink(url, skip, 0);
  }

  private async readEntity(request: Request): Promise<T> {
    const contentType = request.headers.get('content-type') ?? '';
    if (!/^application\/([\w.-]+\+)?json\b/i.test(contentType)) {
      throw new HttpError(415, 'Unsupported media type');
    }

    let raw: unknown;
    try {
      raw = await request.json();
    } catch {
      throw new HttpError(400, 'Invalid JSON content');
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      throw new HttpError(400, 'Invalid entity', {
        errors: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }
    return parsed.data;
  }

  private async authorize(operation: TableOperation, entity: T | null): Promise<void> {
    const allowed = (await this.accessControl?.isAuthorized?.(operation, entity)) ?? true;
    if (!allowed) {
      this.logger.warn('Unauthorized', {
        entity: this.entityName,
        operation,
        id: entity?.id ?? null,
        status: this.settings.unauthorizedStatusCode,
      });
      throw new HttpError(this.settings.unauthorizedStatusCode);
    }
  }

  private isInView(entity: T): boolean {
    const view = this.accessControl?.getDataView?.() ?? null;
    return view === null || view(entity);
  }

  private assertNotDeleted(entity: T, request: Request): void {
    if (
      this.settings.enableSoftDelete &&
      entity.deleted &&
      !shouldIncludeDeleted(new URL(request.url).searchParams)
    ) {
      throw new HttpError(410);
    }
  }

  /**
   * Evaluate If-Match, If-None-Match, If-Unmodified-Since and
   * If-Modified-Since against the stored entity. Returns the version a
   * write must match, if the request named exactly one.
   */
  private checkPreconditions(request: Request, entity: T): Uint8Array | undefined {
    const isFetch = request.method === 'GET';
    const ifMatch = this.readCondition(request, 'if-match');
    const ifNoneMatch = this.readCondition(request, 'if-none-match');

    if (ifMatch && !conditionMatches(ifMatch, entity.version)) {
      throw new HttpError(412, 'Precondition failed', entity);
    }
    if (!ifMatch) {
      const since = parseHttpDate(request.headers.get('if-unmodified-since'));
      if (since !== null && modifiedAfter(entity, since)) {
        throw new HttpError(412, 'Precondition failed', entity);
      }
    }

    if (ifNoneMatch && conditionMatches(ifNoneMatch, entity.version)) {
      throw isFetch ? new HttpError(304) : new HttpError(412, 'Precondition failed', entity);
    }
    if (!ifNoneMatch) {
      const since = parseHttpDate(request.headers.get('if-modified-since'));
      if (since !== null && !modifiedAfter(entity, since)) {
        throw isFetch ? new HttpError(304) : new HttpError(412, 'Precondition failed', entity);
      }
    }

    if (ifMatch?.kind === 'versions' && ifMatch.versions.length === 1) {
      return ifMatch.versions[0];
    }
    return undefined;
  }

  private readCondition(request: Request, header: string): ETagCondition | null {
    const value = request.headers.get(header);
    if (value === null) {
      return null;
    }
    const condition = parseETagHeader(value);
    if (!condition) {
      throw new HttpError(400, `Invalid ${header} header`);
    }
    return condition;
  }

  private entityHeaders(entity: T): Record<string, string> {
    const headers: Record<string, string> = {};
    if (entity.version) {
      headers.ETag = formatETag(entity.version);
    }
    const updatedAt = parseTimestamp(entity.updatedAt);
    if (updatedAt !== null) {
      headers['Last-Modified'] = new Date(updatedAt).toUTCString();
    }
    return headers;
  }

  private async preCommit(operation: TableOperation, entity: T): Promise<T> {
    return (await this.accessControl?.preCommitHook?.(operation, entity)) ?? entity;
  }

  private async postCommit(operation: TableOperation, entity: T): Promise<void> {
    this.updates.next({
      operation,
      entityName: this.entityName,
      entity,
      timestamp: Date.now(),
    });
    await this.accessControl?.postCommitHook?.(operation, entity);
  }
}

/**
 * Create a controller for a repository
 */
export function createTableController<T extends TableData>(
  repository: Repository<T>,
  options: TableControllerOptions<T>
): TableController<T> {
  return new TableController(repository, options);
}
