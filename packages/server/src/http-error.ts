import { STATUS_CODES } from 'node:http';
import { TableSyncError, type ErrorCode } from '@tablesync/core';

/**
 * An error that maps onto an HTTP response.
 *
 * The table server answers with `status` and, when set, `payload` as the
 * JSON body. Conflicts (409, 412) carry the current server entity so the
 * client can settle them without another request.
 */
export class HttpError extends TableSyncError {
  readonly status: number;
  readonly payload: unknown;

  constructor(status: number, message?: string, payload?: unknown, code: ErrorCode = 'TS_H600') {
    super({
      code,
      message: message ?? STATUS_CODES[status] ?? `HTTP ${status}`,
      context: { status },
    });
    this.name = 'HttpError';
    this.status = status;
    this.payload = payload;
  }

  static isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
  }
}
