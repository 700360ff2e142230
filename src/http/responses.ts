import { STATUS_CODES } from 'node:http';
import { ErrorCode, StorewardError } from '../errors.js';
import { isRecord, readNumber } from '../json.js';
import { describeError, type Logger } from '../logger.js';
import type { HttpResponse } from './types.js';

export function textResponse(
  status: number,
  body?: string,
  headers: Record<string, string> = {},
): HttpResponse {
  const text = body ?? (status === 204 || status === 304 ? '' : defaultBody(status));
  return {
    status,
    headers: text.length > 0 ? { 'content-type': 'text/plain; charset=utf-8', ...headers } : headers,
    body: text,
  };
}

export function jsonResponse(
  status: number,
  value: unknown,
  headers: Record<string, string> = {},
): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8', ...headers },
    body: JSON.stringify(value),
  };
}

function defaultBody(status: number): string {
  return `${status} ${STATUS_CODES[status] ?? 'Unknown'}`;
}

// ── Error mapping ────────────────────────────────────────────────

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.BACKEND_UNAVAILABLE]: 503,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function statusForError(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/** The one place thrown errors become HTTP responses. */
export function errorResponse(error: unknown, log: Logger): HttpResponse {
  if (!(error instanceof StorewardError)) {
    log.error('Unhandled error', describeError(error));
    return textResponse(500);
  }

  const status = statusForError(error.code);
  if (status >= 500) {
    log.error(error.message, { code: error.code });
  }

  if (error.code === ErrorCode.RATE_LIMITED) {
    const retryAfterMs = isRecord(error.details) ? readNumber(error.details, 'retryAfterMs') : undefined;
    const headers: Record<string, string> =
      retryAfterMs !== undefined ? { 'retry-after': String(Math.ceil(retryAfterMs / 1000)) } : {};
    return textResponse(status, undefined, headers);
  }

  // 5xx bodies stay generic; the details are in the log.
  return textResponse(status, status >= 500 ? undefined : error.message);
}
