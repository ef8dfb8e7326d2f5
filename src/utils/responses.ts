/**
 * API response formatters.
 *
 * Error responses share one shape: `success: false`, an error object with a
 * machine-readable code and message, and a request correlation ID for
 * matching the response against server logs.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import { ERROR_CODES, type ErrorCode } from '../errors/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
  };
  requestId: string;
}

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<ErrorCode, number> = {
  METRICS_UNAVAILABLE: 503,
  NOTIFIER_TRANSPORT_ERROR: 502,
  CONFIG_INVALID: 500,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

/** Default HTTP status for unknown error codes. */
const DEFAULT_ERROR_STATUS = 500;

function isErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_STATUS_MAP, code);
}

// ─── Correlation ID ──────────────────────────────────────────────────────────

/** Generate a unique request correlation ID (UUID v4). */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Formatters ──────────────────────────────────────────────────────────────

/**
 * Format an error response.
 *
 * @param requestId - Correlation ID; generated when omitted
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
): ErrorResponse {
  return {
    success: false,
    error: { code, message },
    requestId: requestId ?? generateRequestId(),
  };
}

/**
 * HTTP status for an error code, or 500 for codes without a mapping.
 */
export function getHttpStatusForError(code: string): number {
  return isErrorCode(code) ? ERROR_STATUS_MAP[code] : DEFAULT_ERROR_STATUS;
}

/** Metrics could not be collected. */
export function formatMetricsUnavailable(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    ERROR_CODES.METRICS_UNAVAILABLE,
    'Host metrics are currently unavailable.',
    requestId,
  );
}

/** No route matched the request. */
export function formatNotFound(path: string, requestId?: string): ErrorResponse {
  return formatErrorResponse(ERROR_CODES.NOT_FOUND, `No route for ${path}`, requestId);
}

/**
 * Format an internal server error response.
 * Uses a generic message so implementation details are not leaked.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}
