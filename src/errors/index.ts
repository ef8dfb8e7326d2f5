/**
 * Typed errors for the metrics and alerting paths.
 *
 * Each error carries a stable machine-readable `code` and an optional
 * underlying `cause`. The HTTP layer maps codes to status codes via
 * {@link getHttpStatusForError} in `utils/responses`.
 *
 * @module errors
 */

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const ERROR_CODES = {
  METRICS_UNAVAILABLE: 'METRICS_UNAVAILABLE',
  NOTIFIER_TRANSPORT_ERROR: 'NOTIFIER_TRANSPORT_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ─── Errors ──────────────────────────────────────────────────────────────────

/**
 * Thrown when the metrics provider cannot be reached or returns data that
 * cannot be turned into a snapshot. Surfaced to HTTP callers as 503.
 */
export class MetricsUnavailableError extends Error {
  public readonly code = ERROR_CODES.METRICS_UNAVAILABLE;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MetricsUnavailableError';
  }
}

/**
 * Alert delivery failed. Notifiers return this inside a failed result
 * instead of throwing; it is logged and never reaches an HTTP caller.
 */
export class NotifierTransportError extends Error {
  public readonly code = ERROR_CODES.NOTIFIER_TRANSPORT_ERROR;

  constructor(
    message: string,
    public readonly transport: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'NotifierTransportError';
  }
}

/**
 * Configuration could not be loaded. `issues` lists every offending setting
 * so the operator can fix them in one pass.
 */
export class ConfigInvalidError extends Error {
  public readonly code = ERROR_CODES.CONFIG_INVALID;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigInvalidError';
  }
}

/** Narrow an unknown thrown value to an `Error`, wrapping non-errors. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : 'Unknown error');
}
