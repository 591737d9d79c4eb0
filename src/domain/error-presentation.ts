/**
 * Error presentation for public callers.
 *
 * Maps a TypedError code onto an HTTP status, a log severity and the message
 * a caller is allowed to see. Server-side failures get a fixed generic
 * message: the internal message may name the offending asset URL, a host or
 * a temporary path, none of which may leave the process.
 */

import { TypedError, createTypedError } from './errors';

/** Severity the failure is logged at. */
export type ErrorSeverity = 'info' | 'warn' | 'error';

export interface ErrorPresentation {
  status: number;
  severity: ErrorSeverity;
  /** Sanitised error safe to serialise into a response body. */
  publicError: TypedError;
}

/**
 * Rule for one class of codes. Prefix matching: 'FETCH.TIMEOUT' matches only
 * itself, 'AUTH' matches every auth code.
 */
export interface ErrorPresentationRule {
  codePrefix: string;
  status: number;
  severity: ErrorSeverity;
  /** Fixed public message. When omitted the TypedError message is shown. */
  publicMessage?: string;
  /** Detail keys that may be shown to the caller. */
  publicDetails?: string[];
}

/** Built-in rules, most specific first. */
export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  { codePrefix: 'DELIVERY.INVALID_SLUG', status: 400, severity: 'info' },
  {
    codePrefix: 'DELIVERY.NOT_FOUND',
    status: 404,
    severity: 'info',
    publicMessage: 'Certificate not found',
  },
  {
    codePrefix: 'DELIVERY.CONFIGURATION',
    status: 500,
    severity: 'warn',
    publicMessage: 'Certificate is temporarily unavailable',
  },
  {
    codePrefix: 'FETCH.INVALID_HOST',
    status: 500,
    severity: 'warn',
    publicMessage: 'Certificate is temporarily unavailable',
  },
  {
    codePrefix: 'FETCH.TIMEOUT',
    status: 504,
    severity: 'error',
    publicMessage: 'Certificate storage did not respond in time',
  },
  {
    codePrefix: 'FETCH.PAYLOAD_TOO_LARGE',
    status: 502,
    severity: 'error',
    publicMessage: 'Certificate could not be retrieved',
  },
  {
    codePrefix: 'FETCH.UPSTREAM',
    status: 502,
    severity: 'error',
    publicMessage: 'Certificate could not be retrieved',
  },
  {
    codePrefix: 'RENDER.ENGINE_UNAVAILABLE',
    status: 503,
    severity: 'warn',
    publicMessage: 'Server is busy, please retry shortly',
  },
  {
    codePrefix: 'RENDER.TIMEOUT',
    status: 504,
    severity: 'error',
    publicMessage: 'Certificate rendering took too long',
  },
  {
    codePrefix: 'RENDER',
    status: 500,
    severity: 'error',
    publicMessage: 'Certificate could not be rendered',
  },
  // The client is gone; the status is only recorded in the access log.
  { codePrefix: 'REQUEST.CANCELED', status: 499, severity: 'info' },
  { codePrefix: 'AUTH.UNAUTHENTICATED', status: 401, severity: 'info' },
  { codePrefix: 'AUTH', status: 403, severity: 'warn' },
  {
    codePrefix: 'RATE_LIMIT',
    status: 429,
    severity: 'warn',
    publicDetails: ['retryAfterMs', 'limit', 'windowMs'],
  },
  { codePrefix: 'VALIDATION.PAYLOAD', status: 422, severity: 'info', publicDetails: ['issues'] },
  { codePrefix: 'VALIDATION', status: 400, severity: 'info' },
  {
    codePrefix: 'STORAGE.NOT_CONFIGURED',
    status: 503,
    severity: 'error',
    publicMessage: 'Certificate storage is not available',
  },
];

const FALLBACK_RULE: ErrorPresentationRule = {
  codePrefix: '',
  status: 500,
  severity: 'error',
  publicMessage: 'Internal server error',
};

/** Present a TypedError for a public caller. */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix)) ?? FALLBACK_RULE;
  const code = rule === FALLBACK_RULE ? 'SYSTEM.INTERNAL' : error.code;

  return {
    status: rule.status,
    severity: rule.severity,
    publicError: createTypedError({
      code,
      message: rule.publicMessage ?? error.message,
      retryable: error.retryable,
      details: pickDetails(error.details, rule.publicDetails),
      suggestedFixes: rule.publicDetails ? error.suggestedFixes : [],
    }),
  };
}

function pickDetails(
  details: Record<string, unknown> | undefined,
  keys: string[] | undefined,
): Record<string, unknown> | undefined {
  if (!details || !keys) return undefined;
  const picked: Record<string, unknown> = {};
  for (const key of keys) {
    if (key in details) picked[key] = details[key];
  }
  return Object.keys(picked).length > 0 ? picked : undefined;
}
