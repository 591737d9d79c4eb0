/**
 * Typed error model.
 *
 * Every failure inside the service is described by a TypedError with a
 * namespaced code (e.g. "FETCH.TIMEOUT"). Code paths throw a CertificateError
 * carrying the TypedError; the HTTP error handler turns it into a status and a
 * sanitised body through presentError().
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'DELIVERY'
  | 'FETCH'
  | 'RENDER'
  | 'REQUEST'
  | 'STORE'
  | 'STORAGE'
  | 'GENERATION'
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'VALIDATION'
  | 'SYSTEM';

/** Remediation hint attached to an error. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The typed error structure carried by thrown errors and returned in API bodies. */
export interface TypedError {
  /** Namespaced error code (e.g., "RENDER.TIMEOUT"). */
  code: string;
  /** Human-readable error message. Internal: may name hosts or paths. */
  message: string;
  /** Whether the same request may succeed later without changes. */
  retryable: boolean;
  /** Structured detail payload. Never sent to public callers. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown across module boundaries; the payload is the TypedError. */
export class CertificateError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'CertificateError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Narrow an unknown thrown value to a CertificateError. */
export function isCertificateError(err: unknown): err is CertificateError {
  return err instanceof CertificateError;
}

// --- Delivery policy ---

export function invalidSlugError(): TypedError {
  return createTypedError({
    code: 'DELIVERY.INVALID_SLUG',
    message: 'Invalid certificate identifier',
    retryable: false,
  });
}

export function certificateNotFoundError(slug: string): TypedError {
  return createTypedError({
    code: 'DELIVERY.NOT_FOUND',
    message: `Certificate not found: ${slug}`,
    retryable: false,
    details: { slug },
  });
}

/** A stored record carries an asset URL outside the allow-list. */
export function configurationError(slug: string, reason: string): TypedError {
  return createTypedError({
    code: 'DELIVERY.CONFIGURATION',
    message: `Stored asset URL for "${slug}" rejected: ${reason}`,
    retryable: false,
    details: { slug, reason },
  });
}

// --- Remote asset fetch ---

export function invalidHostError(reason: string): TypedError {
  return createTypedError({
    code: 'FETCH.INVALID_HOST',
    message: reason,
    retryable: false,
  });
}

export function fetchTimeoutError(timeoutMs: number): TypedError {
  return createTypedError({
    code: 'FETCH.TIMEOUT',
    message: `Asset fetch exceeded ${timeoutMs}ms`,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 1000 } }],
  });
}

export function payloadTooLargeError(maxBytes: number, receivedBytes: number): TypedError {
  return createTypedError({
    code: 'FETCH.PAYLOAD_TOO_LARGE',
    message: `Asset exceeds ${maxBytes} bytes`,
    retryable: false,
    details: { maxBytes, receivedBytes },
  });
}

/**
 * Upstream CDN failure. 429 and 5xx are transient; everything else points at
 * a broken stored asset.
 */
export function upstreamError(message: string, statusCode?: number): TypedError {
  const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
  return createTypedError({
    code: 'FETCH.UPSTREAM',
    message,
    retryable,
    details: statusCode === undefined ? undefined : { statusCode },
  });
}

// --- Rendering ---

export function renderEngineUnavailableError(poolSize: number): TypedError {
  return createTypedError({
    code: 'RENDER.ENGINE_UNAVAILABLE',
    message: `All ${poolSize} render slots are busy`,
    retryable: true,
    details: { poolSize },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } }],
  });
}

export function malformedInputError(reason: string): TypedError {
  return createTypedError({
    code: 'RENDER.MALFORMED_INPUT',
    message: `Asset is not a renderable SVG: ${reason}`,
    retryable: false,
  });
}

export function renderTimeoutError(timeoutMs: number): TypedError {
  return createTypedError({
    code: 'RENDER.TIMEOUT',
    message: `Render exceeded ${timeoutMs}ms`,
    retryable: true,
    details: { timeoutMs },
  });
}

export function requestCanceledError(): TypedError {
  return createTypedError({
    code: 'REQUEST.CANCELED',
    message: 'Request canceled by the client',
    retryable: true,
  });
}

// --- Storage, generation, auth, validation ---

export function duplicateSlugError(slug: string): TypedError {
  return createTypedError({
    code: 'STORE.DUPLICATE_SLUG',
    message: `Slug already exists: ${slug}`,
    retryable: false,
    details: { slug },
  });
}

export function storageNotConfiguredError(): TypedError {
  return createTypedError({
    code: 'STORAGE.NOT_CONFIGURED',
    message: 'Asset storage is not configured',
    retryable: false,
    suggestedFixes: [
      {
        type: 'PROVIDE_SECRET',
        params: { keys: ['CLOUDINARY_CLOUD_NAME', 'CLOUDINARY_API_KEY', 'CLOUDINARY_API_SECRET'] },
      },
    ],
  });
}

/** An upload target is already taken; the caller should pick another id. */
export function assetExistsError(publicId: string): TypedError {
  return createTypedError({
    code: 'STORAGE.ASSET_EXISTS',
    message: `An asset already exists at ${publicId}`,
    retryable: false,
    details: { publicId },
  });
}

export function unauthenticatedError(message = 'Authentication required'): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
    retryable: false,
  });
}

export function forbiddenError(message = 'Access denied'): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
    retryable: false,
  });
}

export function rateLimitError(retryAfterMs: number, limit: number, windowMs: number): TypedError {
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: `Rate limit exceeded. Try again in ${Math.ceil(retryAfterMs / 1000)} seconds.`,
    retryable: true,
    details: { retryAfterMs, limit, windowMs },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs } }],
  });
}

/** One field-level problem reported for an invalid payload. */
export interface FieldIssue {
  field: string;
  message: string;
}

export function payloadValidationError(issues: FieldIssue[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.PAYLOAD',
    message: 'Invalid request payload',
    retryable: false,
    details: { issues },
  });
}

export function validationError(message: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
  });
}

export function internalError(message = 'Internal server error'): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
