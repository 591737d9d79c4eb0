/**
 * API Middleware: request context, client identity and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import { TypedError, apiError, internalError, isCertificateError, validationError } from '../domain/errors';
import { presentError } from '../domain/error-presentation';
import { Logger, errorContext, logger } from '../logger';
import { PageContext, renderErrorPage } from '../render/certificate-page';

/** Per-request state attached by `requestContext()`. */
export interface RequestContext {
  requestId: string;
  log: Logger;
  /** Aborted when the client disconnects before the response finished. */
  signal: AbortSignal;
}

/** Extended request with the per-request context. */
export interface ContextRequest extends Request {
  context?: RequestContext;
  /** Render failures as an HTML page instead of JSON. */
  htmlErrors?: boolean;
}

/** Client identity used for rate limiting and logs. Honours `trust proxy`. */
export function clientIdentity(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Attach a request id, a child logger and a disconnect signal. The id is
 * echoed in X-Request-Id.
 */
export function requestContext() {
  return (req: ContextRequest, res: Response, next: NextFunction) => {
    const requestId = uuid();
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    res.set('X-Request-Id', requestId);
    req.context = {
      requestId,
      log: logger.child({ requestId, method: req.method, path: req.path }),
      signal: controller.signal,
    };
    next();
  };
}

/** The request's logger, or the root logger outside `requestContext()`. */
export function requestLogger(req: ContextRequest): Logger {
  return req.context?.log ?? logger;
}

/** Body-parser failures carry an HTTP status and a `type` tag. */
function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('type' in err) || !('status' in err)) return null;
  return typeof err.status === 'number' && typeof err.type === 'string' ? err.status : null;
}

/** Normalise anything thrown into a TypedError. */
export function toTypedError(err: unknown): TypedError {
  if (isCertificateError(err)) return err.typedError;
  const status = bodyParserStatus(err);
  if (status !== null && status >= 400 && status < 500) {
    return validationError(status === 413 ? 'Request body too large' : 'Malformed request body');
  }
  return internalError(err instanceof Error ? err.message : 'Internal server error');
}

/** Global error handling middleware. */
export function errorHandler(page: PageContext) {
  return (err: unknown, req: ContextRequest, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const typedError = toTypedError(err);
    const { status, severity, publicError } = presentError(typedError);
    const log = requestLogger(req);

    log[severity]('Request failed', {
      code: typedError.code,
      status,
      client: clientIdentity(req),
      reason: typedError.message,
      ...(isCertificateError(err) ? {} : errorContext(err)),
    });

    if (req.htmlErrors) {
      res.status(status).type('html').send(renderErrorPage(status, publicError.message, page));
      return;
    }
    res.status(status).json(apiError(publicError));
  };
}

/** Adapt an async route handler; rejections go to the error handler. */
export function asyncRoute(handler: (req: ContextRequest, res: Response) => Promise<void>) {
  return (req: ContextRequest, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
