/**
 * Public certificate routes.
 *
 * GET /certificate/:slug      HTML page (view)
 * GET /certificate/:slug/pdf  PDF (view)
 * GET /preview/:slug          PNG social preview (preview)
 * GET /download/:slug         SVG attachment (download)
 *
 * The rate-limit class of each route is given in parentheses.
 */

import { NextFunction, RequestHandler, Response, Router } from 'express';
import { DeliveryFormat, RouteClass } from '../domain/delivery';
import { DeliveryService } from '../delivery/delivery-service';
import { ContextRequest, asyncRoute, clientIdentity } from './middleware';

export interface CertificateRoutesDeps {
  delivery: DeliveryService;
  limiters: Record<RouteClass, RequestHandler>;
}

const CACHE_CONTROL: Record<DeliveryFormat, string> = {
  html: 'no-store',
  pdf: 'no-store',
  png: 'public, max-age=3600',
  svg: 'public, max-age=3600',
};

function htmlErrors(req: ContextRequest, _res: Response, next: NextFunction): void {
  req.htmlErrors = true;
  next();
}

function deliver(delivery: DeliveryService, format: DeliveryFormat) {
  return asyncRoute(async (req, res) => {
    const result = await delivery.deliver({
      slug: req.params.slug,
      format,
      client: clientIdentity(req),
      signal: req.context?.signal,
      logger: req.context?.log,
    });

    if (result.filename) {
      const disposition = format === 'svg' ? 'attachment' : 'inline';
      res.set('Content-Disposition', `${disposition}; filename="${result.filename}"`);
    }
    res.set('Cache-Control', CACHE_CONTROL[format]);
    res.set('X-Content-Type-Options', 'nosniff');
    res.status(200).type(result.contentType).send(result.body);
  });
}

export function createCertificateRoutes(deps: CertificateRoutesDeps): Router {
  const router = Router();
  const { delivery, limiters } = deps;

  router.get('/certificate/:slug', htmlErrors, limiters.view, deliver(delivery, 'html'));
  router.get('/certificate/:slug/pdf', limiters.view, deliver(delivery, 'pdf'));
  router.get('/preview/:slug', limiters.preview, deliver(delivery, 'png'));
  router.get('/download/:slug', limiters.download, deliver(delivery, 'svg'));

  return router;
}
