/**
 * Admin API routes.
 *
 * POST /admin/login                 password -> session token
 * POST /certificates/generate       batch generation
 * GET  /admin/certificates          paginated list, newest first
 * GET  /admin/certificates/search   ?email= or ?name= substring search
 * GET  /admin/certificates/export   CSV of every certificate
 * GET  /admin/stats                 totals and integration status
 *
 * Every route checks the IP allow-list first, then its rate-limit class,
 * then (except login) the bearer token.
 */

import { RequestHandler, Router } from 'express';
import { CertificateRecord, certificatePath } from '../domain/certificate';
import { RouteClass } from '../domain/delivery';
import { CertificateError, unauthenticatedError, validationError } from '../domain/errors';
import { CertificateGenerator } from '../generation/generator';
import {
  generationRequestSchema,
  listQuerySchema,
  loginRequestSchema,
  parsePayload,
  searchQuerySchema,
} from '../generation/schemas';
import { EmailService } from '../notifications/email';
import { CertificateStore, MAX_LIST_LIMIT, toListResult } from '../storage/store';
import { AdminAuth, requireAdmin, requireAllowedIp } from './auth';
import { asyncRoute, requestLogger } from './middleware';

export interface AdminRoutesDeps {
  auth: AdminAuth;
  store: CertificateStore;
  generator: CertificateGenerator;
  email: EmailService;
  limiters: Record<RouteClass, RequestHandler>;
  maxBatchSize: number;
  appUrl: string;
}

export const CSV_COLUMNS = [
  'slug',
  'recipientName',
  'recipientEmail',
  'url',
  'viewCount',
  'lastViewedAt',
  'createdAt',
] as const;

/** Quote a CSV field when needed; neutralise leading formula characters. */
export function csvField(value: string | number | null): string {
  if (value === null) return '';
  let text = String(value);
  if (typeof value === 'string' && /^[=+\-@\t\r]/.test(text)) {
    text = `'${text}`;
  }
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(records: CertificateRecord[], appUrl: string): string {
  const base = appUrl.replace(/\/+$/, '');
  const lines = [CSV_COLUMNS.join(',')];
  for (const r of records) {
    lines.push(
      [
        r.slug,
        r.recipientName,
        r.recipientEmail,
        `${base}${certificatePath(r.slug)}`,
        r.viewCount,
        r.lastViewedAt,
        r.createdAt,
      ]
        .map(csvField)
        .join(','),
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function createAdminRoutes(deps: AdminRoutesDeps): Router {
  const router = Router();
  const { auth, store, generator, limiters } = deps;
  const ipCheck = requireAllowedIp(auth);
  const adminOnly = [ipCheck, limiters.admin, requireAdmin(auth)];
  const generationSchema = generationRequestSchema(deps.maxBatchSize);

  router.post(
    '/admin/login',
    ipCheck,
    limiters.login,
    asyncRoute(async (req, res) => {
      const { password } = parsePayload(loginRequestSchema, req.body);
      const session = auth.login(password);
      if (!session) {
        requestLogger(req).warn('Admin login failed');
        throw new CertificateError(unauthenticatedError('Invalid password'));
      }
      requestLogger(req).info('Admin login succeeded');
      res.json(session);
    }),
  );

  router.post(
    '/certificates/generate',
    ipCheck,
    limiters.batch,
    requireAdmin(auth),
    asyncRoute(async (req, res) => {
      const { participants, sendEmail } = parsePayload(generationSchema, req.body);
      const summary = await generator.generateBatch(participants, { sendEmail });
      res.json(summary);
    }),
  );

  router.get(
    '/admin/certificates',
    ...adminOnly,
    asyncRoute(async (req, res) => {
      const options = parsePayload(listQuerySchema, req.query);
      const [items, total] = await Promise.all([store.list(options), store.count()]);
      res.json(toListResult(items, total, options));
    }),
  );

  router.get(
    '/admin/certificates/search',
    ...adminOnly,
    asyncRoute(async (req, res) => {
      const { email, name, limit, offset } = parsePayload(searchQuerySchema, req.query);
      const query = email !== undefined ? { email } : name !== undefined ? { name } : null;
      if (!query) {
        throw new CertificateError(validationError('Provide an email or name to search for'));
      }
      const items = await store.search(query, { limit, offset });
      res.json({ items, count: items.length, limit, offset });
    }),
  );

  router.get(
    '/admin/certificates/export',
    ...adminOnly,
    asyncRoute(async (_req, res) => {
      const records: CertificateRecord[] = [];
      for (let offset = 0; ; offset += MAX_LIST_LIMIT) {
        const page = await store.list({ limit: MAX_LIST_LIMIT, offset });
        records.push(...page);
        if (page.length < MAX_LIST_LIMIT) break;
      }
      const date = new Date().toISOString().slice(0, 10);
      res.attachment(`certificates-${date}.csv`);
      res.type('text/csv; charset=utf-8').send(toCsv(records, deps.appUrl));
    }),
  );

  router.get(
    '/admin/stats',
    ...adminOnly,
    asyncRoute(async (_req, res) => {
      res.json({
        total: await store.count(),
        storageConfigured: generator.ready,
        emailConfigured: deps.email.configured,
      });
    }),
  );

  return router;
}
