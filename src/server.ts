/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 * Every external dependency (record store, rate-limit counters, network fetch,
 * rasteriser, asset storage, mail transport) can be swapped through
 * AppContextOptions.
 */

import express from 'express';
import path from 'path';
import { Transporter } from 'nodemailer';
import { AppConfig, loadConfig } from './config';
import { RouteClass } from './domain/delivery';
import { AssetFetcher, FetchFn } from './delivery/asset-fetcher';
import { DeliveryService } from './delivery/delivery-service';
import { AssetStorage, createAssetStorage } from './generation/asset-storage';
import { CertificateGenerator } from './generation/generator';
import { loadTemplate } from './generation/template';
import { EmailService, createMailTransport } from './notifications/email';
import { PageContext } from './render/certificate-page';
import { Rasterizer } from './render/rasterizer';
import { RenderPool } from './render/render-pool';
import { Renderer } from './render/renderer';
import { RateLimitStore, MemoryRateLimitStore } from './rate-limit/store';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { createAdminRoutes } from './api/admin';
import { AdminAuth } from './api/auth';
import { createCertificateRoutes } from './api/certificates';
import { createHealthRoutes } from './api/health';
import { errorHandler, requestContext } from './api/middleware';
import { createRateLimiters } from './api/rate-limit';
import { logger } from './logger';

export interface AppContextOptions {
  config?: AppConfig;
  store?: Store;
  rateLimitStore?: RateLimitStore;
  /** Network fetch used for certificate assets. Default: global fetch. */
  fetchFn?: FetchFn;
  rasterizer?: Rasterizer;
  storage?: AssetStorage;
  /** Mail transport; null disables email. Default: built from SMTP_URL. */
  transporter?: Transporter | null;
  /** Template content. Default: read from the configured template path. */
  template?: string;
  /** Clock for rate-limit windows. */
  now?: () => number;
}

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  rateLimitStore: RateLimitStore;
  fetcher: AssetFetcher;
  renderer: Renderer;
  delivery: DeliveryService;
  storage: AssetStorage;
  email: EmailService;
  generator: CertificateGenerator;
  auth: AdminAuth;
  limiters: Record<RouteClass, express.RequestHandler>;
  page: PageContext;
}

/** Resolve a configured path against the project root. */
export function resolveProjectPath(relative: string): string {
  return path.resolve(__dirname, '..', relative);
}

/** Create the application context with all services. */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createMemoryStore();
  const rateLimitStore = options.rateLimitStore ?? new MemoryRateLimitStore({ now: options.now });
  const page: PageContext = { appName: config.appName, appUrl: config.appUrl };

  const fetcher = new AssetFetcher({
    allowedHosts: config.fetch.allowedHosts,
    timeoutMs: config.fetch.timeoutMs,
    maxBytes: config.fetch.maxBytes,
    fetchFn: options.fetchFn,
  });
  const renderer = new Renderer({
    pool: new RenderPool(config.render.poolSize),
    rasterizer: options.rasterizer,
    timeoutMs: config.render.timeoutMs,
    tempDir: config.render.tempDir,
  });
  const delivery = new DeliveryService({
    store: store.certificates,
    fetcher,
    renderer,
    allowedHosts: config.fetch.allowedHosts,
    page,
  });

  const storage = options.storage ?? createAssetStorage(config.cloudinary);
  const transporter = options.transporter !== undefined ? options.transporter : createMailTransport(config.email.smtpUrl);
  const email = new EmailService({
    transporter,
    from: config.email.from,
    fromName: config.email.fromName,
    appUrl: config.appUrl,
  });
  const template = options.template ?? (await loadTemplate(resolveProjectPath(config.generation.templatePath)));
  const generator = new CertificateGenerator({
    template,
    store: store.certificates,
    storage,
    email,
    appUrl: config.appUrl,
  });

  const auth = new AdminAuth({
    password: config.admin.password,
    sessionSecret: config.admin.sessionSecret,
    sessionTtlSeconds: config.admin.sessionTtlSeconds,
    allowedIps: config.admin.allowedIps,
  });
  const limiters = createRateLimiters(config.rateLimit, rateLimitStore, options.now);

  return {
    config,
    store,
    rateLimitStore,
    fetcher,
    renderer,
    delivery,
    storage,
    email,
    generator,
    auth,
    limiters,
    page,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', ctx.config.trustProxy);

  // Body parsing
  app.use(express.json({ limit: '2mb' }));
  app.use(requestContext());

  app.use(createHealthRoutes({ store: ctx.store, storage: ctx.storage, renderer: ctx.renderer }));
  app.use(createCertificateRoutes({ delivery: ctx.delivery, limiters: ctx.limiters }));
  app.use(
    createAdminRoutes({
      auth: ctx.auth,
      store: ctx.store.certificates,
      generator: ctx.generator,
      email: ctx.email,
      limiters: ctx.limiters,
      maxBatchSize: ctx.config.generation.maxBatchSize,
      appUrl: ctx.config.appUrl,
    }),
  );

  // Error handler
  app.use(errorHandler(ctx.page));

  logger.debug('Application assembled', { store: ctx.store.kind, storage: ctx.storage.configured });
  return app;
}
