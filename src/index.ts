/**
 * Certificate delivery service.
 *
 * Entry point for the HTTP server, and the public exports for programmatic
 * use (embedding the app, or reusing the fetcher and renderer).
 */

import 'dotenv/config';
import { Server } from 'http';
import { configWarnings, loadConfig } from './config';
import { errorContext, logger, setLogLevel } from './logger';
import { openResources } from './resources';
import { createApp, createAppContext } from './server';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

export async function main(): Promise<Server> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  for (const warning of configWarnings(config)) {
    logger.warn(warning);
  }

  const resources = await openResources(config);
  const context = await createAppContext({
    config,
    store: resources.store,
    rateLimitStore: resources.rateLimitStore,
  });
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    logger.info('Server listening', {
      port: config.port,
      env: config.env,
      store: resources.store.kind,
      rateLimitStore: config.redisUrl ? 'redis' : 'memory',
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    closeServer(server)
      .then(() => resources.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', errorContext(err));
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Startup failed', errorContext(err));
    process.exit(1);
  });
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, configWarnings } from './config';
export type { AppConfig } from './config';
export * from './domain';
export { AssetFetcher } from './delivery/asset-fetcher';
export { DeliveryService } from './delivery/delivery-service';
export { Renderer } from './render/renderer';
export { RenderPool } from './render/render-pool';
export { createMemoryStore, MemoryCertificateStore } from './storage/memory-store';
export { createPostgresStore, PostgresCertificateStore } from './storage/postgres-store';
export type { CertificateStore, Store } from './storage/store';
