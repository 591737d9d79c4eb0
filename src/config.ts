/**
 * Environment configuration.
 *
 * `loadConfig` validates the raw environment with zod and shapes it into a
 * typed AppConfig. Empty variables count as unset.
 */

import { z } from 'zod';
import { RouteClass } from './domain/delivery';
import { LogLevel, parseLogLevel } from './logger';
import { normaliseDatabaseUrl } from './storage/postgres-store';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const commaList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  APP_URL: z.string().url().default('http://localhost:8000'),
  APP_NAME: z.string().default('Certificates'),
  TRUST_PROXY: booleanFlag(false),

  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().url().optional(),

  CLOUDINARY_CLOUD_NAME: z.string().optional(),
  CLOUDINARY_API_KEY: z.string().optional(),
  CLOUDINARY_API_SECRET: z.string().optional(),
  CLOUDINARY_FOLDER: z.string().default('certificates'),

  ASSET_ALLOWED_HOSTS: commaList('res.cloudinary.com,cloudinary.com'),
  ASSET_FETCH_TIMEOUT_MS: positiveInt(3_000),
  ASSET_FETCH_MAX_BYTES: positiveInt(5 * 1024 * 1024),

  RENDER_POOL_SIZE: positiveInt(2),
  RENDER_TIMEOUT_MS: positiveInt(15_000),
  RENDER_TEMP_DIR: z.string().optional(),

  RATE_LIMIT_ENABLED: booleanFlag(true),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  RATE_LIMIT_VIEW_PER_MINUTE: positiveInt(10),
  RATE_LIMIT_PREVIEW_PER_MINUTE: positiveInt(30),
  RATE_LIMIT_DOWNLOAD_PER_MINUTE: positiveInt(20),
  RATE_LIMIT_BATCH_PER_MINUTE: positiveInt(10),
  RATE_LIMIT_ADMIN_PER_MINUTE: positiveInt(60),
  RATE_LIMIT_LOGIN_PER_MINUTE: positiveInt(5),

  ADMIN_PASSWORD: z.string().min(1).default('change-me'),
  ADMIN_SESSION_SECRET: z.string().min(16).optional(),
  ADMIN_SESSION_TTL_SECONDS: positiveInt(8 * 60 * 60),
  ADMIN_ALLOWED_IPS: commaList(''),

  SMTP_URL: z.string().optional(),
  MAIL_FROM: z.string().email().default('certificates@localhost'),
  MAIL_FROM_NAME: z.string().optional(),

  MAX_BATCH_SIZE: positiveInt(1000),
  TEMPLATE_PATH: z.string().default('templates/certificate.svg'),
});

export interface CloudinaryConfig {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
  folder: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  port: number;
  appUrl: string;
  appName: string;
  trustProxy: boolean;
  databaseUrl?: string;
  redisUrl?: string;
  /** Null unless all three credentials are set. */
  cloudinary: CloudinaryConfig | null;
  fetch: {
    allowedHosts: string[];
    timeoutMs: number;
    maxBytes: number;
  };
  render: {
    poolSize: number;
    timeoutMs: number;
    tempDir?: string;
  };
  rateLimit: {
    enabled: boolean;
    windowMs: number;
    budgets: Record<RouteClass, number>;
  };
  admin: {
    password: string;
    sessionSecret?: string;
    sessionTtlSeconds: number;
    allowedIps: string[];
  };
  email: {
    smtpUrl?: string;
    from: string;
    fromName: string;
  };
  generation: {
    maxBatchSize: number;
    templatePath: string;
  };
}

export const DEFAULT_ADMIN_PASSWORD = 'change-me';

function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/** Parse and validate configuration. Throws listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;

  const cloudinary =
    e.CLOUDINARY_CLOUD_NAME && e.CLOUDINARY_API_KEY && e.CLOUDINARY_API_SECRET
      ? {
          cloudName: e.CLOUDINARY_CLOUD_NAME,
          apiKey: e.CLOUDINARY_API_KEY,
          apiSecret: e.CLOUDINARY_API_SECRET,
          folder: e.CLOUDINARY_FOLDER,
        }
      : null;

  return {
    env: e.NODE_ENV,
    logLevel: parseLogLevel(e.LOG_LEVEL),
    port: e.PORT,
    appUrl: e.APP_URL.replace(/\/+$/, ''),
    appName: e.APP_NAME,
    trustProxy: e.TRUST_PROXY,
    databaseUrl: e.DATABASE_URL ? normaliseDatabaseUrl(e.DATABASE_URL) : undefined,
    redisUrl: e.REDIS_URL,
    cloudinary,
    fetch: {
      allowedHosts: e.ASSET_ALLOWED_HOSTS.map((host) => host.toLowerCase()),
      timeoutMs: e.ASSET_FETCH_TIMEOUT_MS,
      maxBytes: e.ASSET_FETCH_MAX_BYTES,
    },
    render: {
      poolSize: e.RENDER_POOL_SIZE,
      timeoutMs: e.RENDER_TIMEOUT_MS,
      tempDir: e.RENDER_TEMP_DIR,
    },
    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      budgets: {
        view: e.RATE_LIMIT_VIEW_PER_MINUTE,
        preview: e.RATE_LIMIT_PREVIEW_PER_MINUTE,
        download: e.RATE_LIMIT_DOWNLOAD_PER_MINUTE,
        batch: e.RATE_LIMIT_BATCH_PER_MINUTE,
        admin: e.RATE_LIMIT_ADMIN_PER_MINUTE,
        login: e.RATE_LIMIT_LOGIN_PER_MINUTE,
      },
    },
    admin: {
      password: e.ADMIN_PASSWORD,
      sessionSecret: e.ADMIN_SESSION_SECRET,
      sessionTtlSeconds: e.ADMIN_SESSION_TTL_SECONDS,
      allowedIps: e.ADMIN_ALLOWED_IPS,
    },
    email: {
      smtpUrl: e.SMTP_URL,
      from: e.MAIL_FROM,
      fromName: e.MAIL_FROM_NAME ?? e.APP_NAME,
    },
    generation: {
      maxBatchSize: e.MAX_BATCH_SIZE,
      templatePath: e.TEMPLATE_PATH,
    },
  };
}

/** Insecure defaults and missing integrations, for start-up logging. */
export function configWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (config.admin.password === DEFAULT_ADMIN_PASSWORD) {
    warnings.push('ADMIN_PASSWORD is the default value; set a strong password');
  }
  if (!config.admin.sessionSecret) {
    warnings.push('ADMIN_SESSION_SECRET is not set; admin sessions will not survive a restart');
  }
  if (!config.databaseUrl) {
    warnings.push('DATABASE_URL is not set; certificates are kept in memory only');
  }
  if (!config.cloudinary) {
    warnings.push('Cloudinary credentials are not set; certificate generation is disabled');
  }
  if (!config.email.smtpUrl) {
    warnings.push('SMTP_URL is not set; certificate emails are disabled');
  }
  if (config.fetch.allowedHosts.length === 0) {
    warnings.push('ASSET_ALLOWED_HOSTS is empty; no certificate can be delivered');
  }
  return warnings;
}
