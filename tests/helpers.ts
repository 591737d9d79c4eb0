/**
 * Shared fixtures for the test suites: sample SVGs, an in-process fetch
 * stand-in, a controllable rasteriser, config and an HTTP helper.
 */

import { writeFile } from 'fs/promises';
import express from 'express';
import { AppConfig, loadConfig } from '../src/config';
import { CertificateRecord, NewCertificateRecord } from '../src/domain/certificate';
import { TypedError, isCertificateError } from '../src/domain/errors';
import { FetchFn } from '../src/delivery/asset-fetcher';
import { Rasterizer, SvgDimensions } from '../src/render/rasterizer';
import { AppContext, AppContextOptions, createApp, createAppContext } from '../src/server';

export const TEMPLATE_SVG =
  '<svg xmlns="http://www.w3.org/2000/svg" width="400" height="300">' +
  '<rect width="400" height="300" fill="#ffffff"/><text x="20" y="150">{{NAME}}</text></svg>';

export const SAMPLE_SVG = TEMPLATE_SVG.replace('{{NAME}}', 'Ana Perez');

/** A valid 1x1 RGBA PNG. */
export const PNG_1X1 = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8BQDwAEhQGAhKmMIQAAAABJRU5ErkJggg==',
  'base64',
);

export const ASSET_HOST = 'res.cloudinary.com';

export function assetUrl(slug: string): string {
  return `https://${ASSET_HOST}/demo/raw/upload/certificates/${slug}.svg`;
}

export function newRecord(slug: string, overrides: Partial<NewCertificateRecord> = {}): NewCertificateRecord {
  return {
    id: `cert_${slug}`,
    slug,
    recipientName: 'Ana Perez',
    recipientEmail: 'ana@example.com',
    assetUrl: assetUrl(slug),
    assetPublicId: `certificates/${slug}`,
    createdAt: '2024-01-15T10:00:00.000Z',
    ...overrides,
  };
}

export function storedRecord(slug: string, overrides: Partial<CertificateRecord> = {}): CertificateRecord {
  return { ...newRecord(slug), viewCount: 0, lastViewedAt: null, ...overrides };
}

/** Config with test credentials; `env` overrides individual variables. */
export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    APP_URL: 'https://certs.example.org',
    APP_NAME: 'Test Certificates',
    ADMIN_PASSWORD: 'test-password',
    ADMIN_SESSION_SECRET: 'test-secret-0123456789',
    ...env,
  });
}

export interface TestApp {
  ctx: AppContext;
  app: express.Application;
  fetchCalls: string[];
  rasterizer: FakeRasterizer;
}

/**
 * Full application over in-process stand-ins: memory stores, a fetch that
 * serves SAMPLE_SVG unless `respond` says otherwise, the fake rasteriser and
 * no mail transport.
 */
export async function createTestApp(
  env: Record<string, string> = {},
  options: AppContextOptions & { respond?: (url: string) => Response | Promise<Response> } = {},
): Promise<TestApp> {
  const { respond, ...contextOptions } = options;
  const fake = fakeFetch(respond ?? (() => svgResponse()));
  const rasterizer = new FakeRasterizer();
  const ctx = await createAppContext({
    config: testConfig(env),
    fetchFn: fake.fn,
    rasterizer,
    transporter: null,
    template: TEMPLATE_SVG,
    ...contextOptions,
  });
  return { ctx, app: createApp(ctx), fetchCalls: fake.calls, rasterizer };
}

export interface FakeFetch {
  fn: FetchFn;
  calls: string[];
}

/**
 * In-process fetch: answers every URL with `respond(url)`. A responder that
 * never resolves simulates a hung upstream; it still honours the abort signal.
 */
export function fakeFetch(respond: (url: string) => Response | Promise<Response>): FakeFetch {
  const calls: string[] = [];
  const fn: FetchFn = (input, init) => {
    calls.push(input);
    return new Promise<Response>((resolve, reject) => {
      const signal = init.signal;
      if (signal) {
        signal.addEventListener('abort', () => reject(new Error('This operation was aborted')), { once: true });
      }
      Promise.resolve(respond(input)).then(resolve, reject);
    });
  };
  return { fn, calls };
}

export function svgResponse(body: string = SAMPLE_SVG, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'image/svg+xml' } });
}

/** A promise that never settles, for hung upstreams and stuck renders. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

/** Await a promise expected to reject with a CertificateError; returns its TypedError. */
export async function rejection(promise: Promise<unknown>): Promise<TypedError> {
  try {
    await promise;
  } catch (err) {
    if (isCertificateError(err)) return err.typedError;
    throw err;
  }
  throw new Error('Expected the promise to reject');
}

/** Run `fn`, expecting it to throw a CertificateError; returns its TypedError. */
export function rejectionSync(fn: () => unknown): TypedError {
  try {
    fn();
  } catch (err) {
    if (isCertificateError(err)) return err.typedError;
    throw err;
  }
  throw new Error('Expected the call to throw');
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Rasteriser stand-in. Produces a real 1x1 PNG so PDF assembly runs for
 * real. `hold` makes every raster wait for the given promise first.
 */
export class FakeRasterizer implements Rasterizer {
  calls = 0;
  hold?: Promise<void>;
  failWith?: Error;

  constructor(private readonly size: SvgDimensions = { width: 400, height: 300 }) {}

  async dimensions(): Promise<SvgDimensions> {
    return this.size;
  }

  async toPngFile(_svg: Buffer, outPath: string): Promise<void> {
    await this.raster();
    await writeFile(outPath, PNG_1X1);
  }

  async toPngBuffer(): Promise<Buffer> {
    await this.raster();
    return PNG_1X1;
  }

  private async raster(): Promise<void> {
    this.calls++;
    if (this.hold) await this.hold;
    if (this.failWith) throw this.failWith;
  }
}

export interface TestResponse {
  status: number;
  headers: Headers;
  body: Buffer;
  text: string;
  /** Parsed JSON body, or undefined when the body is not JSON. */
  json: unknown;
}

// Simple test helper for HTTP requests without external dependencies
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: { body?: unknown; headers?: Record<string, string> } = {},
): Promise<TestResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  try {
    const res = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body = Buffer.from(await res.arrayBuffer());
    const text = body.toString('utf8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      json = undefined;
    }
    return { status: res.status, headers: res.headers, body, text, json };
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

/** Read a dotted path out of a parsed JSON body. */
export function field(json: unknown, ...path: Array<string | number>): unknown {
  let current = json;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
