/**
 * Remote asset fetcher.
 *
 * Retrieves a stored SVG from the CDN with a hard timeout and a size cap.
 * The body is read chunk by chunk and the stream is cancelled as soon as the
 * running total passes the cap. No retries.
 */

import {
  CertificateError,
  fetchTimeoutError,
  invalidHostError,
  isCertificateError,
  payloadTooLargeError,
  requestCanceledError,
  upstreamError,
} from '../domain/errors';
import { validateAssetUrl } from './url-policy';

/** Fetch function type (injectable for testing). */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface AssetFetcherOptions {
  allowedHosts: readonly string[];
  /** Network timeout in ms. Default: 3000 */
  timeoutMs?: number;
  /** Maximum accepted body size in bytes. Default: 5 MB */
  maxBytes?: number;
  fetchFn?: FetchFn;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 3_000;
export const DEFAULT_FETCH_MAX_BYTES = 5 * 1024 * 1024;

export class AssetFetcher {
  readonly timeoutMs: number;
  readonly maxBytes: number;
  private readonly allowedHosts: readonly string[];
  private readonly fetchFn: FetchFn;

  constructor(options: AssetFetcherOptions) {
    this.allowedHosts = options.allowedHosts;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? DEFAULT_FETCH_MAX_BYTES;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Fetch the asset bytes. Throws a CertificateError with one of
   * FETCH.INVALID_HOST, FETCH.TIMEOUT, FETCH.PAYLOAD_TOO_LARGE, FETCH.UPSTREAM
   * or REQUEST.CANCELED.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<Buffer> {
    const hostError = validateAssetUrl(url, this.allowedHosts);
    if (hostError) {
      throw new CertificateError(invalidHostError(hostError));
    }
    if (signal?.aborted) {
      throw new CertificateError(requestCanceledError());
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        redirect: 'error',
        signal: controller.signal,
        headers: { Accept: 'image/svg+xml' },
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new CertificateError(
          upstreamError(`Asset fetch returned HTTP ${response.status}`, response.status),
        );
      }

      const declared = Number(response.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > this.maxBytes) {
        await response.body?.cancel();
        throw new CertificateError(payloadTooLargeError(this.maxBytes, declared));
      }

      return await this.readBounded(response);
    } catch (err) {
      if (timedOut) {
        throw new CertificateError(fetchTimeoutError(this.timeoutMs));
      }
      if (signal?.aborted) {
        throw new CertificateError(requestCanceledError());
      }
      if (isCertificateError(err)) {
        throw err;
      }
      throw new CertificateError(
        upstreamError(err instanceof Error ? `Asset fetch failed: ${err.message}` : 'Asset fetch failed'),
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async readBounded(response: Response): Promise<Buffer> {
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > this.maxBytes) {
        await reader.cancel();
        throw new CertificateError(payloadTooLargeError(this.maxBytes, received));
      }
      chunks.push(value);
    }

    return Buffer.concat(chunks, received);
  }
}
