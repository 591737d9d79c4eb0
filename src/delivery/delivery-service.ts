/**
 * Delivery Policy Layer.
 *
 * Walks one public request through the delivery stages:
 *
 *   slug check -> record lookup -> asset URL re-check -> fetch -> render
 *
 * Rate limiting happens in the HTTP middleware, so a trace handed to this
 * service starts at RateChecked. Each cheap check runs before the next
 * expensive one: an invalid slug never reaches the store, a rejected URL
 * never reaches the network. The view counter moves only after the whole
 * pipeline succeeded, and only for counted formats.
 */

import { CertificateRecord, isValidSlug } from '../domain/certificate';
import { COUNTED_FORMATS, DeliveryFormat, DeliveryStage } from '../domain/delivery';
import {
  CertificateError,
  TypedError,
  certificateNotFoundError,
  configurationError,
  internalError,
  invalidSlugError,
  isCertificateError,
} from '../domain/errors';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { PageContext, renderCertificatePage } from '../render/certificate-page';
import { Renderer } from '../render/renderer';
import { CertificateStore } from '../storage/store';
import { AssetFetcher } from './asset-fetcher';
import { DeliveryTrace } from './state-machine';
import { validateAssetUrl } from './url-policy';

export interface DeliveryRequest {
  /** Raw path parameter; validated before anything else looks at it. */
  slug: unknown;
  format: DeliveryFormat;
  client: string;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Delivery {
  record: CertificateRecord;
  format: DeliveryFormat;
  contentType: string;
  body: Buffer;
  /** Suggested attachment name for downloadable formats. */
  filename?: string;
  trace: DeliveryTrace;
}

export interface DeliveryServiceDeps {
  store: CertificateStore;
  fetcher: AssetFetcher;
  renderer: Renderer;
  allowedHosts: readonly string[];
  page: PageContext;
  logger?: Logger;
  now?: () => Date;
}

const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';
const SERVER_FAULT_PREFIXES = ['FETCH.', 'RENDER.', 'SYSTEM.'];

export class DeliveryService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: DeliveryServiceDeps) {
    this.log = deps.logger ?? rootLogger.child({ module: 'delivery' });
    this.now = deps.now ?? (() => new Date());
  }

  async deliver(request: DeliveryRequest): Promise<Delivery> {
    const log = (request.logger ?? this.log).child({ format: request.format, client: request.client });
    const trace = new DeliveryTrace();
    trace.advance(DeliveryStage.RateChecked);

    try {
      const delivery = await this.run(request, trace, log);
      trace.advance(DeliveryStage.Delivered);
      log.info('Certificate delivered', {
        slug: delivery.record.slug,
        bytes: delivery.body.length,
        durationMs: trace.elapsedMs,
      });
      return delivery;
    } catch (err) {
      const typedError = isCertificateError(err) ? err.typedError : internalError(errorMessage(err));
      const context = { stage: trace.current, code: typedError.code, durationMs: trace.elapsedMs };
      if (isServerFault(typedError)) {
        log.error('Delivery failed', { ...context, reason: typedError.message, ...upstreamContext(typedError) });
      } else {
        log.debug('Delivery stopped', context);
      }
      trace.fail(typedError);
      throw err;
    }
  }

  private async run(request: DeliveryRequest, trace: DeliveryTrace, log: Logger): Promise<Delivery> {
    const { slug, format, signal } = request;

    if (!isValidSlug(slug)) {
      throw new CertificateError(invalidSlugError());
    }
    trace.advance(DeliveryStage.SlugValidated);

    const record = await this.deps.store.getBySlug(slug);
    if (!record) {
      throw new CertificateError(certificateNotFoundError(slug));
    }
    trace.advance(DeliveryStage.RecordFound);

    const rejection = validateAssetUrl(record.assetUrl, this.deps.allowedHosts);
    if (rejection) {
      log.warn('Stored asset URL rejected by allow-list', { slug, assetUrl: record.assetUrl, reason: rejection });
      throw new CertificateError(configurationError(slug, rejection));
    }
    trace.advance(DeliveryStage.UrlValidated);

    const svg = await this.deps.fetcher.fetch(record.assetUrl, signal);
    trace.advance(DeliveryStage.AssetFetched);

    const rendered = await this.deps.renderer.render(svg, format === 'html' ? 'svg' : format, signal);
    trace.advance(DeliveryStage.Rendered);

    const delivery: Delivery =
      format === 'html'
        ? {
            record,
            format,
            contentType: HTML_CONTENT_TYPE,
            body: Buffer.from(renderCertificatePage(record, rendered.body, this.deps.page), 'utf8'),
            trace,
          }
        : {
            record,
            format,
            contentType: rendered.contentType,
            body: rendered.body,
            filename: format === 'png' ? undefined : `${record.slug}.${format}`,
            trace,
          };

    if (COUNTED_FORMATS.has(format)) {
      delivery.record = await this.countView(record, log);
    }
    return delivery;
  }

  /**
   * A failed counter update is logged but does not fail a delivery that
   * already succeeded.
   */
  private async countView(record: CertificateRecord, log: Logger): Promise<CertificateRecord> {
    try {
      return (await this.deps.store.recordView(record.slug, this.now())) ?? record;
    } catch (err) {
      log.error('Failed to record certificate view', { slug: record.slug, ...errorContext(err) });
      return record;
    }
  }
}

/** Fetch, render and unexpected failures; client and policy outcomes are logged elsewhere. */
function isServerFault(error: TypedError): boolean {
  return SERVER_FAULT_PREFIXES.some((prefix) => error.code.startsWith(prefix));
}

function upstreamContext(error: TypedError): { upstreamStatus?: number } {
  const status = error.details?.statusCode;
  return typeof status === 'number' ? { upstreamStatus: status } : {};
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
