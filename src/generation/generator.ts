/**
 * Certificate generation.
 *
 * fill template -> pick a free slug -> upload SVG -> persist record
 *   -> optionally email the recipient
 *
 * A name whose slug is taken gets the next numbered slug (`ana-perez-2`);
 * existing certificates are never overwritten. Batches run sequentially and
 * one failing participant does not stop the rest.
 */

import { v4 as uuid } from 'uuid';
import { MAX_SLUG_LENGTH, certificatePath, slugify } from '../domain/certificate';
import { CertificateError, TypedError, createTypedError, internalError, isCertificateError } from '../domain/errors';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { EmailService } from '../notifications/email';
import { CertificateStore } from '../storage/store';
import { AssetStorage, StoredAsset } from './asset-storage';
import { Participant } from './schemas';
import { fillTemplate } from './template';

export type GenerationResult =
  | { success: true; name: string; email: string; slug: string; url: string; emailSent?: boolean }
  | { success: false; name: string; email: string; error: string };

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: GenerationResult[];
}

export interface BatchOptions {
  sendEmail?: boolean;
}

export interface CertificateGeneratorDeps {
  template: string;
  store: CertificateStore;
  storage: AssetStorage;
  email: EmailService;
  appUrl: string;
  logger?: Logger;
  now?: () => Date;
}

export const BATCH_PROGRESS_INTERVAL = 50;
/** Attempts per participant when a concurrent writer records the chosen slug first. */
export const SLUG_ATTEMPTS = 3;
/** Highest numeric suffix tried before giving up on a name. */
export const MAX_SLUG_SUFFIX = 1000;

/** Minimal store surface needed to find a free slug. */
export type SlugLookup = Pick<CertificateStore, 'getBySlug'>;

/** `base` with a numeric suffix, trimmed so the result stays within the slug length limit. */
export function withSuffix(base: string, n: number): string {
  const suffix = `-${n}`;
  const head = base.slice(0, MAX_SLUG_LENGTH - suffix.length).replace(/-+$/, '');
  return `${head}${suffix}`;
}

/** First free slug for `name`: the plain slug, then -2, -3, ... */
export async function uniqueSlug(name: string, store: SlugLookup, skip: ReadonlySet<string> = new Set()): Promise<string> {
  const base = slugify(name);
  if (!skip.has(base) && !(await store.getBySlug(base))) return base;
  for (let n = 2; n <= MAX_SLUG_SUFFIX; n++) {
    const candidate = withSuffix(base, n);
    if (!skip.has(candidate) && !(await store.getBySlug(candidate))) return candidate;
  }
  throw new CertificateError(
    createTypedError({
      code: 'GENERATION.SLUG_EXHAUSTED',
      message: `No free slug for "${base}" up to suffix ${MAX_SLUG_SUFFIX}`,
    }),
  );
}

export class CertificateGenerator {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: CertificateGeneratorDeps) {
    this.log = deps.logger ?? rootLogger.child({ module: 'generator' });
    this.now = deps.now ?? (() => new Date());
  }

  get ready(): boolean {
    return this.deps.storage.configured;
  }

  async generate(participant: Participant): Promise<GenerationResult> {
    const { name, email } = participant;
    try {
      const slug = await this.createCertificate(participant);
      return { success: true, name, email, slug, url: this.publicUrl(slug) };
    } catch (err) {
      const typedError = toTypedError(err);
      this.log.error('Certificate generation failed', { code: typedError.code, reason: typedError.message });
      return { success: false, name, email, error: publicFailureMessage(typedError) };
    }
  }

  async generateBatch(participants: Participant[], options: BatchOptions = {}): Promise<BatchSummary> {
    const results: GenerationResult[] = [];
    let succeeded = 0;

    this.log.info('Batch generation started', { total: participants.length, sendEmail: options.sendEmail ?? false });

    for (const [index, participant] of participants.entries()) {
      let result = await this.generate(participant);
      if (result.success) {
        succeeded++;
        if (options.sendEmail) {
          const emailSent = await this.deps.email.sendCertificate({ name: result.name, email: result.email, slug: result.slug });
          result = { ...result, emailSent };
        }
      }
      results.push(result);

      const processed = index + 1;
      if (processed % BATCH_PROGRESS_INTERVAL === 0 && processed < participants.length) {
        this.log.info('Batch progress', { processed, total: participants.length });
      }
    }

    const summary = {
      total: participants.length,
      succeeded,
      failed: participants.length - succeeded,
      results,
    };
    this.log.info('Batch generation finished', { total: summary.total, succeeded, failed: summary.failed });
    return summary;
  }

  private async createCertificate(participant: Participant): Promise<string> {
    const svg = fillTemplate(this.deps.template, { name: participant.name });
    const taken = new Set<string>();
    let duplicates = 0;

    for (;;) {
      const slug = await uniqueSlug(participant.name, this.deps.store, taken);
      let asset: StoredAsset;
      try {
        asset = await this.deps.storage.uploadSvg(svg, slug);
      } catch (err) {
        if (isCertificateError(err) && err.code === 'STORAGE.ASSET_EXISTS') {
          this.log.warn('Asset already stored under slug; trying the next one', { slug });
          taken.add(slug);
          continue;
        }
        throw err;
      }

      try {
        await this.deps.store.create({
          id: `cert_${uuid()}`,
          slug,
          recipientName: participant.name,
          recipientEmail: participant.email,
          assetUrl: asset.url,
          assetPublicId: asset.publicId,
          createdAt: this.now().toISOString(),
        });
      } catch (err) {
        if (isCertificateError(err) && err.code === 'STORE.DUPLICATE_SLUG') {
          // The record that holds this slug points at the same public id; the asset stays.
          duplicates++;
          if (duplicates < SLUG_ATTEMPTS) {
            this.log.warn('Slug taken during generation; retrying', { slug, attempt: duplicates });
            taken.add(slug);
            continue;
          }
          throw err;
        }
        await this.releaseAsset(asset.publicId);
        throw err;
      }

      this.log.info('Certificate created', { slug });
      return slug;
    }
  }

  /** Remove an upload whose record was never saved, so its slug stays usable. */
  private async releaseAsset(publicId: string): Promise<void> {
    try {
      await this.deps.storage.deleteAsset(publicId);
    } catch (err) {
      this.log.error('Failed to remove orphaned certificate asset', { publicId, ...errorContext(err) });
    }
  }

  private publicUrl(slug: string): string {
    return `${this.deps.appUrl.replace(/\/+$/, '')}${certificatePath(slug)}`;
  }
}

function toTypedError(err: unknown): TypedError {
  return isCertificateError(err) ? err.typedError : internalError(err instanceof Error ? err.message : String(err));
}

function publicFailureMessage(error: TypedError): string {
  return error.code === 'STORAGE.NOT_CONFIGURED'
    ? 'Certificate storage is not available'
    : 'Certificate could not be generated';
}
