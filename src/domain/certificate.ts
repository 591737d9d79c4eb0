/**
 * Certificate domain model.
 *
 * A certificate is a rendered SVG stored on the CDN plus the metadata row
 * that names it. The slug is the public identifier in every URL.
 */

/** Persisted certificate metadata. */
export interface CertificateRecord {
  id: string;
  /** Unique, URL-safe, immutable. */
  slug: string;
  recipientName: string;
  recipientEmail: string;
  /** Absolute URL of the stored SVG. Must resolve to an allow-listed host. */
  assetUrl: string;
  /** Public id of the asset in the storage backend. */
  assetPublicId: string;
  /** Only ever incremented. */
  viewCount: number;
  lastViewedAt: string | null;
  createdAt: string;
}

/** Input accepted by the store when a certificate is generated. */
export type NewCertificateRecord = Omit<CertificateRecord, 'viewCount' | 'lastViewedAt'>;

/** Slug character class: lowercase letters, digits, hyphen, underscore. */
export const SLUG_PATTERN = /^[a-z0-9\-_]{1,100}$/;

export const MAX_SLUG_LENGTH = 100;

const RESERVED_SLUGS = new Set(['-', '--']);

/** True when the value is safe to use as a slug in a URL path segment and a store key. */
export function isValidSlug(value: unknown): value is string {
  return typeof value === 'string' && SLUG_PATTERN.test(value) && !RESERVED_SLUGS.has(value);
}

/**
 * Derive a slug from a recipient name.
 *
 * "María José González" -> "maria-jose-gonzalez", "O'Brien" -> "o-brien".
 * Names with no ASCII letters or digits fall back to "certificate".
 */
export function slugify(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');
  return slug.length > 0 ? slug : 'certificate';
}

/** Public path of the HTML page for a certificate. */
export function certificatePath(slug: string): string {
  return `/certificate/${slug}`;
}
