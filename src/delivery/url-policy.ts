/**
 * Asset URL allow-list.
 *
 * Stored asset URLs are fetched server-side, so an unchecked URL turns the
 * service into a request-forgery proxy (cloud metadata at 169.254.169.254,
 * internal admin ports on localhost, private ranges). A URL is accepted only
 * when it is https, carries no credentials or explicit port, names a host
 * rather than an IP literal, and that host is an allow-listed domain or one
 * of its subdomains.
 *
 * Checked twice: by the delivery service at the trust boundary and again by
 * the fetcher right before the network call. The record store's content is
 * not assumed clean.
 */

import { isIP } from 'net';

const BLOCKED_HOSTNAMES = new Set([
  'localhost',
  'localhost.localdomain',
  'metadata.google.internal',
  'metadata',
]);

/** Normalise an allow-list entry: lowercase, no scheme, no trailing dot. */
export function normaliseHost(host: string): string {
  return host.trim().toLowerCase().replace(/^https?:\/\//, '').replace(/\/.*$/, '').replace(/\.$/, '');
}

/**
 * Validate a stored asset URL against the allow-list.
 * Returns the reason the URL is unsafe, or null when it may be fetched.
 */
export function validateAssetUrl(url: string, allowedHosts: readonly string[]): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 'Asset URL is not a valid absolute URL';
  }

  if (parsed.protocol !== 'https:') {
    return `Asset URL must use https, got: ${parsed.protocol}`;
  }

  if (parsed.username || parsed.password) {
    return 'Asset URL must not carry credentials';
  }

  if (parsed.port !== '') {
    return `Asset URL must not name a port: ${parsed.port}`;
  }

  const hostname = parsed.hostname.toLowerCase().replace(/\.$/, '');

  // URL keeps the brackets around IPv6 hosts.
  if (isIP(hostname.replace(/^\[(.*)\]$/, '$1')) !== 0) {
    return `Asset URL must name a host, not an IP address: ${hostname}`;
  }

  if (BLOCKED_HOSTNAMES.has(hostname) || hostname.endsWith('.localhost') || hostname.endsWith('.internal')) {
    return `Asset URL points to an internal host: ${hostname}`;
  }

  const allowed = allowedHosts
    .map(normaliseHost)
    .filter((h) => h.length > 0)
    .some((domain) => hostname === domain || hostname.endsWith(`.${domain}`));

  if (!allowed) {
    return `Asset host is not allow-listed: ${hostname}`;
  }

  return null;
}

/** Convenience predicate over validateAssetUrl. */
export function isAllowedAssetUrl(url: string, allowedHosts: readonly string[]): boolean {
  return validateAssetUrl(url, allowedHosts) === null;
}
