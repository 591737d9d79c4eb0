/**
 * Storage layer interfaces.
 *
 * Defines the contract for certificate persistence with pluggable backends:
 * an in-memory store for development and tests, PostgreSQL in production.
 */

import { CertificateRecord, NewCertificateRecord } from '../domain/certificate';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Case-insensitive substring search. Exactly one field is expected. */
export type CertificateQuery = { email: string } | { name: string };

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 500;

/** Store interface for certificate records, keyed by slug. */
export interface CertificateStore {
  /** Insert a record. Throws STORE.DUPLICATE_SLUG when the slug is taken. */
  create(record: NewCertificateRecord): Promise<CertificateRecord>;
  getBySlug(slug: string): Promise<CertificateRecord | null>;
  /** Atomically increment the view count and set lastViewedAt. */
  recordView(slug: string, at: Date): Promise<CertificateRecord | null>;
  /** Newest first. */
  list(options?: ListOptions): Promise<CertificateRecord[]>;
  count(): Promise<number>;
  search(query: CertificateQuery, options?: ListOptions): Promise<CertificateRecord[]>;
  /** Resolves when the backend is reachable. */
  ping(): Promise<void>;
}

/** Clamp caller-supplied list options to the store's bounds. */
export function normaliseListOptions(options?: ListOptions): Required<ListOptions> {
  const limit = Math.min(Math.max(Math.trunc(options?.limit ?? DEFAULT_LIST_LIMIT), 1), MAX_LIST_LIMIT);
  const offset = Math.max(Math.trunc(options?.offset ?? 0), 0);
  return { limit, offset };
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const { limit, offset } = normaliseListOptions(options);
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  certificates: CertificateStore;
  /** Human-readable backend name for /health. */
  readonly kind: 'memory' | 'postgres';
}
