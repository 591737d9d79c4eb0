/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are deep
 * copied on the way in and out so callers never alias the store's state.
 */

import { CertificateRecord, NewCertificateRecord } from '../domain/certificate';
import { CertificateError, duplicateSlugError } from '../domain/errors';
import { CertificateQuery, CertificateStore, ListOptions, Store, normaliseListOptions } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const { limit, offset } = normaliseListOptions(options);
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function matchesQuery(record: CertificateRecord, query: CertificateQuery): boolean {
  if ('email' in query) {
    return record.recipientEmail.toLowerCase().includes(query.email.toLowerCase());
  }
  return record.recipientName.toLowerCase().includes(query.name.toLowerCase());
}

export class MemoryCertificateStore implements CertificateStore {
  private data = new Map<string, CertificateRecord>();

  async create(record: NewCertificateRecord): Promise<CertificateRecord> {
    if (this.data.has(record.slug)) {
      throw new CertificateError(duplicateSlugError(record.slug));
    }
    const stored: CertificateRecord = { ...deepCopy(record), viewCount: 0, lastViewedAt: null };
    this.data.set(record.slug, stored);
    return deepCopy(stored);
  }

  async getBySlug(slug: string): Promise<CertificateRecord | null> {
    const record = this.data.get(slug);
    return record ? deepCopy(record) : null;
  }

  async recordView(slug: string, at: Date): Promise<CertificateRecord | null> {
    const existing = this.data.get(slug);
    if (!existing) return null;
    const updated = { ...existing, viewCount: existing.viewCount + 1, lastViewedAt: at.toISOString() };
    this.data.set(slug, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<CertificateRecord[]> {
    return applyListOptions(this.newestFirst(), options).map(deepCopy);
  }

  async count(): Promise<number> {
    return this.data.size;
  }

  async search(query: CertificateQuery, options?: ListOptions): Promise<CertificateRecord[]> {
    const items = this.newestFirst().filter((r) => matchesQuery(r, query));
    return applyListOptions(items, options).map(deepCopy);
  }

  async ping(): Promise<void> {
    // Always reachable.
  }

  /** Map iteration order is insertion order; reverse it to break createdAt ties. */
  private newestFirst(): CertificateRecord[] {
    return [...this.data.values()]
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    kind: 'memory',
    certificates: new MemoryCertificateStore(),
  };
}
