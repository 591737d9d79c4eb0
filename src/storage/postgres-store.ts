/**
 * PostgreSQL storage implementation (node-postgres).
 *
 * Queries go through the narrow SqlClient surface so that a pg.Pool, a
 * pooled client or a test double can back the store. Rows are parsed with
 * zod before they leave this module.
 */

import { Pool } from 'pg';
import { z } from 'zod';
import { CertificateRecord, NewCertificateRecord } from '../domain/certificate';
import { CertificateError, duplicateSlugError } from '../domain/errors';
import { CertificateQuery, CertificateStore, ListOptions, Store, normaliseListOptions } from './store';

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/** Adapt a pg.Pool to SqlClient. */
export function poolClient(pool: Pool): SqlClient {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

export const CERTIFICATES_DDL = `
CREATE TABLE IF NOT EXISTS certificates (
  id              TEXT PRIMARY KEY,
  slug            VARCHAR(100) NOT NULL UNIQUE,
  recipient_name  VARCHAR(255) NOT NULL,
  recipient_email VARCHAR(255) NOT NULL,
  asset_url       TEXT NOT NULL,
  asset_public_id TEXT NOT NULL,
  view_count      INTEGER NOT NULL DEFAULT 0,
  last_viewed_at  TIMESTAMPTZ,
  created_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_certificates_email ON certificates (recipient_email);
CREATE INDEX IF NOT EXISTS idx_certificates_created_at ON certificates (created_at DESC);
`;

const COLUMNS =
  'id, slug, recipient_name, recipient_email, asset_url, asset_public_id, view_count, last_viewed_at, created_at';

const rowSchema = z.object({
  id: z.string(),
  slug: z.string(),
  recipient_name: z.string(),
  recipient_email: z.string(),
  asset_url: z.string(),
  asset_public_id: z.string(),
  view_count: z.coerce.number().int(),
  last_viewed_at: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
});

function toRecord(row: unknown): CertificateRecord {
  const parsed = rowSchema.parse(row);
  return {
    id: parsed.id,
    slug: parsed.slug,
    recipientName: parsed.recipient_name,
    recipientEmail: parsed.recipient_email,
    assetUrl: parsed.asset_url,
    assetPublicId: parsed.asset_public_id,
    viewCount: parsed.view_count,
    lastViewedAt: parsed.last_viewed_at ? parsed.last_viewed_at.toISOString() : null,
    createdAt: parsed.created_at.toISOString(),
  };
}

/** Escape LIKE wildcards so user input matches literally. */
export function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export class PostgresCertificateStore implements CertificateStore {
  constructor(private readonly db: SqlClient) {}

  async migrate(): Promise<void> {
    await this.db.query(CERTIFICATES_DDL);
  }

  async create(record: NewCertificateRecord): Promise<CertificateRecord> {
    const result = await this.db.query(
      `INSERT INTO certificates (id, slug, recipient_name, recipient_email, asset_url, asset_public_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (slug) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.slug,
        record.recipientName,
        record.recipientEmail,
        record.assetUrl,
        record.assetPublicId,
        record.createdAt,
      ],
    );
    if (result.rows.length === 0) {
      throw new CertificateError(duplicateSlugError(record.slug));
    }
    return toRecord(result.rows[0]);
  }

  async getBySlug(slug: string): Promise<CertificateRecord | null> {
    const result = await this.db.query(`SELECT ${COLUMNS} FROM certificates WHERE slug = $1`, [slug]);
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async recordView(slug: string, at: Date): Promise<CertificateRecord | null> {
    const result = await this.db.query(
      `UPDATE certificates
       SET view_count = view_count + 1, last_viewed_at = $2
       WHERE slug = $1
       RETURNING ${COLUMNS}`,
      [slug, at.toISOString()],
    );
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async list(options?: ListOptions): Promise<CertificateRecord[]> {
    const { limit, offset } = normaliseListOptions(options);
    const result = await this.db.query(
      `SELECT ${COLUMNS} FROM certificates ORDER BY created_at DESC, id DESC LIMIT $1 OFFSET $2`,
      [limit, offset],
    );
    return result.rows.map(toRecord);
  }

  async count(): Promise<number> {
    const result = await this.db.query('SELECT COUNT(*) AS total FROM certificates');
    return z.object({ total: z.coerce.number().int() }).parse(result.rows[0]).total;
  }

  async search(query: CertificateQuery, options?: ListOptions): Promise<CertificateRecord[]> {
    const { limit, offset } = normaliseListOptions(options);
    const [column, term] = 'email' in query ? ['recipient_email', query.email] : ['recipient_name', query.name];
    const result = await this.db.query(
      `SELECT ${COLUMNS} FROM certificates WHERE ${column} ILIKE $1 ORDER BY created_at DESC, id DESC LIMIT $2 OFFSET $3`,
      [likePattern(term), limit, offset],
    );
    return result.rows.map(toRecord);
  }

  async ping(): Promise<void> {
    await this.db.query('SELECT 1');
  }
}

/** Create a Postgres-backed store. Call `migrate()` on the result before serving. */
export function createPostgresStore(db: SqlClient): Store & { certificates: PostgresCertificateStore } {
  return {
    kind: 'postgres',
    certificates: new PostgresCertificateStore(db),
  };
}

/** Heroku-style `postgres://` URLs are not accepted by every client; normalise them. */
export function normaliseDatabaseUrl(url: string): string {
  return url.startsWith('postgres://') ? `postgresql://${url.slice('postgres://'.length)}` : url;
}
