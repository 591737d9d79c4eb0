/**
 * Admin authentication.
 *
 * A single admin password (PBKDF2-hashed at start-up) is exchanged for a
 * short-lived HS256 JWT. Admin routes also honour an optional client IP
 * allow-list.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';
import jwt from 'jsonwebtoken';
import { CertificateError, forbiddenError, unauthenticatedError } from '../domain/errors';
import { clientIdentity, requestLogger } from './middleware';

const PBKDF2_ITERATIONS = 100_000;
const PBKDF2_KEYLEN = 64;
const PBKDF2_DIGEST = 'sha512';
const SALT_BYTES = 32;

const TOKEN_SUBJECT = 'admin';
const TOKEN_ROLE = 'admin';

/**
 * Hash a password using PBKDF2 with a random salt.
 * Returns `salt:derivedKey` as a hex string.
 */
export function hashPassword(password: string): string {
  const salt = randomBytes(SALT_BYTES).toString('hex');
  const derived = pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, PBKDF2_KEYLEN, PBKDF2_DIGEST).toString('hex');
  return `${salt}:${derived}`;
}

/** Verify a password against a stored hash in constant time. */
export function verifyPassword(password: string, storedHash: string): boolean {
  const [salt, expectedKey] = storedHash.split(':');
  if (!salt || !expectedKey) return false;
  const derived = pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, PBKDF2_KEYLEN, PBKDF2_DIGEST);
  const expected = Buffer.from(expectedKey, 'hex');
  if (derived.length !== expected.length) return false;
  return timingSafeEqual(derived, expected);
}

/** `::ffff:10.0.0.1` and `10.0.0.1` are the same client. */
export function normaliseIp(ip: string): string {
  return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

export interface AdminAuthOptions {
  password: string;
  /** HMAC secret. A random one is generated when omitted. */
  sessionSecret?: string;
  sessionTtlSeconds: number;
  /** Empty means every address is allowed. */
  allowedIps: string[];
}

export interface AdminSession {
  token: string;
  expiresIn: number;
}

export class AdminAuth {
  private readonly passwordHash: string;
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly allowedIps: ReadonlySet<string>;

  constructor(options: AdminAuthOptions) {
    this.passwordHash = hashPassword(options.password);
    this.secret = options.sessionSecret ?? randomBytes(32).toString('hex');
    this.ttlSeconds = options.sessionTtlSeconds;
    this.allowedIps = new Set(options.allowedIps.map(normaliseIp));
  }

  /** Exchange the admin password for a session token, or null on mismatch. */
  login(password: string): AdminSession | null {
    if (!verifyPassword(password, this.passwordHash)) return null;
    const token = jwt.sign({ role: TOKEN_ROLE }, this.secret, {
      algorithm: 'HS256',
      expiresIn: this.ttlSeconds,
      subject: TOKEN_SUBJECT,
    });
    return { token, expiresIn: this.ttlSeconds };
  }

  verifyToken(token: string): boolean {
    try {
      const payload = jwt.verify(token, this.secret, { algorithms: ['HS256'], subject: TOKEN_SUBJECT });
      return typeof payload === 'object' && payload.role === TOKEN_ROLE;
    } catch {
      return false;
    }
  }

  isAllowedIp(ip: string): boolean {
    return this.allowedIps.size === 0 || this.allowedIps.has(normaliseIp(ip));
  }
}

function bearerToken(req: Request): string | null {
  const header = req.get('authorization');
  const match = header ? /^Bearer\s+(\S+)$/i.exec(header) : null;
  return match ? match[1] : null;
}

/** Reject clients outside the admin IP allow-list with 403. */
export function requireAllowedIp(auth: AdminAuth): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const client = clientIdentity(req);
    if (!auth.isAllowedIp(client)) {
      requestLogger(req).warn('Admin access from address outside allow-list', { client });
      next(new CertificateError(forbiddenError()));
      return;
    }
    next();
  };
}

/** Require a valid admin bearer token (401 otherwise). */
export function requireAdmin(auth: AdminAuth): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token || !auth.verifyToken(token)) {
      next(new CertificateError(unauthenticatedError(token ? 'Invalid or expired session' : 'Authentication required')));
      return;
    }
    next();
  };
}
