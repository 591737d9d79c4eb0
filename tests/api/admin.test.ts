import { csvField, toCsv } from '../../src/api/admin';
import { AdminAuth, hashPassword, normaliseIp, verifyPassword } from '../../src/api/auth';
import { AssetStorage, StoredAsset, UnconfiguredStorage } from '../../src/generation/asset-storage';
import { createTestApp, field, newRecord, request, storedRecord } from '../helpers';

class RecordingStorage implements AssetStorage {
  readonly configured = true;
  readonly publicIds: string[] = [];

  async uploadSvg(_svg: string, publicId: string): Promise<StoredAsset> {
    this.publicIds.push(publicId);
    const id = `certificates/${publicId}`;
    return { publicId: id, url: `https://res.cloudinary.com/demo/raw/upload/${id}`, bytes: 100 };
  }

  async deleteAsset(): Promise<void> {}
}

async function loggedIn(env: Record<string, string> = {}, storage: AssetStorage = new RecordingStorage()) {
  const testApp = await createTestApp(env, { storage });
  const login = await request(testApp.app, 'POST', '/admin/login', { body: { password: 'test-password' } });
  const token = field(login.json, 'token');
  if (typeof token !== 'string') throw new Error('login did not return a token');
  return { ...testApp, headers: { Authorization: `Bearer ${token}` } };
}

describe('password hashing', () => {
  it('accepts only the hashed password', () => {
    const hash = hashPassword('test-password');
    expect(verifyPassword('test-password', hash)).toBe(true);
    expect(verifyPassword('wrong', hash)).toBe(false);
    expect(verifyPassword('test-password', 'garbage')).toBe(false);
  });

  it('salts every hash', () => {
    expect(hashPassword('test-password')).not.toBe(hashPassword('test-password'));
  });
});

describe('AdminAuth', () => {
  const auth = new AdminAuth({
    password: 'test-password',
    sessionSecret: 'test-secret-0123456789',
    sessionTtlSeconds: 60,
    allowedIps: ['10.0.0.1'],
  });

  it('issues tokens it accepts', () => {
    const session = auth.login('test-password');
    expect(session?.expiresIn).toBe(60);
    expect(auth.verifyToken(session?.token ?? '')).toBe(true);
  });

  it('refuses a wrong password and foreign tokens', () => {
    const other = new AdminAuth({ password: 'test-password', sessionTtlSeconds: 60, allowedIps: [] });
    expect(auth.login('wrong')).toBeNull();
    expect(auth.verifyToken(other.login('test-password')?.token ?? '')).toBe(false);
    expect(auth.verifyToken('not-a-jwt')).toBe(false);
  });

  it('matches IPv4-mapped addresses against the allow-list', () => {
    expect(normaliseIp('::ffff:10.0.0.1')).toBe('10.0.0.1');
    expect(auth.isAllowedIp('::ffff:10.0.0.1')).toBe(true);
    expect(auth.isAllowedIp('10.0.0.2')).toBe(false);
  });
});

describe('CSV export format', () => {
  it('neutralises formulas and quotes special characters', () => {
    expect(csvField('=HYPERLINK("x")')).toBe(`"'=HYPERLINK(""x"")"`);
    expect(csvField('@cmd')).toBe("'@cmd");
    expect(csvField('Perez, Ana')).toBe('"Perez, Ana"');
    expect(csvField(3)).toBe('3');
    expect(csvField(-3)).toBe('-3');
    expect(csvField(null)).toBe('');
  });

  it('writes one CRLF-terminated line per record', () => {
    const csv = toCsv([storedRecord('ana-perez', { viewCount: 2 })], 'https://certs.example.org/');
    expect(csv).toBe(
      'slug,recipientName,recipientEmail,url,viewCount,lastViewedAt,createdAt\r\n' +
        'ana-perez,Ana Perez,ana@example.com,https://certs.example.org/certificate/ana-perez,2,,2024-01-15T10:00:00.000Z\r\n',
    );
  });
});

describe('POST /admin/login', () => {
  it('exchanges the password for a session token', async () => {
    const { app } = await createTestApp();
    const res = await request(app, 'POST', '/admin/login', { body: { password: 'test-password' } });

    expect(res.status).toBe(200);
    expect(field(res.json, 'expiresIn')).toBe(28_800);
    expect(typeof field(res.json, 'token')).toBe('string');
  });

  it('rejects a wrong password', async () => {
    const { app } = await createTestApp();
    const res = await request(app, 'POST', '/admin/login', { body: { password: 'nope' } });

    expect(res.status).toBe(401);
    expect(field(res.json, 'error', 'message')).toBe('Invalid password');
  });

  it('rejects a missing password', async () => {
    const { app } = await createTestApp();
    const res = await request(app, 'POST', '/admin/login', { body: {} });

    expect(res.status).toBe(422);
    expect(field(res.json, 'error', 'details', 'issues', 0, 'field')).toBe('password');
  });

  it('limits login attempts', async () => {
    const { app } = await createTestApp({ RATE_LIMIT_LOGIN_PER_MINUTE: '2' });
    await request(app, 'POST', '/admin/login', { body: { password: 'nope' } });
    await request(app, 'POST', '/admin/login', { body: { password: 'nope' } });
    const res = await request(app, 'POST', '/admin/login', { body: { password: 'test-password' } });

    expect(res.status).toBe(429);
  });

  it('refuses clients outside the IP allow-list', async () => {
    const { app } = await createTestApp({ ADMIN_ALLOWED_IPS: '10.0.0.1' });
    const res = await request(app, 'POST', '/admin/login', { body: { password: 'test-password' } });

    expect(res.status).toBe(403);
    expect(field(res.json, 'error', 'code')).toBe('AUTH.FORBIDDEN');
  });
});

describe('admin session checks', () => {
  it('requires a token', async () => {
    const { app } = await createTestApp();
    const res = await request(app, 'GET', '/admin/certificates');

    expect(res.status).toBe(401);
    expect(field(res.json, 'error', 'message')).toBe('Authentication required');
  });

  it('rejects an invalid token', async () => {
    const { app } = await createTestApp();
    const res = await request(app, 'GET', '/admin/stats', { headers: { Authorization: 'Bearer forged' } });

    expect(res.status).toBe(401);
    expect(field(res.json, 'error', 'message')).toBe('Invalid or expired session');
  });
});

describe('POST /certificates/generate', () => {
  it('generates a batch', async () => {
    const { app, headers, ctx } = await loggedIn();
    const res = await request(app, 'POST', '/certificates/generate', {
      headers,
      body: {
        participants: [
          { name: 'Ana Perez', email: 'ana@example.com' },
          { name: 'Ana Perez', email: 'ana.two@example.com' },
        ],
      },
    });

    expect(res.status).toBe(200);
    expect(field(res.json, 'succeeded')).toBe(2);
    expect(field(res.json, 'results', 1, 'slug')).toBe('ana-perez-2');
    expect(field(res.json, 'results', 1, 'url')).toBe('https://certs.example.org/certificate/ana-perez-2');
    expect(await ctx.store.certificates.count()).toBe(2);
  });

  it('validates the payload', async () => {
    const { app, headers } = await loggedIn();
    const res = await request(app, 'POST', '/certificates/generate', {
      headers,
      body: { participants: [{ name: 'Ana', email: 'nope' }] },
    });

    expect(res.status).toBe(422);
    expect(field(res.json, 'error', 'details')).toEqual({
      issues: [{ field: 'participants.0.email', message: 'Invalid email address' }],
    });
  });

  it('enforces the batch size limit', async () => {
    const { app, headers } = await loggedIn({ MAX_BATCH_SIZE: '1' });
    const participant = { name: 'Ana', email: 'ana@example.com' };
    const res = await request(app, 'POST', '/certificates/generate', {
      headers,
      body: { participants: [participant, participant] },
    });

    expect(res.status).toBe(422);
    expect(field(res.json, 'error', 'details', 'issues', 0, 'message')).toBe('At most 1 participants per request');
  });

  it('reports per-participant failures when storage is not configured', async () => {
    const { app, headers } = await loggedIn({}, new UnconfiguredStorage());
    const res = await request(app, 'POST', '/certificates/generate', {
      headers,
      body: { participants: [{ name: 'Ana', email: 'ana@example.com' }] },
    });

    expect(res.status).toBe(200);
    expect(field(res.json, 'failed')).toBe(1);
    expect(field(res.json, 'results', 0, 'error')).toBe('Certificate storage is not available');
  });

  it('requires a session', async () => {
    const { app } = await createTestApp({}, { storage: new RecordingStorage() });
    const res = await request(app, 'POST', '/certificates/generate', {
      body: { participants: [{ name: 'Ana', email: 'ana@example.com' }] },
    });
    expect(res.status).toBe(401);
  });
});

describe('admin listing', () => {
  async function seeded() {
    const testApp = await loggedIn();
    const certificates = testApp.ctx.store.certificates;
    await certificates.create(newRecord('ana-perez'));
    await certificates.create(
      newRecord('bo-lee', {
        recipientName: 'Bo Lee',
        recipientEmail: 'bo@example.org',
        createdAt: '2024-01-16T10:00:00.000Z',
      }),
    );
    return testApp;
  }

  it('lists newest first with pagination metadata', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/certificates?limit=1', { headers });

    expect(res.status).toBe(200);
    expect(field(res.json, 'items', 0, 'slug')).toBe('bo-lee');
    expect(field(res.json, 'total')).toBe(2);
    expect(field(res.json, 'limit')).toBe(1);
    expect(field(res.json, 'hasMore')).toBe(true);
  });

  it('rejects an invalid limit', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/certificates?limit=abc', { headers });
    expect(res.status).toBe(422);
  });

  it('searches by email', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/certificates/search?email=example.org', { headers });

    expect(res.status).toBe(200);
    expect(field(res.json, 'count')).toBe(1);
    expect(field(res.json, 'items', 0, 'slug')).toBe('bo-lee');
  });

  it('needs a search term', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/certificates/search', { headers });

    expect(res.status).toBe(400);
    expect(field(res.json, 'error', 'message')).toBe('Provide an email or name to search for');
  });

  it('exports every certificate as CSV', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/certificates/export', { headers });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(res.headers.get('content-disposition')).toMatch(/^attachment; filename="certificates-\d{4}-\d{2}-\d{2}\.csv"$/);
    expect(res.text.split('\r\n')).toEqual([
      'slug,recipientName,recipientEmail,url,viewCount,lastViewedAt,createdAt',
      'bo-lee,Bo Lee,bo@example.org,https://certs.example.org/certificate/bo-lee,0,,2024-01-16T10:00:00.000Z',
      'ana-perez,Ana Perez,ana@example.com,https://certs.example.org/certificate/ana-perez,0,,2024-01-15T10:00:00.000Z',
      '',
    ]);
  });

  it('reports stats', async () => {
    const { app, headers } = await seeded();
    const res = await request(app, 'GET', '/admin/stats', { headers });

    expect(res.json).toEqual({ total: 2, storageConfigured: true, emailConfigured: false });
  });
});
