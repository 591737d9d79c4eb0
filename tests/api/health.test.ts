import { createTestApp, field, newRecord, request } from '../helpers';

describe('GET /health', () => {
  it('reports a healthy service', async () => {
    const { app, ctx } = await createTestApp({ RENDER_POOL_SIZE: '3' });
    await ctx.store.certificates.create(newRecord('ana-perez'));
    const res = await request(app, 'GET', '/health');

    expect(res.status).toBe(200);
    expect(field(res.json, 'status')).toBe('healthy');
    expect(field(res.json, 'database')).toBe('connected');
    expect(field(res.json, 'store')).toBe('memory');
    expect(field(res.json, 'storage')).toBe('not_configured');
    expect(field(res.json, 'renderPool')).toEqual({ size: 3, inUse: 0, available: 3 });
    expect(field(res.json, 'totalRecords')).toBe(1);
  });

  it('answers 503 when the record store is unreachable', async () => {
    const { app, ctx } = await createTestApp();
    jest.spyOn(ctx.store.certificates, 'ping').mockRejectedValue(new Error('connection refused'));
    const res = await request(app, 'GET', '/health');

    expect(res.status).toBe(503);
    expect(field(res.json, 'status')).toBe('unhealthy');
    expect(field(res.json, 'database')).toBe('unreachable');
    expect(field(res.json, 'totalRecords')).toBeNull();
  });

  it('is not rate limited', async () => {
    const { app } = await createTestApp({ RATE_LIMIT_ADMIN_PER_MINUTE: '1', RATE_LIMIT_VIEW_PER_MINUTE: '1' });
    await request(app, 'GET', '/health');
    expect((await request(app, 'GET', '/health')).status).toBe(200);
  });
});
