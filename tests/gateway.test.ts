import axios, { type InternalAxiosRequestConfig } from 'axios';
import request from 'supertest';
import { createGatewayApp, type GatewayAppOptions } from '../src/app';
import { createOrderRepository, orderDefinition } from '../src/entities/orders';
import type { GatewayConfig } from '../src/lib/config';
import { RepositoryDownstream } from '../src/lib/downstream';
import type { Result } from '../src/types';
import { gatewayConfig } from './helpers/fixtures';

const ordersTarget = { host: 'orders', port: 5001 };

function ordersConfig(global: Record<string, unknown> = {}): GatewayConfig {
  return gatewayConfig({
    global,
    routes: [
      {
        upstreamPathTemplate: '/api/orders',
        upstreamMethods: ['GET', 'POST'],
        downstream: { ...ordersTarget, pathTemplate: '/orders' },
        entity: 'orders',
        rateLimit: { windowSeconds: 60, limit: 3 },
        cache: { ttlSeconds: 300, slidingSeconds: 120 },
      },
      {
        upstreamPathTemplate: '/api/orders/{id}',
        upstreamMethods: ['GET', 'PUT', 'PATCH', 'DELETE'],
        downstream: { ...ordersTarget, pathTemplate: '/orders/{id}' },
        entity: 'orders',
        cache: { ttlSeconds: 300 },
      },
    ],
  });
}

function createApp(overrides: Partial<GatewayAppOptions> = {}) {
  const repository = createOrderRepository({ now: () => Date.UTC(2024, 0, 1) });
  const downstream = new RepositoryDownstream(repository, orderDefinition, '/orders');
  const built = createGatewayApp({
    config: ordersConfig(),
    resolveDownstream: () => downstream,
    requestLogging: false,
    now: () => 1_000,
    ...overrides,
  });
  if (!built.ok) throw new Error(built.error.join('\n'));
  return { ...built.value, repository };
}

describe('gateway over an entity service', () => {
  test('a create is visible to the next read of the collection', async () => {
    const { app } = createApp();

    const empty = await request(app).get('/api/orders');
    const created = await request(app).post('/api/orders').send({ customerName: 'Ada' });
    const listed = await request(app).get('/api/orders');

    expect(empty.status).toBe(200);
    expect(empty.body).toEqual([]);
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ customerName: 'Ada', orderDate: '2024-01-01T00:00:00.000Z' });
    expect(listed.headers['x-cache']).toBe('MISS');
    expect(listed.body).toEqual([created.body]);
  });

  test('repeated reads are served from the cache', async () => {
    const { app, repository } = createApp();
    const getAll = jest.spyOn(repository, 'getAll');

    await request(app).get('/api/orders');
    const second = await request(app).get('/api/orders');

    expect(second.headers['x-cache']).toBe('HIT');
    expect(getAll).toHaveBeenCalledTimes(1);
  });

  test('deleting a missing order is a 404 envelope', async () => {
    const { app } = createApp();

    const res = await request(app).delete('/api/orders/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 404, message: 'Order with ID missing was not found' });
  });

  test('invalid input is a 400 with field detail', async () => {
    const { app } = createApp();

    const res = await request(app).post('/api/orders').send({ customerName: '' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 400,
      message: 'One or more validation errors occurred',
      detail: [{ field: 'customerName', message: 'Customer Name is required' }],
    });
  });

  test('malformed JSON is rejected before routing', async () => {
    const { app } = createApp();

    const res = await request(app).post('/api/orders').set('Content-Type', 'application/json').send('{"customerName":');

    expect(res.status).toBe(400);
    expect(res.body.status).toBe(400);
  });

  test('an unknown path is a JSON 404', async () => {
    const { app } = createApp();

    const res = await request(app).get('/api/unknown');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 404, message: 'No route matches /api/unknown' });
  });

  test('echoes the caller correlation id', async () => {
    const { app } = createApp();

    const res = await request(app).get('/api/orders').set('X-Correlation-Id', 'test-correlation');

    expect(res.headers['x-correlation-id']).toBe('test-correlation');
  });
});

describe('gateway rate limiting', () => {
  test('denies a client over its limit with Retry-After, per ClientId', async () => {
    const { app } = createApp();

    for (let i = 0; i < 3; i++) {
      const res = await request(app).get('/api/orders').set('ClientId', 'abc');
      expect(res.status).toBe(200);
      expect(res.headers['x-ratelimit-remaining']).toBe(String(2 - i));
    }
    const denied = await request(app).get('/api/orders').set('ClientId', 'abc');
    const other = await request(app).get('/api/orders').set('ClientId', 'xyz');

    expect(denied.status).toBe(429);
    expect(denied.headers['retry-after']).toBe('60');
    expect(denied.body).toEqual({ status: 429, message: 'API calls quota exceeded!' });
    expect(other.status).toBe(200);
  });

  test('allow-listed clients are never limited', async () => {
    const { app } = createApp({ config: ordersConfig({ rateLimit: { clientAllowList: ['partner'] } }) });

    for (let i = 0; i < 5; i++) {
      const res = await request(app).get('/api/orders').set('ClientId', 'partner');
      expect(res.status).toBe(200);
      expect(res.headers['x-ratelimit-remaining']).toBeUndefined();
    }
  });
});

describe('gateway operations', () => {
  test('exposes Prometheus metrics', async () => {
    const { app } = createApp();

    await request(app).get('/api/orders');
    await request(app).get('/api/orders');
    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect(res.text.split('\n')).toEqual(
      expect.arrayContaining(['cachegate_cache_hits_total 1', 'cachegate_cache_misses_total 1']),
    );
  });

  test('answers CORS requests for any origin', async () => {
    const { app } = createApp();

    const simple = await request(app).get('/api/orders').set('Origin', 'http://app.test');
    const preflight = await request(app)
      .options('/api/orders')
      .set('Origin', 'http://app.test')
      .set('Access-Control-Request-Method', 'POST')
      .set('Access-Control-Request-Headers', 'Content-Type, ClientId');

    expect(simple.headers['access-control-allow-origin']).toBe('*');
    expect(preflight.status).toBe(204);
    expect(preflight.headers['access-control-allow-methods']).toBe('GET,HEAD,PUT,PATCH,POST,DELETE');
    expect(preflight.headers['access-control-allow-headers']).toBe('Content-Type, ClientId');
  });

  test('reports health with its advertised address and route count', async () => {
    const { app } = createApp({ config: ordersConfig({ baseUrl: 'http://gateway.test:5000' }) });

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ service: 'gateway', status: 'Healthy', baseUrl: 'http://gateway.test:5000', routes: 2 });
  });

  test('reloads routes on request and keeps them when the new file is invalid', async () => {
    let next: Result<GatewayConfig, string[]> = { ok: false, error: ['routes: Required'] };
    const { app } = createApp({ adminReload: true, reloadConfig: async () => next });

    const rejected = await request(app).post('/admin/reload');
    expect(rejected.status).toBe(400);
    expect(rejected.body).toEqual({ status: 400, message: 'Configuration rejected', detail: ['routes: Required'] });
    expect((await request(app).get('/api/orders')).status).toBe(200);

    next = {
      ok: true,
      value: gatewayConfig({
        routes: [
          {
            upstreamPathTemplate: '/api/v2/orders',
            upstreamMethods: ['GET'],
            downstream: { ...ordersTarget, pathTemplate: '/orders' },
          },
        ],
      }),
    };
    const accepted = await request(app).post('/admin/reload');
    expect(accepted.body).toEqual({ status: 200, message: 'Routes reloaded', routes: 1 });
    expect((await request(app).get('/api/v2/orders')).status).toBe(200);
    expect((await request(app).get('/api/orders')).status).toBe(404);
  });

  test('the reload endpoint is absent unless enabled', async () => {
    const { app } = createApp({ reloadConfig: async () => ({ ok: true, value: ordersConfig() }) });

    const res = await request(app).post('/admin/reload');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 404, message: 'No route matches /admin/reload' });
  });

  test('forwards over HTTP when no resolver is given', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const httpClient = axios.create({
      adapter: async (config) => {
        seen.push(config);
        return { data: '[{"id":"1"}]', status: 200, statusText: 'OK', headers: { 'content-type': 'application/json' }, config };
      },
    });
    const built = createGatewayApp({ config: ordersConfig(), httpClient, requestLogging: false });
    if (!built.ok) throw new Error(built.error.join('\n'));

    const res = await request(built.value.app).get('/api/orders').set('X-Correlation-Id', 'test-correlation');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([{ id: '1' }]);
    expect(seen[0].url).toBe('http://orders:5001/orders');
    expect(seen[0].headers['x-correlation-id']).toBe('test-correlation');
  });

  test('refuses a configuration whose templates do not compile', () => {
    const built = createGatewayApp({
      config: gatewayConfig({
        routes: [
          {
            upstreamPathTemplate: '/a',
            upstreamMethods: ['GET'],
            downstream: { host: 'x', port: 1, pathTemplate: '/b/{id}' },
          },
        ],
      }),
    });

    expect(built).toEqual({ ok: false, error: ['routes.0.downstream.pathTemplate: unbound parameter(s) id'] });
  });
});
