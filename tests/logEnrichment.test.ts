import express from 'express';
import request from 'supertest';
import { healthRouter } from '../src/lib/health';
import { logEnrichment, readCorrelationId } from '../src/lib/logEnrichment';
import { captureLogger, flush } from './helpers/fixtures';

function createApp(enabled = true) {
  const { logger, lines } = captureLogger();
  const app = express();
  app.use(logEnrichment({ logger, enabled }));
  app.get('/orders', (req, res) => {
    res.setHeader('X-Cache', 'HIT');
    res.json({ correlationId: req.correlationId });
  });
  return { app, lines };
}

describe('logEnrichment', () => {
  test('logs start and completion under the caller correlation id', async () => {
    const { app, lines } = createApp();

    const res = await request(app).get('/orders?page=2').set('X-Correlation-Id', 'test-correlation');
    await flush();

    expect(res.body).toEqual({ correlationId: 'test-correlation' });
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: 'info',
      message: 'Request started',
      correlationId: 'test-correlation',
      method: 'GET',
      url: '/orders?page=2',
    });
    expect(lines[1]).toMatchObject({
      level: 'info',
      message: 'Request completed',
      correlationId: 'test-correlation',
      statusCode: 200,
      cacheStatus: 'HIT',
    });
  });

  test('still assigns a correlation id when logging is off', async () => {
    const { app, lines } = createApp(false);

    const res = await request(app).get('/orders');
    await flush();

    expect(res.body.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(lines).toHaveLength(0);
  });

  test('ignores oversized correlation ids', () => {
    expect(readCorrelationId('x'.repeat(129))).toBeUndefined();
    expect(readCorrelationId(['first', 'second'])).toBe('first');
  });
});

describe('healthRouter', () => {
  test('is unhealthy when its details check throws', async () => {
    const app = express();
    app.use(
      healthRouter({
        service: 'gateway',
        details: () => {
          throw new Error('store unreachable');
        },
      }),
    );

    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ service: 'gateway', status: 'Unhealthy', error: 'store unreachable' });
  });
});
