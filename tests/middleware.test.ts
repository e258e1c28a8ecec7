import request from 'supertest';
import express from 'express';
import { extractClientKey, rateLimit } from '../src/middleware.js';
import { VisitorRegistry } from '../src/visitors.js';

describe('extractClientKey', () => {
  it('should use req.ip when present', () => {
    expect(extractClientKey({ ip: '203.0.113.7', socket: { remoteAddress: '10.0.0.1' } })).toBe('203.0.113.7');
  });

  it('should fall back to the socket address', () => {
    expect(extractClientKey({ ip: undefined, socket: { remoteAddress: '192.168.0.9' } })).toBe('192.168.0.9');
  });

  it('should reduce IPv4-mapped IPv6 addresses to IPv4', () => {
    expect(extractClientKey({ ip: '::ffff:127.0.0.1', socket: {} })).toBe('127.0.0.1');
  });

  it('should keep plain IPv6 addresses', () => {
    expect(extractClientKey({ ip: '::1', socket: {} })).toBe('::1');
    expect(extractClientKey({ ip: '::ffff:abcd', socket: {} })).toBe('::ffff:abcd');
  });

  it('should return undefined when no address is known', () => {
    expect(extractClientKey({ ip: '', socket: {} })).toBeUndefined();
    expect(extractClientKey({ socket: { remoteAddress: undefined } })).toBeUndefined();
  });
});

describe('rateLimit middleware', () => {
  let now: number;
  let registry: VisitorRegistry;
  let handled: number;
  const clock = () => now;

  const buildApp = (resolveKey?: () => string | undefined): express.Application => {
    const app = express();
    app.use(rateLimit(registry, resolveKey));
    app.get('/ping', (_req, res) => {
      handled++;
      res.status(200).json({ ok: true });
    });
    return app;
  };

  beforeEach(() => {
    now = 1_700_000_000_000;
    registry = new VisitorRegistry({ capacity: 5, refillPerSec: 1 }, clock);
    handled = 0;
  });

  it('should forward 5 requests, reject the 6th with 429 and forward again after 1s', async () => {
    const app = buildApp();

    for (let i = 0; i < 5; i++) {
      const response = await request(app).get('/ping');
      expect(response.status).toBe(200);
    }

    const rejected = await request(app).get('/ping');
    expect(rejected.status).toBe(429);
    expect(rejected.body).toEqual({ error: 'Too many requests' });
    expect(handled).toBe(5);

    now += 1000;
    const admitted = await request(app).get('/ping');
    expect(admitted.status).toBe(200);
    expect(handled).toBe(6);
    expect(registry.size).toBe(1);
  });

  it('should track each client key separately', async () => {
    let key = 'client-a';
    const app = buildApp(() => key);

    for (let i = 0; i < 5; i++) await request(app).get('/ping');
    expect((await request(app).get('/ping')).status).toBe(429);

    key = 'client-b';
    expect((await request(app).get('/ping')).status).toBe(200);
    expect(registry.size).toBe(2);
  });

  it('should reject with 500 and leave the registry untouched when the key is unknown', async () => {
    const app = buildApp(() => undefined);

    const response = await request(app).get('/ping');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: 'Internal server error',
      message: 'Unable to determine client address',
    });
    expect(handled).toBe(0);
    expect(registry.size).toBe(0);
  });
});
