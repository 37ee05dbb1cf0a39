/**
 * ProtocolEngine Integration Tests
 *
 * Runs the engine on an ephemeral loopback port and talks to it with
 * Node's HTTP client and raw sockets.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import http from 'http';
import { ProtocolEngine, SERVER_NAME } from '../../../src/server/transports/index.js';
import { HandlerRegistryBuilder } from '../../../src/server/router.js';
import { Responses } from '../../../src/server/responses.js';
import { rawExchange, request } from './http-helpers.js';

const HELLO = '{"message":"Hello world!"}';
const SESSION_TIMEOUT_MS = 400;

function buildRegistry() {
  return new HandlerRegistryBuilder()
    .register('GET', '/', () => Responses.json({ message: 'Hello world!' }))
    .register('POST', '/echo', (req) => Responses.json({ body: req.body, keepAlive: req.keepAlive }))
    .register('GET', '/explode', () => {
      throw new Error('handler exploded');
    })
    .build();
}

describe('ProtocolEngine', () => {
  let engine: ProtocolEngine;
  let port: number;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    engine = new ProtocolEngine(buildRegistry(), {
      host: '127.0.0.1',
      port: 0,
      sessionTimeoutMs: SESSION_TIMEOUT_MS,
      maxBodyBytes: 16,
    });
    port = (await engine.listen()).port;
  });

  afterEach(async () => {
    await engine.stop();
    vi.restoreAllMocks();
  });

  it('dispatches a registered route with the standard headers', async () => {
    const res = await request({ port });

    expect(res.status).toBe(400);
    expect(res.body).toBe(HELLO);
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.headers['content-length']).toBe(String(Buffer.byteLength(HELLO)));
    expect(res.headers.server).toBe(SERVER_NAME);
  });

  it('answers unknown routes and verbs with 404', async () => {
    const missing = await request({ port, path: '/missing' });
    expect(missing.status).toBe(404);
    expect(missing.headers['content-type']).toBe('text/html');
    expect(missing.body).toBe('Route /missing is not found.');

    const wrongVerb = await request({ port, method: 'DELETE', path: '/' });
    expect(wrongVerb.status).toBe(404);
    expect(wrongVerb.body).toBe('Route / is not found.');
  });

  it('answers HEAD with the GET status and headers and no body', async () => {
    const res = await request({ port, method: 'HEAD' });

    expect(res.status).toBe(400);
    expect(res.headers['content-length']).toBe(String(Buffer.byteLength(HELLO)));
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.body).toBe('');
  });

  it('passes the request body to the handler', async () => {
    const res = await request({ port, method: 'POST', path: '/echo', body: 'ping' });
    expect(JSON.parse(res.body)).toEqual({ body: 'ping', keepAlive: false });
  });

  it('refuses bodies above the limit and closes the connection', async () => {
    const res = await request({ port, method: 'POST', path: '/echo', body: 'x'.repeat(32) });

    expect(res.status).toBe(400);
    expect(res.headers['content-type']).toBe('text/html');
    expect(res.headers.connection).toBe('close');
    expect(res.body).toBe('Request body exceeds 16 bytes.');
  });

  it('turns a throwing handler into a 500', async () => {
    const res = await request({ port, path: '/explode' });

    expect(res.status).toBe(500);
    expect(res.body).toBe('Internal server error.');
  });

  it('keeps an HTTP/1.1 connection open across requests', async () => {
    const agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
    try {
      const first = await request({ port, agent });
      const second = await request({ port, agent });

      expect(first.headers.connection).toBe('keep-alive');
      expect(second.body).toBe(HELLO);
      expect(second.reusedSocket).toBe(true);
    } finally {
      agent.destroy();
    }
  });

  it('closes an HTTP/1.0 connection after one response', async () => {
    const reply = await rawExchange(port, 'GET / HTTP/1.0\r\nHost: localhost\r\n\r\n');

    expect(reply).toMatch(/^HTTP\/1\.1 400 /);
    expect(reply).toContain('\r\nConnection: close\r\n');
    expect(reply.endsWith(`\r\n\r\n${HELLO}`)).toBe(true);
  });

  it('answers a malformed request with 400 on the raw socket', async () => {
    const reply = await rawExchange(port, 'NOT A REQUEST\r\n\r\n');

    expect(reply.startsWith('HTTP/1.1 400 Bad Request\r\n')).toBe(true);
    expect(reply).toContain(`\r\nServer: ${SERVER_NAME}\r\n`);
    expect(reply.endsWith('\r\n\r\nMalformed request.')).toBe(true);
  });

  it('closes a connection that sends nothing within the session timeout', async () => {
    const started = Date.now();
    const reply = await rawExchange(port, null);

    expect(reply).toBe('');
    expect(Date.now() - started).toBeGreaterThanOrEqual(SESSION_TIMEOUT_MS - 50);
  });

  it('serves concurrent connections independently', async () => {
    const responses = await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        i % 2 === 0 ? request({ port }) : request({ port, path: `/missing-${i}` })
      )
    );

    responses.forEach((res, i) => {
      if (i % 2 === 0) {
        expect(res.body).toBe(HELLO);
      } else {
        expect(res.body).toBe(`Route /missing-${i} is not found.`);
      }
    });
  });

  it('destroys open sessions when stopped', async () => {
    const agent = new http.Agent({ keepAlive: true, maxSockets: 1 });
    try {
      await request({ port, agent });
      expect(engine.getSessionCount()).toBe(1);

      await engine.stop();
      expect(engine.getSessionCount()).toBe(0);
    } finally {
      agent.destroy();
    }
  });

  it('refuses to listen twice', async () => {
    await expect(engine.listen()).rejects.toThrow('[Engine] Already listening');
  });
});
