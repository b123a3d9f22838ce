/**
 * Capture point API tests
 */

import type { FastifyInstance } from 'fastify';
import { buildApp, toCapturedCall } from '../app.js';
import { encodeRequest } from '../codec/index.js';
import { parseConfig } from '../config.js';
import type { ExchangeStore } from '../store/exchange-store.js';
import { FakeTransport, createForwarder, createInterceptor, createTempStore, serveWhile, silentLogger } from './helpers.js';

describe('capture point', () => {
  let dir: string;
  let store: ExchangeStore;
  let cleanup: () => void;
  let app: FastifyInstance;

  beforeEach(async () => {
    ({ dir, store, cleanup } = createTempStore());
    await store.init();
    const config = parseConfig({ shared_dir: dir }, 'test', {});
    const { interceptor } = createInterceptor(store);
    app = await buildApp({ config, store, interceptor, logger: silentLogger });
  });

  afterEach(async () => {
    await app.close();
    cleanup();
  });

  it('reports health with pending counts', async () => {
    const { bytes } = encodeRequest({ method: 'GET', url: 'http://a.test/', headers: {}, body: Buffer.alloc(0) }, { id: 'h1' });
    await store.publish('requests', 'h1', bytes);

    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'healthy',
      version: '1.0.0',
      shared_dir: dir,
      pending_requests: 1,
      pending_responses: 0,
    });
  });

  it('rejects a call without a usable URL', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/relay',
      payload: { method: 'GET', url: 'not a url' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe('INVALID_CALL');
    expect(body.issues).toEqual([expect.stringMatching(/^url: /)]);
  });

  it('rejects a method that is not a token', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/relay',
      payload: { method: 'GE T', url: 'https://api.test/' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().issues).toEqual(['method: method must be a token']);
  });

  it('rejects a body that is not base64', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/relay',
      payload: { method: 'PUT', url: 'https://api.test/', body: 'not base64!' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().issues).toEqual(['body: body must be base64']);
  });

  it('relays a call through the forwarder and replays its response', async () => {
    const transport = new FakeTransport();
    const { forwarder } = createForwarder(store, transport);

    const response = await serveWhile(
      forwarder,
      app.inject({
        method: 'POST',
        url: '/api/relay',
        payload: {
          method: 'post',
          url: 'https://api.test/items',
          headers: { 'content-type': 'text/plain' },
          body: Buffer.from('hi').toString('base64'),
        },
      }),
    );

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('hello');
    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.headers['x-relay-outcome']).toBe('resolved');
    expect(response.headers['x-relay-request-id']).toMatch(/^[0-9a-f-]{36}$/);

    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0].method).toBe('POST');
    expect(transport.calls[0].body.toString('utf-8')).toBe('hi');
    expect(await store.stats()).toEqual({ pendingRequests: 0, pendingResponses: 0 });
  });

  it('replays a gate denial with its status', async () => {
    const { forwarder } = createForwarder(store, new FakeTransport());

    const response = await serveWhile(
      forwarder,
      app.inject({ method: 'POST', url: '/api/relay', payload: { method: 'GET', url: 'https://blocked.example/' } }),
    );

    expect(response.statusCode).toBe(403);
    expect(response.body).toBe('Blocked: Domain blocked.example is blocked');
    expect(response.headers['x-relay-outcome']).toBe('resolved');
  });
});

describe('toCapturedCall', () => {
  it('upper-cases the method, joins repeated headers and decodes the body', () => {
    const call = toCapturedCall({
      method: 'patch',
      url: 'https://api.test/',
      headers: { accept: ['text/html', 'application/json'], 'x-one': '1' },
      body: Buffer.from('payload').toString('base64'),
      http_version: 'HTTP/2',
    });

    expect(call).toEqual({
      method: 'PATCH',
      url: 'https://api.test/',
      headers: { accept: 'text/html, application/json', 'x-one': '1' },
      body: Buffer.from('payload'),
      httpVersion: 'HTTP/2',
    });
  });
});
