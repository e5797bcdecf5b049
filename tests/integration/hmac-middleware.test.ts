import { describe, it, expect } from 'vitest';
import express from 'express';
import type { Express } from 'express';
import request from 'supertest';
import { gzipSync } from 'node:zlib';
import { hmacMiddleware } from '../../src/infrastructure/http/hmac-middleware.js';
import type { StandaloneHmacMiddlewareOptions } from '../../src/infrastructure/http/hmac-middleware.js';
import { NodeHmacSha256 } from '../../src/infra/local/hmac-sha256/index.js';
import { bytesToHex } from '../../src/protocol/encoding/hex.js';
import { computeRequestDigest } from '../../src/protocol/request-authenticator.js';
import { signResponse } from '../../src/protocol/response-signer.js';
import { SecretKey } from '../../src/protocol/secret-key.js';
import { createCapturingLogger } from '../helpers/capturing-logger.js';
import type { LogSink } from '../helpers/capturing-logger.js';
import { GET_ROOT_OTHER_SECRET, SIGNED_REQUESTS, SIGNED_RESPONSES, TEST_SECRET } from '../helpers/vectors.js';

interface TestApp {
  readonly app: Express;
  readonly sink: LogSink;
  readonly routeCalls: string[];
}

function createApp(options: StandaloneHmacMiddlewareOptions = {}, before?: express.RequestHandler): TestApp {
  const { logger, sink } = createCapturingLogger('debug');
  const routeCalls: string[] = [];
  const { authenticate, sign, skipSigningOnError } = hmacMiddleware(TEST_SECRET, 'x-hmac', { logger, ...options });

  const app = express();
  if (before) app.use(before);
  app.use(authenticate, sign);

  app.post('/orders', (req, res) => {
    routeCalls.push(`POST /orders ${Buffer.isBuffer(req.body) ? req.body.toString('utf8') : 'no body'}`);
    res.json({ ok: true });
  });
  app.get('/search', (req, res) => {
    routeCalls.push('GET /search');
    res.type('text/plain').send(`q=${String(req.query['q'])}`);
  });
  app.get('/orders', (_req, res) => {
    routeCalls.push('GET /orders');
    res.status(404).type('text/plain').send('Hello, world!');
  });
  app.get('/boom', () => {
    routeCalls.push('GET /boom');
    throw new Error('boom');
  });
  app.all('*', (req, res) => {
    routeCalls.push(`${req.method} ${req.path}`);
    res.type('text/plain').send('Hello, world!');
  });
  app.use(skipSigningOnError);

  return { app, sink, routeCalls };
}

describe('hmacMiddleware', () => {
  const { getRoot, getHello, getOrders, getSearch, postOrder } = SIGNED_REQUESTS;

  describe('allowed requests', () => {
    it('reach the route and get a signed response', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app).get('/hello').set('x-hmac', getHello.signature);

      expect(res.status).toBe(200);
      expect(res.text).toBe('Hello, world!');
      expect(res.headers['x-hmac']).toBe(SIGNED_RESPONSES.hello.signature);
      expect(routeCalls).toEqual(['GET /hello']);
    });

    it('sign the exact JSON bytes of the response', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('x-hmac', postOrder.signature)
        .send(postOrder.body);

      expect(res.status).toBe(200);
      expect(res.text).toBe(SIGNED_RESPONSES.json.body);
      expect(res.headers['x-hmac']).toBe(SIGNED_RESPONSES.json.signature);
      expect(routeCalls).toEqual(['POST /orders {"id":1}']);
    });

    it('accept the header name in any case', async () => {
      const { app } = createApp();

      const res = await request(app).get('/').set('X-HMAC', getRoot.signature);

      expect(res.status).toBe(200);
    });

    it('sign the path without its query string', async () => {
      const { app } = createApp();

      const res = await request(app).get('/search?q=1').set('x-hmac', getSearch.signature);

      const expected = signResponse(new NodeHmacSha256(), SecretKey.fromUtf8(TEST_SECRET), Buffer.from('q=1'));
      expect(res.status).toBe(200);
      expect(res.text).toBe('q=1');
      expect(res.headers['x-hmac']).toBe(expected);
    });

    it('sign whatever status the route chose', async () => {
      const { app } = createApp();

      const res = await request(app).get('/orders').set('x-hmac', getOrders.signature);

      expect(res.status).toBe(404);
      expect(res.headers['x-hmac']).toBe(SIGNED_RESPONSES.hello.signature);
    });

    it('authenticate the body bytes as sent, without undoing Content-Encoding', async () => {
      const { app, routeCalls } = createApp();
      const gzipped = gzipSync(Buffer.from(postOrder.body));
      const key = SecretKey.fromUtf8(TEST_SECRET);
      const signature = bytesToHex(computeRequestDigest(new NodeHmacSha256(), key, 'POST', '/orders', gzipped));

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('content-encoding', 'gzip')
        .set('x-hmac', signature)
        .send(gzipped);

      expect(res.status).toBe(200);
      expect(res.headers['x-hmac']).toBe(SIGNED_RESPONSES.json.signature);
      expect(routeCalls).toHaveLength(1);
    });

    it('reject a signature over the decoded body of an encoded request', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('content-encoding', 'gzip')
        .set('x-hmac', postOrder.signature)
        .send(gzipSync(Buffer.from(postOrder.body)));

      expect(res.status).toBe(403);
      expect(res.body.error.code).toBe('AUTHENTICATION_FAILED');
      expect(routeCalls).toEqual([]);
    });

    it('leave responses from the error chain unsigned', async () => {
      const { app, sink, routeCalls } = createApp({ resolvePath: () => '/' });

      const res = await request(app).get('/boom').set('x-hmac', getRoot.signature);

      expect(routeCalls).toEqual(['GET /boom']);
      expect(res.status).toBe(500);
      expect(res.headers['x-hmac']).toBeUndefined();
      expect(sink.atLevel('debug').map((line) => line['msg'])).toEqual([
        'Request authenticated',
        'Request failed; response left unsigned',
      ]);
    });

    it('are logged at debug', async () => {
      const { app, sink } = createApp();

      await request(app).get('/').set('x-hmac', getRoot.signature);

      const [line] = sink.atLevel('debug');
      expect(line?.['msg']).toBe('Request authenticated');
      expect(line?.['method']).toBe('GET');
      expect(line?.['path']).toBe('/');
    });
  });

  describe('rejected requests', () => {
    it('without the header get 401', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app).get('/');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'MISSING_HEADER', message: 'Missing HMAC header (key = x-hmac)' },
      });
      expect(res.headers['x-hmac']).toBeUndefined();
      expect(routeCalls).toEqual([]);
    });

    it('with a malformed header get 400', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app).get('/').set('x-hmac', '123');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'MALFORMED_HEADER', message: 'Malformed HMAC header: expected 64 hex characters, got 3' },
      });
      expect(res.headers['x-hmac']).toBeUndefined();
      expect(routeCalls).toEqual([]);
    });

    it('with a wrong signature get 403', async () => {
      const { app, routeCalls } = createApp();

      const res = await request(app).get('/').set('x-hmac', GET_ROOT_OTHER_SECRET);

      expect(res.status).toBe(403);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'AUTHENTICATION_FAILED', message: 'Provided HMAC is invalid' },
      });
      expect(res.headers['x-hmac']).toBeUndefined();
      expect(routeCalls).toEqual([]);
    });

    it('with a signature for another body get 403', async () => {
      const { app } = createApp();

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('x-hmac', postOrder.signature)
        .send('{"id":2}');

      expect(res.status).toBe(403);
    });

    it('are logged at warn without the signature', async () => {
      const { app, sink } = createApp();

      await request(app).get('/hello').set('x-hmac', GET_ROOT_OTHER_SECRET);

      const warnings = sink.atLevel('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.['code']).toBe('AUTHENTICATION_FAILED');
      expect(warnings[0]?.['method']).toBe('GET');
      expect(warnings[0]?.['path']).toBe('/hello');
      expect(JSON.stringify(sink.lines)).not.toContain(GET_ROOT_OTHER_SECRET);
    });

    it('follow a custom status policy', async () => {
      const { app } = createApp({
        statusPolicy: { missingHeader: 403, malformedHeader: 403, authenticationFailed: 401, bodyReadError: 500 },
      });

      expect((await request(app).get('/')).status).toBe(403);
      expect((await request(app).get('/').set('x-hmac', 'zz')).status).toBe(403);
      expect((await request(app).get('/').set('x-hmac', GET_ROOT_OTHER_SECRET)).status).toBe(401);
    });
  });

  describe('body read failures', () => {
    it('reject a body over the limit with 500', async () => {
      const { app, routeCalls } = createApp({ maxBodyBytes: 4 });

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('x-hmac', postOrder.signature)
        .send(postOrder.body);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'BODY_READ_ERROR', message: 'Failed to read request body: request entity too large' },
      });
      expect(routeCalls).toEqual([]);
    });

    it('take precedence over a missing header', async () => {
      const { app } = createApp({ maxBodyBytes: 4 });

      const res = await request(app).post('/orders').set('content-type', 'text/plain').send('too long');

      expect(res.status).toBe(500);
      expect(res.body.error.code).toBe('BODY_READ_ERROR');
    });

    it('reject a body another parser already consumed', async () => {
      const { app } = createApp({}, express.json());

      const res = await request(app)
        .post('/orders')
        .set('content-type', 'application/json')
        .set('x-hmac', postOrder.signature)
        .send(postOrder.body);

      expect(res.status).toBe(500);
      expect(res.body.error).toEqual({
        code: 'BODY_READ_ERROR',
        message: 'Failed to read request body: request body was consumed before authentication',
      });
    });

    it('treat a request without a body as empty', async () => {
      const { app } = createApp({}, express.json());

      const res = await request(app).get('/').set('x-hmac', getRoot.signature);

      expect(res.status).toBe(200);
    });
  });

  describe('path derivation', () => {
    it('can be overridden', async () => {
      const { app } = createApp({ resolvePath: () => '/' });

      const res = await request(app).get('/anything').set('x-hmac', getRoot.signature);

      expect(res.status).toBe(200);
    });
  });
});
