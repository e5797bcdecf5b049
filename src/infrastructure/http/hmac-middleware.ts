import express from 'express';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response, Router } from 'express';
import type { IncomingMessage } from 'http';
import getRawBody from 'raw-body';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../../core/logging/types.js';
import { createBootstrapLogger } from '../../core/logging/bootstrap.js';
import { DEFAULT_MAX_BODY_BYTES } from '../../config/app-config.js';
import { NodeHmacSha256 } from '../../infra/local/hmac-sha256/index.js';
import type { HmacSha256Port } from '../../ports/hmac-sha256.port.js';
import { HmacAuthentication } from '../../protocol/hmac-authentication.js';
import type { BodyReadFailure, InboundRequest } from '../../protocol/request-authenticator.js';
import type { SecretKeyInput } from '../../protocol/secret-key.js';
import type { StatusPolicy } from '../../protocol/status-policy.js';
import { DEFAULT_STATUS_POLICY, statusFor } from '../../protocol/status-policy.js';
import { captureResponseBody } from './response-capture.js';

export interface HmacMiddlewareOptions {
  readonly logger: Logger;
  readonly statusPolicy?: StatusPolicy;
  /** Upper bound for the buffered request body. Larger bodies are a BODY_READ_ERROR. */
  readonly maxBodyBytes?: number;
  /**
   * Path fed into the signature. Defaults to the request URL without its
   * query string; override only if clients sign something else.
   */
  readonly resolvePath?: (req: Request) => string;
}

export interface HmacMiddlewarePair {
  /**
   * Verifies the inbound signature; rejected requests are answered here and go no further.
   * Leaves the raw body bytes in `req.body` as a Buffer.
   */
  readonly authenticate: Router;
  /** Signs the outgoing body of every request `authenticate` allowed. */
  readonly sign: RequestHandler;
  /**
   * Error handler to mount after the routes. Responses produced by the
   * error chain are sent without a signature.
   */
  readonly skipSigningOnError: ErrorRequestHandler;
}

export interface RejectionBody {
  readonly success: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

const EMPTY_BODY = new Uint8Array(0);

export function pathWithoutQuery(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

function hasBody(req: IncomingMessage): boolean {
  return req.headers['transfer-encoding'] !== undefined || req.headers['content-length'] !== undefined;
}

const BODY_CONSUMED: BodyReadFailure = { message: 'request body was consumed before authentication' };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the middleware pair around one shared configuration.
 *
 * Mount `authenticate` before any body parser and before the routes it
 * protects, `sign` anywhere before the route that writes the response, and
 * `skipSigningOnError` after the routes:
 *
 *   const { authenticate, sign, skipSigningOnError } = createHmacMiddleware(auth, { logger });
 *   app.use(authenticate, sign);
 *   app.get('/', handler);
 *   app.use(skipSigningOnError);
 *
 * The body is hashed exactly as it arrived: a Content-Encoding is not undone.
 */
export function createHmacMiddleware(auth: HmacAuthentication, options: HmacMiddlewareOptions): HmacMiddlewarePair {
  const logger = options.logger;
  const policy = options.statusPolicy ?? DEFAULT_STATUS_POLICY;
  const limit = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const resolvePath = options.resolvePath ?? ((req: Request) => pathWithoutQuery(req.originalUrl));

  const bodies = new WeakMap<IncomingMessage, Result<Uint8Array, BodyReadFailure>>();
  const allowedRequests = new WeakSet<IncomingMessage>();
  const failedRequests = new WeakSet<IncomingMessage>();

  // Wire bytes, not body-parser's decoded view: the signature covers what the client sent.
  const readRawBody: RequestHandler = (req, _res, next) => {
    if (!req.readable) {
      bodies.set(req, hasBody(req) ? err(BODY_CONSUMED) : ok(EMPTY_BODY));
      next();
      return;
    }

    getRawBody(req, { length: req.headers['content-length'], limit }, (error, body) => {
      if (error) {
        bodies.set(req, err({ message: describeError(error), cause: error }));
        req.resume();
      } else {
        req.body = body;
        bodies.set(req, ok(body));
      }
      next();
    });
  };

  const toInboundRequest = (req: Request): InboundRequest => ({
    method: req.method,
    path: resolvePath(req),
    readBody: () => bodies.get(req) ?? err(BODY_CONSUMED),
  });

  const verify = (req: Request, res: Response, next: NextFunction): void => {
    const request = toInboundRequest(req);
    const outcome = auth.authenticate(req.headersDistinct[auth.headerName], request);

    if (outcome.kind === 'allowed') {
      allowedRequests.add(req);
      logger.debug({ method: request.method, path: request.path }, 'Request authenticated');
      next();
      return;
    }

    const { reason } = outcome;
    logger.warn({ code: reason.code, method: request.method, path: request.path }, reason.message);

    const body: RejectionBody = { success: false, error: { code: reason.code, message: reason.message } };
    res.status(statusFor(reason, policy)).json(body);
  };

  const authenticate = express.Router();
  authenticate.use(readRawBody, verify);

  const sign: RequestHandler = (req, res, next) => {
    captureResponseBody(res, (body) => {
      if (!allowedRequests.has(req)) return;
      if (failedRequests.has(req)) {
        logger.debug({ method: req.method, path: resolvePath(req) }, 'Request failed; response left unsigned');
        return;
      }
      if (res.headersSent) {
        logger.warn({ method: req.method, path: resolvePath(req) }, 'Headers already sent; response left unsigned');
        return;
      }
      res.setHeader(auth.headerName, auth.sign(body));
    });
    next();
  };

  const skipSigningOnError: ErrorRequestHandler = (error: unknown, req, _res, next) => {
    failedRequests.add(req);
    next(error);
  };

  return { authenticate, sign, skipSigningOnError };
}

export interface StandaloneHmacMiddlewareOptions extends Partial<HmacMiddlewareOptions> {
  readonly hmac?: HmacSha256Port;
}

/**
 * Convenience constructor for use without the DI container.
 *
 *   const { authenticate, sign, skipSigningOnError } = hmacMiddleware(process.env.HMAC_SECRET ?? '', 'x-hmac');
 *   app.use(authenticate, sign);
 *   app.get('/', handler);
 *   app.use(skipSigningOnError);
 */
export function hmacMiddleware(
  secret: SecretKeyInput,
  headerName: string,
  options: StandaloneHmacMiddlewareOptions = {}
): HmacMiddlewarePair {
  const auth = new HmacAuthentication({
    secret,
    headerName,
    hmac: options.hmac ?? new NodeHmacSha256(),
  });

  return createHmacMiddleware(auth, {
    ...options,
    logger: options.logger ?? createBootstrapLogger('hmac'),
  });
}
