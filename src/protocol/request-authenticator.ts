import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import type { AuthOutcome, MalformedHeaderRejection } from './auth-outcome.js';
import { ALLOWED, Rejection, rejected } from './auth-outcome.js';
import type { Digest } from './digest.js';
import { DIGEST_HEX_LENGTH, parseDigest } from './digest.js';
import { hexToBytes } from './encoding/hex.js';
import type { SecretKey } from './secret-key.js';

export type BodyReadFailure = {
  readonly message: string;
  readonly cause?: unknown;
};

/**
 * What the authenticator needs from an inbound request.
 *
 * `path` must be derived the same way on the signing client and here
 * (path component only, no scheme/host/query).
 * `readBody` returns the raw, fully-read payload: zero bytes when absent,
 * a failure when the transport could not deliver it.
 */
export interface InboundRequest {
  readonly method: string;
  readonly path: string;
  readBody(): Result<Uint8Array, BodyReadFailure>;
}

export interface AuthenticateRequestInput {
  readonly secret: SecretKey;
  readonly headerName: string;
  /** All values of `headerName` on the request; undefined when the header is absent. */
  readonly headerValues: readonly string[] | undefined;
  readonly request: InboundRequest;
}

const utf8 = new TextEncoder();

/**
 * Build an InboundRequest around a body that is already in memory.
 */
export function bufferedRequest(method: string, path: string, body: Uint8Array | string = new Uint8Array(0)): InboundRequest {
  const bytes = typeof body === 'string' ? utf8.encode(body) : body;
  return { method, path, readBody: () => ok(bytes) };
}

/**
 * HMAC(secret, HMAC(secret, method) || HMAC(secret, path) || HMAC(secret, body))
 */
export function computeRequestDigest(
  hmac: HmacSha256Port,
  secret: SecretKey,
  method: string,
  path: string,
  body: Uint8Array
): Digest {
  const methodDigest = hmac.hmacSha256(secret, utf8.encode(method));
  const pathDigest = hmac.hmacSha256(secret, utf8.encode(path));
  const bodyDigest = hmac.hmacSha256(secret, body);

  return hmac.begin(secret).update(methodDigest).update(pathDigest).update(bodyDigest).finalize();
}

/**
 * Parse a signature header value into a Digest.
 *
 * Wire format is exactly 64 lowercase hex characters; anything else
 * (wrong length, uppercase, base64) is malformed.
 */
export function parseSuppliedDigest(value: string): Result<Digest, MalformedHeaderRejection> {
  if (value.length !== DIGEST_HEX_LENGTH) {
    return err(Rejection.malformedHeader(`expected ${DIGEST_HEX_LENGTH} hex characters, got ${value.length}`));
  }

  const bytes = hexToBytes(value, 'lower');
  if (bytes.isErr()) return err(Rejection.malformedHeader(bytes.error.message));

  const digest = parseDigest(bytes.value);
  if (digest.isErr()) return err(Rejection.malformedHeader(digest.error.message));

  return ok(digest.value);
}

/**
 * Decide whether an inbound request carries a valid signature.
 *
 * Never throws for bad input: every failure becomes a `rejected` outcome.
 * The body is read before the header is inspected, so a transport failure
 * is reported as BODY_READ_ERROR even when the header is also missing.
 */
export function authenticateRequest(hmac: HmacSha256Port, input: AuthenticateRequestInput): AuthOutcome {
  const { secret, headerName, headerValues, request } = input;

  const body = request.readBody();
  if (body.isErr()) {
    return rejected(Rejection.bodyReadError(body.error.message, body.error.cause));
  }

  const expected = computeRequestDigest(hmac, secret, request.method, request.path, body.value);

  const supplied = headerValues?.[0];
  if (supplied === undefined) {
    return rejected(Rejection.missingHeader(headerName));
  }

  const parsed = parseSuppliedDigest(supplied);
  if (parsed.isErr()) return rejected(parsed.error);

  return hmac.timingSafeEqual(expected, parsed.value)
    ? ALLOWED
    : rejected(Rejection.authenticationFailed());
}
