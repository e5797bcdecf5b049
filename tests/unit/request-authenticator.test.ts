import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { err } from 'neverthrow';
import { NodeHmacSha256 } from '../../src/infra/local/hmac-sha256/index.js';
import { SecretKey } from '../../src/protocol/secret-key.js';
import { bytesToHex } from '../../src/protocol/encoding/hex.js';
import type { InboundRequest } from '../../src/protocol/request-authenticator.js';
import {
  authenticateRequest,
  bufferedRequest,
  computeRequestDigest,
  parseSuppliedDigest,
} from '../../src/protocol/request-authenticator.js';
import type { AuthOutcome } from '../../src/protocol/auth-outcome.js';
import { expectErr } from '../helpers/result-helpers.js';
import { GET_ROOT_OTHER_SECRET, SIGNED_REQUESTS, TEST_SECRET } from '../helpers/vectors.js';

const hmac = new NodeHmacSha256();
const secret = SecretKey.fromUtf8(TEST_SECRET);
const utf8 = new TextEncoder();

function authenticate(headerValues: readonly string[] | undefined, request: InboundRequest): AuthOutcome {
  return authenticateRequest(hmac, { secret, headerName: 'x-hmac', headerValues, request });
}

function rejectionCode(outcome: AuthOutcome): string | null {
  return outcome.kind === 'rejected' ? outcome.reason.code : null;
}

describe('computeRequestDigest', () => {
  it('matches independently computed signatures', () => {
    for (const vector of Object.values(SIGNED_REQUESTS)) {
      const digest = computeRequestDigest(hmac, secret, vector.method, vector.path, utf8.encode(vector.body));
      expect(bytesToHex(digest)).toBe(vector.signature);
    }
  });

  it('is deterministic', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), fc.uint8Array({ maxLength: 64 }), (method, path, body) => {
        const a = computeRequestDigest(hmac, secret, method, path, body);
        const b = computeRequestDigest(hmac, secret, method, path, Uint8Array.from(body));
        expect(bytesToHex(a)).toBe(bytesToHex(b));
      })
    );
  });

  it('changes when any single component changes', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), fc.string(), fc.string(), (method, path, body, extra) => {
        fc.pre(extra.length > 0);
        const base = bytesToHex(computeRequestDigest(hmac, secret, method, path, utf8.encode(body)));

        expect(bytesToHex(computeRequestDigest(hmac, secret, method + extra, path, utf8.encode(body)))).not.toBe(base);
        expect(bytesToHex(computeRequestDigest(hmac, secret, method, path + extra, utf8.encode(body)))).not.toBe(base);
        expect(bytesToHex(computeRequestDigest(hmac, secret, method, path, utf8.encode(body + extra)))).not.toBe(base);
      })
    );
  });

  it('hashes each component separately, so moving bytes between them changes the digest', () => {
    const a = computeRequestDigest(hmac, secret, 'GET', '/ab', utf8.encode(''));
    const b = computeRequestDigest(hmac, secret, 'GET/', 'ab', utf8.encode(''));
    expect(bytesToHex(a)).not.toBe(bytesToHex(b));
  });
});

describe('parseSuppliedDigest', () => {
  it('reports the length of a short value', () => {
    expect(expectErr(parseSuppliedDigest('123'), 'short').details).toBe('expected 64 hex characters, got 3');
  });

  it('rejects 64 characters outside the hex alphabet', () => {
    const error = expectErr(parseSuppliedDigest('z'.repeat(64)), 'non-hex');
    expect(error.message).toBe('Malformed HMAC header: hex string may only contain [0-9a-f]');
  });

  it('rejects uppercase hex', () => {
    const upper = SIGNED_REQUESTS.getRoot.signature.toUpperCase();
    expect(expectErr(parseSuppliedDigest(upper), 'uppercase').code).toBe('MALFORMED_HEADER');
  });
});

describe('authenticateRequest', () => {
  const { getRoot, postOrder } = SIGNED_REQUESTS;

  it('allows a correctly signed request without a body', () => {
    expect(authenticate([getRoot.signature], bufferedRequest('GET', '/'))).toEqual({ kind: 'allowed' });
  });

  it('allows a correctly signed request with a body', () => {
    const outcome = authenticate([postOrder.signature], bufferedRequest('POST', '/orders', postOrder.body));
    expect(outcome.kind).toBe('allowed');
  });

  it('rejects a request without the header', () => {
    expect(authenticate(undefined, bufferedRequest('GET', '/'))).toEqual({
      kind: 'rejected',
      reason: { code: 'MISSING_HEADER', headerName: 'x-hmac', message: 'Missing HMAC header (key = x-hmac)' },
    });
  });

  it('treats an empty list of values as missing', () => {
    expect(rejectionCode(authenticate([], bufferedRequest('GET', '/')))).toBe('MISSING_HEADER');
  });

  it('rejects a header that is not hex of the right length', () => {
    const outcome = authenticate(['123'], bufferedRequest('GET', '/'));
    expect(outcome).toEqual({
      kind: 'rejected',
      reason: {
        code: 'MALFORMED_HEADER',
        details: 'expected 64 hex characters, got 3',
        message: 'Malformed HMAC header: expected 64 hex characters, got 3',
      },
    });
  });

  it('rejects 64 non-hex characters as malformed', () => {
    expect(rejectionCode(authenticate(['g'.repeat(64)], bufferedRequest('GET', '/')))).toBe('MALFORMED_HEADER');
  });

  it('rejects the right signature in uppercase as malformed', () => {
    const outcome = authenticate([getRoot.signature.toUpperCase()], bufferedRequest('GET', '/'));
    expect(rejectionCode(outcome)).toBe('MALFORMED_HEADER');
  });

  it('rejects a well-formed but wrong signature', () => {
    expect(authenticate([GET_ROOT_OTHER_SECRET], bufferedRequest('GET', '/'))).toEqual({
      kind: 'rejected',
      reason: { code: 'AUTHENTICATION_FAILED', message: 'Provided HMAC is invalid' },
    });
  });

  it('rejects the right signature with one hex character changed', () => {
    const changed = `9${getRoot.signature.slice(1)}`;
    expect(getRoot.signature.startsWith('8')).toBe(true);

    expect(authenticate([changed], bufferedRequest('GET', '/'))).toEqual({
      kind: 'rejected',
      reason: { code: 'AUTHENTICATION_FAILED', message: 'Provided HMAC is invalid' },
    });
  });

  it('rejects a change to any single hex character', () => {
    const hexDigits = '0123456789abcdef';
    fc.assert(
      fc.property(fc.nat(63), fc.integer({ min: 1, max: 15 }), (index, shift) => {
        const current = hexDigits.indexOf(getRoot.signature.charAt(index));
        const replacement = hexDigits.charAt((current + shift) % 16);
        const changed = getRoot.signature.slice(0, index) + replacement + getRoot.signature.slice(index + 1);

        expect(rejectionCode(authenticate([changed], bufferedRequest('GET', '/')))).toBe('AUTHENTICATION_FAILED');
      })
    );
  });

  it('rejects a signature replayed on another method, path or body', () => {
    expect(rejectionCode(authenticate([getRoot.signature], bufferedRequest('POST', '/')))).toBe('AUTHENTICATION_FAILED');
    expect(rejectionCode(authenticate([getRoot.signature], bufferedRequest('GET', '/other')))).toBe('AUTHENTICATION_FAILED');
    expect(rejectionCode(authenticate([getRoot.signature], bufferedRequest('GET', '/', 'x')))).toBe('AUTHENTICATION_FAILED');
  });

  it('treats the method as case-sensitive', () => {
    expect(rejectionCode(authenticate([getRoot.signature], bufferedRequest('get', '/')))).toBe('AUTHENTICATION_FAILED');
  });

  it('uses the first value when the header is repeated', () => {
    const wrongFirst = authenticate([GET_ROOT_OTHER_SECRET, getRoot.signature], bufferedRequest('GET', '/'));
    const rightFirst = authenticate([getRoot.signature, GET_ROOT_OTHER_SECRET], bufferedRequest('GET', '/'));

    expect(rejectionCode(wrongFirst)).toBe('AUTHENTICATION_FAILED');
    expect(rightFirst.kind).toBe('allowed');
  });

  it('reports a body read failure before looking at the header', () => {
    const cause = new Error('socket hang up');
    const request: InboundRequest = {
      method: 'POST',
      path: '/orders',
      readBody: () => err({ message: 'aborted', cause }),
    };

    expect(authenticate(undefined, request)).toEqual({
      kind: 'rejected',
      reason: { code: 'BODY_READ_ERROR', message: 'Failed to read request body: aborted', cause },
    });
    expect(rejectionCode(authenticate([postOrder.signature], request))).toBe('BODY_READ_ERROR');
  });

  it('never allows a signature made with another secret', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), fc.uint8Array({ maxLength: 32 }), (method, path, body) => {
        const other = SecretKey.fromUtf8('other-secret');
        const forged = bytesToHex(computeRequestDigest(hmac, other, method, path, body));
        expect(authenticate([forged], bufferedRequest(method, path, body)).kind).toBe('rejected');
      })
    );
  });
});
