import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';

export const DIGEST_BYTE_LENGTH = 32;
export const DIGEST_HEX_LENGTH = DIGEST_BYTE_LENGTH * 2;

/**
 * HMAC-SHA256 output. Always exactly 32 bytes.
 */
export type Digest = Brand<Uint8Array, 'Digest'>;

/**
 * Lowercase hex encoding of a Digest, as sent in the signature header.
 */
export type SignatureHex = Brand<string, 'SignatureHex'>;

export type DigestLengthError = {
  readonly code: 'INVALID_DIGEST_LENGTH';
  readonly expected: number;
  readonly actual: number;
  readonly message: string;
};

/**
 * Brand bytes produced by an HMAC-SHA256 backend.
 *
 * A backend returning anything other than 32 bytes is broken, so this throws
 * instead of returning a Result. Use `parseDigest` for untrusted input.
 */
export function asDigest(bytes: Uint8Array): Digest {
  if (bytes.length !== DIGEST_BYTE_LENGTH) {
    throw new Error(`HMAC-SHA256 backend returned ${bytes.length} bytes (expected ${DIGEST_BYTE_LENGTH})`);
  }
  return bytes as Digest;
}

export function parseDigest(bytes: Uint8Array): Result<Digest, DigestLengthError> {
  if (bytes.length !== DIGEST_BYTE_LENGTH) {
    return err({
      code: 'INVALID_DIGEST_LENGTH',
      expected: DIGEST_BYTE_LENGTH,
      actual: bytes.length,
      message: `digest must be ${DIGEST_BYTE_LENGTH} bytes, got ${bytes.length}`,
    });
  }
  return ok(bytes as Digest);
}

export function asSignatureHex(value: string): SignatureHex {
  return value as SignatureHex;
}
