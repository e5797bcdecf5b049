import type { Digest } from '../protocol/digest.js';
import type { SecretKey } from '../protocol/secret-key.js';

/**
 * Port: HMAC-SHA256 keyed digest (request authentication, response signing).
 *
 * Purpose:
 * - Compute HMAC-SHA256 over a byte sequence, in one call or fed in chunks
 * - Compare digests in a timing-safe way
 * - Keep the crypto library behind an interface so it can be swapped
 *
 * Guarantees:
 * - hmacSha256() is deterministic (same key + message → same digest)
 * - begin(k).update(a).update(b).finalize() equals hmacSha256(k, a || b)
 * - timingSafeEqual() does not leak the position of the first differing byte
 * - No I/O, no global state
 *
 * Example:
 * ```typescript
 * const expected = hmac
 *   .begin(secret)
 *   .update(methodDigest)
 *   .update(pathDigest)
 *   .update(bodyDigest)
 *   .finalize();
 * const ok = hmac.timingSafeEqual(expected, supplied);
 * ```
 */
export interface HmacSha256Port {
  /**
   * Compute HMAC-SHA256 of a complete message. Returns 32 bytes.
   */
  hmacSha256(key: SecretKey, message: Uint8Array): Digest;

  /**
   * Start an incremental computation. The returned stream is single-use.
   */
  begin(key: SecretKey): HmacSha256Stream;

  /**
   * Compare two byte arrays in a timing-safe way.
   *
   * Returns false without inspecting content when lengths differ
   * (lengths are not secret). Returns true only for byte-identical input.
   */
  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean;
}

export interface HmacSha256Stream {
  update(chunk: Uint8Array): HmacSha256Stream;
  finalize(): Digest;
}
