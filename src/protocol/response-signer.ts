import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import type { Digest, SignatureHex } from './digest.js';
import { asSignatureHex } from './digest.js';
import { bytesToHex } from './encoding/hex.js';
import type { SecretKey } from './secret-key.js';

export function computeResponseDigest(hmac: HmacSha256Port, secret: SecretKey, body: Uint8Array): Digest {
  return hmac.hmacSha256(secret, body);
}

/**
 * Header value for an outbound response: hex(HMAC(secret, body)).
 *
 * `body` must be the exact bytes the client will receive. The caller owns
 * the buffer and sends it unchanged afterwards.
 */
export function signResponse(hmac: HmacSha256Port, secret: SecretKey, body: Uint8Array): SignatureHex {
  return asSignatureHex(bytesToHex(computeResponseDigest(hmac, secret, body)));
}
