import { createHmac, timingSafeEqual } from 'crypto';
import type { Hmac } from 'crypto';
import type { HmacSha256Port, HmacSha256Stream } from '../../../ports/hmac-sha256.port.js';
import type { Digest } from '../../../protocol/digest.js';
import { asDigest } from '../../../protocol/digest.js';
import type { SecretKey } from '../../../protocol/secret-key.js';
import { revealSecretKey } from '../../../protocol/secret-key.js';

class NodeHmacSha256Stream implements HmacSha256Stream {
  constructor(private readonly inner: Hmac) {}

  update(chunk: Uint8Array): HmacSha256Stream {
    this.inner.update(chunk);
    return this;
  }

  finalize(): Digest {
    return asDigest(new Uint8Array(this.inner.digest()));
  }
}

/**
 * HMAC-SHA256 backed by Node's crypto module (OpenSSL).
 */
export class NodeHmacSha256 implements HmacSha256Port {
  hmacSha256(key: SecretKey, message: Uint8Array): Digest {
    return this.begin(key).update(message).finalize();
  }

  begin(key: SecretKey): HmacSha256Stream {
    return new NodeHmacSha256Stream(createHmac('sha256', revealSecretKey(key)));
  }

  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    return timingSafeEqual(a, b);
  }
}
