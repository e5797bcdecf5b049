import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import type { AuthOutcome } from './auth-outcome.js';
import type { SignatureHex } from './digest.js';
import type { InboundRequest } from './request-authenticator.js';
import { authenticateRequest } from './request-authenticator.js';
import { signResponse } from './response-signer.js';
import type { SecretKeyInput } from './secret-key.js';
import { SecretKey } from './secret-key.js';

export interface HmacAuthenticationConfig {
  readonly secret: SecretKeyInput;
  readonly headerName: string;
  readonly hmac: HmacSha256Port;
}

// RFC 9110 token characters
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export function isValidHeaderName(name: string): boolean {
  return HEADER_NAME_PATTERN.test(name);
}

/**
 * One configured secret + header name, shared by the verifying stage and the
 * signing stage. Immutable after construction and safe to share between
 * concurrent requests.
 */
export class HmacAuthentication {
  readonly secret: SecretKey;
  /** Lowercased; Node exposes incoming header names in lowercase. */
  readonly headerName: string;
  private readonly hmac: HmacSha256Port;

  constructor(config: HmacAuthenticationConfig) {
    if (!isValidHeaderName(config.headerName)) {
      throw new Error(`Invalid HMAC header name: "${config.headerName}"`);
    }
    this.secret = SecretKey.from(config.secret);
    this.headerName = config.headerName.toLowerCase();
    this.hmac = config.hmac;
    Object.freeze(this);
  }

  authenticate(headerValues: readonly string[] | undefined, request: InboundRequest): AuthOutcome {
    return authenticateRequest(this.hmac, {
      secret: this.secret,
      headerName: this.headerName,
      headerValues,
      request,
    });
  }

  sign(body: Uint8Array): SignatureHex {
    return signResponse(this.hmac, this.secret, body);
  }
}
