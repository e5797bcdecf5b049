export type {
  AuthOutcome,
  AuthRejection,
  AuthRejectionCode,
  MissingHeaderRejection,
  MalformedHeaderRejection,
  AuthenticationFailedRejection,
  BodyReadErrorRejection,
} from './auth-outcome.js';
export { ALLOWED, Rejection, rejected } from './auth-outcome.js';

export type { Digest, SignatureHex, DigestLengthError } from './digest.js';
export { DIGEST_BYTE_LENGTH, DIGEST_HEX_LENGTH, asDigest, parseDigest } from './digest.js';

export type { HexDecodeError, HexLetterCase } from './encoding/hex.js';
export { bytesToHex, hexToBytes } from './encoding/hex.js';

export type { SecretKeyInput } from './secret-key.js';
export { SecretKey } from './secret-key.js';

export type { BodyReadFailure, InboundRequest, AuthenticateRequestInput } from './request-authenticator.js';
export {
  authenticateRequest,
  bufferedRequest,
  computeRequestDigest,
  parseSuppliedDigest,
} from './request-authenticator.js';

export { computeResponseDigest, signResponse } from './response-signer.js';

export type { StatusPolicy } from './status-policy.js';
export { DEFAULT_STATUS_POLICY, statusFor } from './status-policy.js';

export type { HmacAuthenticationConfig } from './hmac-authentication.js';
export { HmacAuthentication, isValidHeaderName } from './hmac-authentication.js';
