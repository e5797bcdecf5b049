import type { AuthRejection } from './auth-outcome.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * HTTP status per rejection kind.
 *
 * The rejection kinds are fixed; which status each maps to is a decision of
 * the integrating system, so it is configuration rather than protocol.
 */
export interface StatusPolicy {
  readonly missingHeader: 401 | 403;
  readonly malformedHeader: 400 | 403;
  readonly authenticationFailed: 401 | 403;
  readonly bodyReadError: 500;
}

export const DEFAULT_STATUS_POLICY: StatusPolicy = {
  missingHeader: 401,
  malformedHeader: 400,
  authenticationFailed: 403,
  bodyReadError: 500,
};

export function statusFor(reason: AuthRejection, policy: StatusPolicy = DEFAULT_STATUS_POLICY): number {
  switch (reason.code) {
    case 'MISSING_HEADER':
      return policy.missingHeader;
    case 'MALFORMED_HEADER':
      return policy.malformedHeader;
    case 'AUTHENTICATION_FAILED':
      return policy.authenticationFailed;
    case 'BODY_READ_ERROR':
      return policy.bodyReadError;
    default:
      return assertNever(reason);
  }
}
