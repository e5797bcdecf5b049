/**
 * Result of verifying one inbound request.
 *
 * Each request moves from "not yet checked" to exactly one of these, once.
 * `rejected` is terminal: application logic must not run and the response
 * is not signed.
 */
export type AuthOutcome =
  | { readonly kind: 'allowed' }
  | { readonly kind: 'rejected'; readonly reason: AuthRejection };

export type AuthRejection =
  | MissingHeaderRejection
  | MalformedHeaderRejection
  | AuthenticationFailedRejection
  | BodyReadErrorRejection;

export type AuthRejectionCode = AuthRejection['code'];

export interface MissingHeaderRejection {
  readonly code: 'MISSING_HEADER';
  readonly headerName: string;
  readonly message: string;
}

export interface MalformedHeaderRejection {
  readonly code: 'MALFORMED_HEADER';
  readonly details: string;
  readonly message: string;
}

export interface AuthenticationFailedRejection {
  readonly code: 'AUTHENTICATION_FAILED';
  readonly message: string;
}

/**
 * The host could not deliver the request body. Never treated as an empty body.
 */
export interface BodyReadErrorRejection {
  readonly code: 'BODY_READ_ERROR';
  readonly message: string;
  readonly cause?: unknown;
}

export const Rejection = {
  missingHeader: (headerName: string): MissingHeaderRejection => ({
    code: 'MISSING_HEADER',
    headerName,
    message: `Missing HMAC header (key = ${headerName})`,
  }),

  malformedHeader: (details: string): MalformedHeaderRejection => ({
    code: 'MALFORMED_HEADER',
    details,
    message: `Malformed HMAC header: ${details}`,
  }),

  authenticationFailed: (): AuthenticationFailedRejection => ({
    code: 'AUTHENTICATION_FAILED',
    message: 'Provided HMAC is invalid',
  }),

  bodyReadError: (details: string, cause?: unknown): BodyReadErrorRejection => ({
    code: 'BODY_READ_ERROR',
    message: `Failed to read request body: ${details}`,
    cause,
  }),
} as const;

export const ALLOWED: AuthOutcome = { kind: 'allowed' };

export function rejected(reason: AuthRejection): AuthOutcome {
  return { kind: 'rejected', reason };
}
