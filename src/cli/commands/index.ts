/**
 * CLI Commands - Public API
 */

export { executeSignRequestCommand, type SignRequestCommandDeps, type SignRequestCommandOptions } from './sign-request.js';
export { executeSignResponseCommand, type SignResponseCommandDeps, type SignResponseCommandOptions } from './sign-response.js';
export { executeVerifyCommand, type VerifyCommandDeps, type VerifyCommandOptions } from './verify.js';
export { executeServeCommand, type ServeCommandDeps, type ServeCommandOptions } from './serve.js';
export { resolveBody, type BodyFileError, type BodySourceDeps, type BodySourceOptions } from './body-source.js';
export type { SigningDeps } from './signing-deps.js';
