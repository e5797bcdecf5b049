import { inspect } from 'node:util';

/**
 * Shared signing secret.
 *
 * The bytes live in a module-private WeakMap, so nothing holding a SecretKey
 * can read them by enumerating properties, serializing, or inspecting it.
 * HMAC backends obtain them through `revealSecretKey`.
 */
const keyBytes = new WeakMap<SecretKey, Uint8Array>();

const REDACTED = '[REDACTED]';

export type SecretKeyInput = SecretKey | string | Uint8Array;

export class SecretKey {
  private constructor(bytes: Uint8Array) {
    keyBytes.set(this, Uint8Array.from(bytes));
    Object.freeze(this);
  }

  static fromBytes(bytes: Uint8Array): SecretKey {
    return new SecretKey(bytes);
  }

  static fromUtf8(text: string): SecretKey {
    return new SecretKey(new TextEncoder().encode(text));
  }

  static from(input: SecretKeyInput): SecretKey {
    if (input instanceof SecretKey) return input;
    return typeof input === 'string' ? SecretKey.fromUtf8(input) : SecretKey.fromBytes(input);
  }

  get byteLength(): number {
    return revealSecretKey(this).length;
  }

  toString(): string {
    return `SecretKey(${REDACTED})`;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Raw key bytes, for HMAC backends only. Returns a copy.
 */
export function revealSecretKey(key: SecretKey): Uint8Array {
  const bytes = keyBytes.get(key);
  if (!bytes) {
    throw new Error('SecretKey was not created through SecretKey.from*()');
  }
  return Uint8Array.from(bytes);
}
