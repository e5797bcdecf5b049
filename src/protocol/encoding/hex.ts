import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

export type HexDecodeError = {
  readonly code: 'INVALID_HEX';
  readonly message: string;
};

/**
 * Which letter case `hexToBytes` accepts.
 * - `any`: [0-9a-fA-F]
 * - `lower`: [0-9a-f] only (wire format of the signature header)
 */
export type HexLetterCase = 'any' | 'lower';

const HEX_ANY_CASE = /^[0-9a-fA-F]*$/;
const HEX_LOWER_CASE = /^[0-9a-f]*$/;

/**
 * Encode bytes as lowercase hex: two characters per byte, no separators, no prefix.
 */
export function bytesToHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    out += b.toString(16).padStart(2, '0');
  }
  return out;
}

/**
 * Convert a hex string to bytes.
 *
 * The whole string is checked against the alphabet before parsing:
 * `Number.parseInt` alone would accept a valid prefix such as "0g".
 */
export function hexToBytes(hex: string, letterCase: HexLetterCase = 'any'): Result<Uint8Array, HexDecodeError> {
  if (hex.length % 2 !== 0) {
    return err({ code: 'INVALID_HEX', message: 'hex string must have even length' });
  }

  const alphabet = letterCase === 'lower' ? HEX_LOWER_CASE : HEX_ANY_CASE;
  if (!alphabet.test(hex)) {
    return err({
      code: 'INVALID_HEX',
      message: letterCase === 'lower'
        ? 'hex string may only contain [0-9a-f]'
        : 'hex string may only contain [0-9a-fA-F]',
    });
  }

  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return ok(out);
}
