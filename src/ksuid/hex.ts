import { HEX_DIGITS, HEX_LENGTH, KSUID_BYTES } from './constants';
import { KsuidError } from './errors';

function nibble(code: number): number {
  if (code >= 0x30 && code <= 0x39) { // 0-9
    return code - 0x30;
  }
  if (code >= 0x41 && code <= 0x46) { // A-F
    return code - 0x41 + 10;
  }
  if (code >= 0x61 && code <= 0x66) { // a-f
    return code - 0x61 + 10;
  }
  return -1;
}

export function encodeHex(raw: Uint8Array): string {
  if (raw.length !== KSUID_BYTES) {
    throw KsuidError.invalidLength('Raw KSUID', KSUID_BYTES, raw.length);
  }

  let result = '';
  for (const byte of raw) {
    result += HEX_DIGITS[byte >> 4] + HEX_DIGITS[byte & 0x0f];
  }
  return result;
}

export function decodeHex(text: string): Buffer {
  if (text.length !== HEX_LENGTH) {
    throw KsuidError.invalidLength('Hex KSUID', HEX_LENGTH, text.length);
  }

  const out = Buffer.alloc(KSUID_BYTES);
  for (let i = 0; i < KSUID_BYTES; i++) {
    const upper = nibble(text.charCodeAt(2 * i));
    if (upper < 0) {
      throw KsuidError.invalidCharacter('hex', text, 2 * i);
    }
    const lower = nibble(text.charCodeAt(2 * i + 1));
    if (lower < 0) {
      throw KsuidError.invalidCharacter('hex', text, 2 * i + 1);
    }
    out[i] = (upper << 4) | lower;
  }
  return out;
}
