import { BASE62_ALPHABET, BASE62_LENGTH, KSUID_BYTES } from './constants';
import { ScratchDigits, changeBase } from './base-convert';
import { KsuidError } from './errors';

const INVALID = -1;

// ASCII code -> digit value, INVALID for anything outside [0-9A-Za-z]
const CHAR_TO_DIGIT = new Int8Array(128).fill(INVALID);
for (let i = 0; i < BASE62_ALPHABET.length; i++) {
  CHAR_TO_DIGIT[BASE62_ALPHABET.charCodeAt(i)] = i;
}

function charToDigit(code: number): number {
  return code < CHAR_TO_DIGIT.length ? CHAR_TO_DIGIT[code] : INVALID;
}

export function encodeBase62(raw: Uint8Array): string {
  if (raw.length !== KSUID_BYTES) {
    throw KsuidError.invalidLength('Raw KSUID', KSUID_BYTES, raw.length);
  }

  const out = new Uint8Array(BASE62_LENGTH);
  changeBase(ScratchDigits.copyOf(raw), out, 256, 62);

  let result = '';
  for (const digit of out) {
    result += BASE62_ALPHABET[digit];
  }
  return result;
}

export function decodeBase62(text: string): Buffer {
  if (text.length !== BASE62_LENGTH) {
    throw KsuidError.invalidLength('Base62 KSUID', BASE62_LENGTH, text.length);
  }

  // Map every character before doing any arithmetic
  const scratch = ScratchDigits.alloc(BASE62_LENGTH);
  for (let i = 0; i < BASE62_LENGTH; i++) {
    const digit = charToDigit(text.charCodeAt(i));
    if (digit === INVALID) {
      throw KsuidError.invalidCharacter('base62', text, i);
    }
    scratch.digits[i] = digit;
  }

  const out = Buffer.alloc(KSUID_BYTES);
  changeBase(scratch, out, 62, 256);
  return out;
}
