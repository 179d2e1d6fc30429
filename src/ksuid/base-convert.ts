import { KsuidError, KsuidErrorCode } from './errors';

const MAX_BASE = 256;

/**
 * Working copy of a big-endian digit string that a base conversion is allowed
 * to overwrite. `length` is the active length: the conversion stores each
 * quotient back into `digits` and shrinks `length` until it reaches zero.
 */
export class ScratchDigits {
  readonly digits: Uint8Array;
  length: number;

  private constructor(digits: Uint8Array) {
    this.digits = digits;
    this.length = digits.length;
  }

  static copyOf(src: ArrayLike<number>): ScratchDigits {
    return new ScratchDigits(Uint8Array.from(src));
  }

  static alloc(size: number): ScratchDigits {
    return new ScratchDigits(new Uint8Array(size));
  }
}

function checkBase(base: number): void {
  if (!Number.isInteger(base) || base < 2 || base > MAX_BASE) {
    throw new RangeError(`Base must be an integer between 2 and ${MAX_BASE}, got ${base}`);
  }
}

/**
 * Upper bound on the number of `outBase` digits needed to hold a `len`-digit
 * number written in `inBase`.
 */
export function conversionLenBound(len: number, inBase: number, outBase: number): number {
  checkBase(inBase);
  checkBase(outBase);
  return Math.floor(len * (Math.log(inBase) / Math.log(outBase))) + 1;
}

/**
 * Change the base of an unsigned big-endian integer held one digit per byte.
 *
 * `out` is zero-filled and then written from its last position backward, so
 * positions the result does not reach are leading zeros. `num` is consumed:
 * its digits hold intermediate quotients and its active length ends at 0.
 * Digits in `num` must be below `inBase`.
 *
 * Throws `BUFFER_TOO_SMALL` if the result does not fit in `out`.
 */
export function changeBase(num: ScratchDigits, out: Uint8Array, inBase: number, outBase: number): void {
  checkBase(inBase);
  checkBase(outBase);
  out.fill(0);

  const digits = num.digits;
  let k = out.length;

  // Grade-school long division, writing the quotient back into `digits`.
  while (num.length > 0) {
    let rem = 0;
    let i = 0;

    for (let j = 0; j < num.length; j++) {
      const acc = digits[j] + inBase * rem;
      const div = Math.floor(acc / outBase);
      rem = acc % outBase;

      if (i !== 0 || div !== 0) {
        digits[i++] = div;
      }
    }

    if (k === 0) {
      throw new KsuidError(
        KsuidErrorCode.BUFFER_TOO_SMALL,
        `Output buffer of ${out.length} digits is too small for base ${inBase} to base ${outBase} conversion`,
        { expected: out.length }
      );
    }
    out[--k] = rem;
    num.length = i;
  }
}
