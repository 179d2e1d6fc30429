import assert from 'assert';
import { ScratchDigits, changeBase, conversionLenBound } from '@src/ksuid/base-convert';
import { KsuidErrorCode } from '@src/ksuid/errors';

describe('conversionLenBound', () => {
  it('bounds 20 bytes to 27 base62 digits', () => {
    assert.strictEqual(conversionLenBound(20, 256, 62), 27);
  });

  it('bounds 27 base62 digits to 21 bytes', () => {
    assert.strictEqual(conversionLenBound(27, 62, 256), 21);
  });

  it('rejects bases outside 2..256', () => {
    assert.throws(() => conversionLenBound(4, 1, 62), RangeError);
    assert.throws(() => conversionLenBound(4, 256, 257), RangeError);
  });
});

describe('changeBase', () => {
  it('converts base 256 to base 62', () => {
    const out = new Uint8Array(conversionLenBound(4, 256, 62));
    changeBase(ScratchDigits.copyOf([255, 254, 253, 252]), out, 256, 62);
    assert.deepStrictEqual(Array.from(out), [4, 42, 40, 60, 0, 44]);
  });

  it('converts base 62 back to base 256', () => {
    const out = new Uint8Array(4);
    changeBase(ScratchDigits.copyOf([4, 42, 40, 60, 0, 44]), out, 62, 256);
    assert.deepStrictEqual(Array.from(out), [255, 254, 253, 252]);
  });

  it('leaves unused leading positions as zero digits', () => {
    const out = Uint8Array.from([9, 9, 9]);
    changeBase(ScratchDigits.copyOf([0, 0, 1]), out, 256, 62);
    assert.deepStrictEqual(Array.from(out), [0, 0, 1]);
  });

  it('converts zero to all-zero output', () => {
    const out = new Uint8Array(27);
    changeBase(ScratchDigits.copyOf(new Uint8Array(20)), out, 256, 62);
    assert.deepStrictEqual(out, new Uint8Array(27));
  });

  it('consumes the scratch digits but not their source', () => {
    const source = Uint8Array.from([1, 2, 3, 4]);
    const scratch = ScratchDigits.copyOf(source);
    changeBase(scratch, new Uint8Array(6), 256, 62);
    assert.strictEqual(scratch.length, 0);
    assert.deepStrictEqual(Array.from(source), [1, 2, 3, 4]);
  });

  it('fails when the output buffer is too small', () => {
    const scratch = ScratchDigits.copyOf(new Uint8Array(20).fill(0xff));
    assert.throws(
      () => changeBase(scratch, new Uint8Array(26), 256, 62),
      { name: 'KsuidError', code: KsuidErrorCode.BUFFER_TOO_SMALL }
    );
  });

  it('rejects invalid bases', () => {
    assert.throws(() => changeBase(ScratchDigits.alloc(1), new Uint8Array(1), 0, 62), RangeError);
    assert.throws(() => changeBase(ScratchDigits.alloc(1), new Uint8Array(1), 256, 2.5), RangeError);
  });

  it('converts between small bases', () => {
    // 0b1101 = 13 = 0o15
    const out = new Uint8Array(3);
    changeBase(ScratchDigits.copyOf([1, 1, 0, 1]), out, 2, 8);
    assert.deepStrictEqual(Array.from(out), [0, 1, 5]);
  });
});
