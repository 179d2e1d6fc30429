import assert from 'assert';
import { randomBytes } from '@src/utils/random';

describe('randomBytes', function() {
  it('returns the requested number of bytes', () => {
    assert.strictEqual(randomBytes(16).length, 16);
    assert.strictEqual(randomBytes(0).length, 0);
  });

  it('returns fresh bytes on every call', () => {
    assert.notDeepStrictEqual(randomBytes(16), randomBytes(16));
  });
});
