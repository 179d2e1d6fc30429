import assert from 'assert';
import sinon from 'sinon';
import { KsuidGenerator, ksuid } from '@src/ksuid/generator';
import { KsuidErrorCode } from '@src/ksuid/errors';

const NEW_YEAR_2024 = Date.UTC(2024, 0, 1);

function countingBytes(size: number): Buffer {
  return Buffer.from(Array.from({ length: size }, (_, i) => i));
}

describe('KsuidGenerator', function() {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers({ now: NEW_YEAR_2024, toFake: ['Date'] });
  });

  afterEach(() => {
    clock.restore();
  });

  it('combines the current time with a payload from the random source', () => {
    const random = sinon.fake(countingBytes);
    const generator = new KsuidGenerator({ random });

    const id = generator.next();

    sinon.assert.calledOnceWithExactly(random, 16);
    assert.strictEqual(id.timestamp(), 304067200);
    assert.strictEqual(id.toHex(), '121FB280000102030405060708090A0B0C0D0E0F');
    assert.strictEqual(generator.nextString(), '2aKVLJsghm4cqy9vajIu4ag0IqF');
  });

  it('reads the injected clock on every call', () => {
    let now = NEW_YEAR_2024;
    const generator = new KsuidGenerator({ random: countingBytes, clock: () => now });

    const first = generator.next();
    now += 5000;
    const second = generator.next();

    assert.strictEqual(second.timestamp() - first.timestamp(), 5);
    assert.strictEqual(first.compare(second), -1);
  });

  it('follows the system clock by default', () => {
    const generator = new KsuidGenerator({ random: countingBytes });
    const first = generator.next();
    clock.tick(1000);
    assert.strictEqual(generator.next().timestamp(), first.timestamp() + 1);
  });

  it('rejects a random source that returns the wrong number of bytes', () => {
    const generator = new KsuidGenerator({ random: () => Buffer.alloc(8) });
    assert.throws(() => generator.next(), { code: KsuidErrorCode.INVALID_LENGTH });
  });

  it('rejects a clock before the KSUID epoch', () => {
    const generator = new KsuidGenerator({ random: countingBytes, clock: () => 0 });
    assert.throws(() => generator.next(), { code: KsuidErrorCode.TIMESTAMP_OUT_OF_RANGE });
  });
});

describe('ksuid', function() {
  it('returns a 27-character string', () => {
    const id = ksuid();
    assert.strictEqual(id.length, 27);
    assert.strictEqual(typeof id, 'string');
  });

  it('uses only base62 characters', () => {
    assert.match(ksuid(), /^[0-9A-Za-z]{27}$/);
  });

  it('generates unique IDs', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(ksuid());
    }
    assert.strictEqual(ids.size, 1000);
  });

  it('generates IDs that sort chronologically', () => {
    const clock = sinon.useFakeTimers({ now: NEW_YEAR_2024, toFake: ['Date'] });
    try {
      const id1 = ksuid();
      clock.tick(1000); // Move to the next second
      const id2 = ksuid();
      assert(id1 < id2, `Expected ${id1} < ${id2}`);
    } finally {
      clock.restore();
    }
  });
});
