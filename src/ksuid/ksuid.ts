import { inspect } from 'util';
import {
  BASE62_LENGTH,
  HEX_LENGTH,
  KSUID_BYTES,
  KSUID_EPOCH,
  MAX_BASE62_KSUID,
  MAX_TIMESTAMP,
  PAYLOAD_BYTES,
  TIMESTAMP_BYTES
} from './constants';
import { decodeBase62, encodeBase62 } from './base62';
import { decodeHex, encodeHex } from './hex';
import { KsuidError, KsuidErrorCode } from './errors';
import { randomBytes, type RandomBytes } from '../utils/random';

// Milliseconds since the UNIX epoch, like Date.now()
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

const EMPTY_PAYLOAD = new Uint8Array(PAYLOAD_BYTES);

function checkTimestamp(timestamp: number): void {
  if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIMESTAMP) {
    throw new KsuidError(
      KsuidErrorCode.TIMESTAMP_OUT_OF_RANGE,
      `Timestamp must be an integer between 0 and ${MAX_TIMESTAMP}, got ${timestamp}`,
      { actual: timestamp }
    );
  }
}

/**
 * Convert milliseconds since the UNIX epoch into a KSUID timestamp.
 * Times before the KSUID epoch or past the 32-bit range are rejected, not wrapped.
 */
export function timestampFromMillis(ms: number): number {
  const timestamp = Math.floor(ms / 1000) - KSUID_EPOCH;
  checkTimestamp(timestamp);
  return timestamp;
}

/**
 * A 20-byte K-sortable unique identifier.
 *
 * The first 4 bytes are a big-endian, unsigned count of seconds since
 * KSUID_EPOCH; the remaining 16 bytes are an opaque (normally random) payload.
 * Because the timestamp comes first, byte order, Base62 order and hex order all
 * sort ids by creation time.
 */
export class Ksuid {
  private readonly bytes = Buffer.alloc(KSUID_BYTES);

  constructor(timestamp: number, payload: Uint8Array) {
    this.setTimestamp(timestamp);
    this.setPayload(payload);
  }

  private static wrap(raw: Uint8Array): Ksuid {
    const id = new Ksuid(0, EMPTY_PAYLOAD);
    id.bytes.set(raw);
    return id;
  }

  /** A KSUID for the current time carrying `payload`. */
  static withPayload(payload: Uint8Array, clock: Clock = systemClock): Ksuid {
    return new Ksuid(timestampFromMillis(clock()), payload);
  }

  /** A KSUID for the current time with a payload drawn from `random`. */
  static generate(random: RandomBytes = randomBytes, clock: Clock = systemClock): Ksuid {
    return Ksuid.withPayload(random(PAYLOAD_BYTES), clock);
  }

  static fromBase62(text: string): Ksuid {
    if (text.length !== BASE62_LENGTH) {
      throw KsuidError.invalidLength('Base62 KSUID', BASE62_LENGTH, text.length);
    }
    // Not every 27-character string fits in 20 bytes
    if (text > MAX_BASE62_KSUID) {
      throw new KsuidError(
        KsuidErrorCode.VALUE_TOO_LARGE,
        `Base62 KSUID ${JSON.stringify(text)} is greater than ${MAX_BASE62_KSUID}`,
        { input: text }
      );
    }
    return Ksuid.wrap(decodeBase62(text));
  }

  static fromHex(text: string): Ksuid {
    return Ksuid.wrap(decodeHex(text));
  }

  static fromBytes(raw: Uint8Array): Ksuid {
    if (raw.length !== KSUID_BYTES) {
      throw KsuidError.invalidLength('Raw KSUID', KSUID_BYTES, raw.length);
    }
    return Ksuid.wrap(raw);
  }

  /** Parse either textual form, telling them apart by length. */
  static parse(text: string): Ksuid {
    if (text.length === BASE62_LENGTH) {
      return Ksuid.fromBase62(text);
    }
    if (text.length === HEX_LENGTH) {
      return Ksuid.fromHex(text);
    }
    throw new KsuidError(
      KsuidErrorCode.INVALID_LENGTH,
      `KSUID must be ${BASE62_LENGTH} (base62) or ${HEX_LENGTH} (hex) characters long, got ${text.length}`,
      { actual: text.length }
    );
  }

  static isValid(text: string): boolean {
    try {
      Ksuid.parse(text);
      return true;
    } catch (err) {
      if (err instanceof KsuidError) {
        return false;
      }
      throw err;
    }
  }

  static compare(a: Ksuid, b: Ksuid): number {
    return a.compare(b);
  }

  static nil(): Ksuid {
    return Ksuid.wrap(new Uint8Array(KSUID_BYTES));
  }

  static max(): Ksuid {
    return Ksuid.wrap(new Uint8Array(KSUID_BYTES).fill(0xff));
  }

  /** Seconds since KSUID_EPOCH. */
  timestamp(): number {
    return this.bytes.readUInt32BE(0);
  }

  setTimestamp(timestamp: number): void {
    checkTimestamp(timestamp);
    this.bytes.writeUInt32BE(timestamp, 0);
  }

  payload(): Buffer {
    return Buffer.from(this.bytes.subarray(TIMESTAMP_BYTES));
  }

  setPayload(payload: Uint8Array): void {
    if (payload.length !== PAYLOAD_BYTES) {
      throw KsuidError.invalidLength('Payload', PAYLOAD_BYTES, payload.length);
    }
    this.bytes.set(payload, TIMESTAMP_BYTES);
  }

  time(): Date {
    return new Date((KSUID_EPOCH + this.timestamp()) * 1000);
  }

  /** Sub-second precision is dropped. */
  setTime(time: Date): void {
    this.setTimestamp(timestampFromMillis(time.getTime()));
  }

  toBytes(): Buffer {
    return Buffer.from(this.bytes);
  }

  toBase62(): string {
    return encodeBase62(this.bytes);
  }

  toHex(): string {
    return encodeHex(this.bytes);
  }

  equals(other: Ksuid): boolean {
    return this.bytes.equals(other.bytes);
  }

  compare(other: Ksuid): number {
    return Buffer.compare(this.bytes, other.bytes);
  }

  clone(): Ksuid {
    return Ksuid.wrap(this.bytes);
  }

  toString(): string {
    return this.toBase62();
  }

  toJSON(): string {
    return this.toBase62();
  }

  [inspect.custom](): string {
    return `Ksuid(${this.toBase62()})`;
  }
}
