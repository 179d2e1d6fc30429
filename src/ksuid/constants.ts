// KSUID layout: 4 bytes timestamp (seconds since KSUID_EPOCH) + 16 bytes payload

export const KSUID_EPOCH = 1400000000; // May 13, 2014 16:53:20 UTC
export const TIMESTAMP_BYTES = 4;
export const PAYLOAD_BYTES = 16;
export const KSUID_BYTES = TIMESTAMP_BYTES + PAYLOAD_BYTES;
export const MAX_TIMESTAMP = 0xffffffff;

export const BASE62_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
export const BASE62_LENGTH = 27;
// Base62 encoding of 20 bytes of 0xff
export const MAX_BASE62_KSUID = 'aWgEPTl1tmebfsQzFP4bxwgy80V';

export const HEX_DIGITS = '0123456789ABCDEF';
export const HEX_LENGTH = KSUID_BYTES * 2;
