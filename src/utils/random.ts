import { randomBytes as cryptoRandomBytes } from 'crypto';

// Source of random payload bytes; injected wherever ids are generated
export type RandomBytes = (size: number) => Uint8Array;

export const randomBytes: RandomBytes = (size: number): Buffer => cryptoRandomBytes(size);
