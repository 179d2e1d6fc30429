export * from './constants';
export { KsuidError, KsuidErrorCode } from './errors';
export type { KsuidErrorDetails } from './errors';
export { ScratchDigits, changeBase, conversionLenBound } from './base-convert';
export { encodeBase62, decodeBase62 } from './base62';
export { encodeHex, decodeHex } from './hex';
export { Ksuid, systemClock, timestampFromMillis } from './ksuid';
export type { Clock } from './ksuid';
export { KsuidGenerator, ksuid } from './generator';
export type { KsuidGeneratorOptions } from './generator';
