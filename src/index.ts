export * from './ksuid';
export { randomBytes } from './utils/random';
export type { RandomBytes } from './utils/random';
