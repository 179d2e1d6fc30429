import { Ksuid, systemClock, type Clock } from './ksuid';
import { randomBytes, type RandomBytes } from '../utils/random';

export interface KsuidGeneratorOptions {
  random?: RandomBytes; // Payload source (default: crypto.randomBytes)
  clock?: Clock; // Current time in ms (default: Date.now)
}

export class KsuidGenerator {
  private random: RandomBytes;
  private clock: Clock;

  constructor(options: KsuidGeneratorOptions = {}) {
    this.random = options.random ?? randomBytes;
    this.clock = options.clock ?? systemClock;
  }

  next(): Ksuid {
    return Ksuid.generate(this.random, this.clock);
  }

  nextString(): string {
    return this.next().toBase62();
  }
}

const defaultGenerator = new KsuidGenerator();

// KSUID: K-Sortable Unique Identifier, Base62 encoded to 27 characters
export function ksuid(): string {
  return defaultGenerator.nextString();
}
