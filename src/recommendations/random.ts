export interface RandomSource {
  /** Uniform value in [0, 1). */
  next(): number;
}

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * mulberry32, for reproducible sampling when a seed is configured.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Draws `count` distinct elements with a partial Fisher-Yates shuffle over a copy.
 * Consumes exactly `count` values from the source.
 */
export const sampleWithoutReplacement = <T>(pool: T[], count: number, random: RandomSource): T[] => {
  const items = [...pool];
  const n = items.length;

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random.next() * (n - i));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }

  return items.slice(0, count);
};
