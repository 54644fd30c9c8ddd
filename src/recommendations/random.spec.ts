import { RandomSource, SeededRandomSource, sampleWithoutReplacement } from './random';

class ScriptedRandom implements RandomSource {
  calls = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[this.calls % this.values.length];
    this.calls++;
    return value;
  }
}

describe('random sampling', () => {
  const pool = ['a', 'b', 'c', 'd', 'e'];

  it('takes the leading elements when every draw is zero', () => {
    const random = new ScriptedRandom([0]);

    expect(sampleWithoutReplacement(pool, 3, random)).toEqual(['a', 'b', 'c']);
    expect(random.calls).toBe(3);
  });

  it('swaps drawn elements to the front', () => {
    const random = new ScriptedRandom([0.99]);

    expect(sampleWithoutReplacement(pool, 2, random)).toEqual(['e', 'a']);
  });

  it('never repeats an element and leaves the pool untouched', () => {
    const sample = sampleWithoutReplacement(pool, 5, new SeededRandomSource(7));

    expect([...sample].sort()).toEqual(pool);
    expect(pool).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('repeats the same sequence for the same seed', () => {
    const first = new SeededRandomSource(42);
    const second = new SeededRandomSource(42);

    for (let i = 0; i < 20; i++) {
      const value = first.next();
      expect(second.next()).toBe(value);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
