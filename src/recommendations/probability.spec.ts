import { Opportunity } from './interfaces/opportunity.interface';
import { estimateProbability, parseOdds, resolveProbabilities } from './probability';

const opportunity = (id: number, odds: Opportunity['odds'], probability?: number): Opportunity => ({
  id,
  teamName: `Team ${id}`,
  sport: 'NBA',
  odds,
  probability,
});

describe('probability resolution', () => {
  it('boosts implied probability and caps it at 0.9', () => {
    for (const odds of [1.01, 1.5, 2.0, 2.77, 2.78, 3.0, 5.0, 10.0, 100.0]) {
      const probability = estimateProbability(odds);

      expect(probability).toBeCloseTo(Math.min(0.9, 2.5 / odds), 10);
      expect(probability).toBeGreaterThan(0);
      expect(probability).toBeLessThanOrEqual(0.9);
    }
  });

  it('keeps a supplied probability above zero', () => {
    const [resolved] = resolveProbabilities([opportunity(1, 2.0, 0.65)]);

    expect(resolved.probability).toBe(0.65);
  });

  it('estimates when the supplied probability is zero', () => {
    const [resolved] = resolveProbabilities([opportunity(1, 5.0, 0)]);

    expect(resolved.probability).toBeCloseTo(0.5, 10);
  });

  it('drops records without usable odds', () => {
    const resolved = resolveProbabilities([
      opportunity(1, 1.0),
      opportunity(2, 0.5),
      opportunity(3, -2),
      opportunity(4, null),
      opportunity(5, undefined),
      opportunity(6, 'abc'),
      opportunity(7, ''),
      opportunity(8, Number.NaN),
      opportunity(9, Number.POSITIVE_INFINITY),
      opportunity(10, 2.0),
    ]);

    expect(resolved.map((bet) => bet.id)).toEqual([10]);
  });

  it('accepts numeric strings', () => {
    expect(parseOdds('2.5')).toBe(2.5);

    const [resolved] = resolveProbabilities([opportunity(1, '2.5')]);
    expect(resolved.odds).toBe(2.5);
    expect(resolved.probability).toBe(0.9);
  });

  it('keeps caller order and leaves the input untouched', () => {
    const input = [opportunity(1, 5.0), opportunity(2, 1.5), opportunity(3, 3.0)];

    const resolved = resolveProbabilities(input);

    expect(resolved.map((bet) => bet.id)).toEqual([1, 2, 3]);
    expect(input[0].probability).toBeUndefined();
    expect(resolved[0]).not.toBe(input[0]);
  });
});
