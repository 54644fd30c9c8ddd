import { MINIMUM_ODDS, PROBABILITY_BOOST, PROBABILITY_CEILING } from '../constants';
import { Opportunity, ResolvedOpportunity } from './interfaces/opportunity.interface';

export const parseOdds = (odds: Opportunity['odds']): number | undefined => {
  if (odds === null || odds === undefined) {
    return undefined;
  }

  if (typeof odds === 'string' && odds.trim() === '') {
    return undefined;
  }

  const value = typeof odds === 'number' ? odds : Number(odds);
  if (!Number.isFinite(value) || value <= MINIMUM_ODDS) {
    return undefined;
  }

  return value;
};

// implied probability is boosted to reach the acceptance thresholds, capped below certainty
export const estimateProbability = (decimalOdds: number): number => {
  return Math.min(PROBABILITY_CEILING, (1 / decimalOdds) * PROBABILITY_BOOST);
};

/**
 * Keeps the records with usable odds, in caller order, each copied and annotated
 * with a probability. A supplied probability above zero wins over the estimate.
 */
export const resolveProbabilities = (opportunities: Opportunity[]): ResolvedOpportunity[] => {
  const resolved: ResolvedOpportunity[] = [];

  for (const opportunity of opportunities) {
    const odds = parseOdds(opportunity.odds);
    if (odds === undefined) {
      continue;
    }

    const supplied = opportunity.probability;
    const probability =
      typeof supplied === 'number' && supplied > 0 ? supplied : estimateProbability(odds);

    resolved.push({ ...opportunity, odds, probability });
  }

  return resolved;
};
