import { groupBy } from '../commons/helper';
import { ResolvedOpportunity } from './interfaces/opportunity.interface';
import { ScoredGrouping } from './interfaces/recommendation.interface';

export const combinedOdds = (bets: ResolvedOpportunity[]): number => {
  let totalOdds = 1;
  for (const bet of bets) {
    totalOdds = totalOdds * bet.odds;
  }
  return totalOdds;
};

// increment for every repeat of a sport beyond its first leg
export const correlationPenalty = (bets: ResolvedOpportunity[], increment: number): number => {
  const bySport = groupBy(bets, (bet) => bet.sport);
  let repeats = 0;
  for (const sport of Object.keys(bySport)) {
    repeats += bySport[sport].length - 1;
  }
  return repeats * increment;
};

export const hasDistinctTeams = (bets: ResolvedOpportunity[]): boolean => {
  return new Set(bets.map((bet) => bet.teamName)).size === bets.length;
};

/**
 * Scores a grouping. The correlation haircut is applied once to the product of leg
 * probabilities and is not clamped, so a large enough penalty can take it below zero.
 */
export const scoreGrouping = (bets: ResolvedOpportunity[], increment: number): ScoredGrouping => {
  const decimalOdds = combinedOdds(bets);
  const penalty = increment > 0 ? correlationPenalty(bets, increment) : 0;

  let probability = 1;
  for (const bet of bets) {
    probability = probability * bet.probability;
  }
  probability = probability * (1 - penalty);

  return {
    bets,
    decimalOdds,
    probability,
    correlationPenalty: penalty,
    expectedValue: (decimalOdds * probability - 1) * 100,
  };
};
