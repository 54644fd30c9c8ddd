import { ResolvedOpportunity } from './opportunity.interface';

export type RecommendationCategory =
  | 'single_bets'
  | 'two_leg_parlays'
  | 'three_leg_parlays'
  | 'favorite_parlays';

export interface Thresholds {
  minOdds: number;
  minWinProb: number;
}

export interface FavoriteParlayOptions {
  legCount?: number;
  minOdds?: number;
  minWinProb?: number;
}

export interface ScoredGrouping {
  bets: ResolvedOpportunity[];
  decimalOdds: number;
  probability: number;
  correlationPenalty: number;
  expectedValue: number;
}

export interface Recommendation {
  type: string;
  category: RecommendationCategory;
  rank: number;
  sport: string;
  bets: ResolvedOpportunity[];
  legCount: number;
  decimalOdds: number;
  americanOdds: string;
  winProbability: number;
  expectedValue: number;
  correlationPenalty: number;
}

export interface RecommendationSet {
  singleBets: Recommendation[];
  twoLegParlays: Recommendation[];
  threeLegParlays: Recommendation[];
  favoriteParlays: Recommendation[];
}
