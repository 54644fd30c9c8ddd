import { ResolvedOpportunity } from './opportunity.interface';

export interface ValueBetOptions {
  minEdge?: number;
  confidenceThreshold?: number;
  maxBets?: number;
  maxLegs?: number;
}

export interface ValueBet {
  bet: ResolvedOpportunity;
  decimalOdds: number;
  americanOdds: string;
  impliedProbability: number;
  edge: number;
  expectedValue: number;
  fairOdds: string;
  confidence: number;
  isValueBet: boolean;
}

export interface ValueParlay {
  bets: ValueBet[];
  legCount: number;
  combinedProbability: number;
  decimalOdds: number;
  bookmakerOdds: string;
  fairOdds: string;
  expectedValue: number;
  isValueParlay: boolean;
}

export interface ValueBetReport {
  valueBets: ValueBet[];
  parlay?: ValueParlay;
}
