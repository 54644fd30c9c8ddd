import { Opportunity } from './opportunity.interface';

export interface GetRecommendationsRequest {
  limit?: number;
  sport?: string;
}

export interface RecommendParlaysRequest {
  opportunities: Opportunity[];
}

export interface GetFavoriteParlaysRequest {
  opportunities: Opportunity[];
  legCount?: number;
  minOdds?: number;
  minWinProb?: number;
}

export interface FindValueBetsRequest {
  opportunities: Opportunity[];
  minEdge?: number;
  confidenceThreshold?: number;
  maxBets?: number;
  maxLegs?: number;
}
