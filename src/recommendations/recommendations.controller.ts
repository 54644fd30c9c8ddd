import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import { FavoriteParlayOptions, RecommendationSet } from './interfaces/recommendation.interface';
import {
  FindValueBetsRequest,
  GetFavoriteParlaysRequest,
  GetRecommendationsRequest,
  RecommendParlaysRequest,
} from './interfaces/recommendation.request.interface';
import { FavoriteParlaysResponse } from './interfaces/recommendation.response.interface';
import { ValueBetReport } from './interfaces/value.bet.interface';
import { ParlayService } from './parlay.service';
import { RecommendationsService } from './recommendations.service';
import { ValueBettingService } from './value.betting.service';

// proto3 sends zero for unset scalars; zero means "use the default" here
const positiveOrUndefined = (value?: number): number | undefined =>
  value && value > 0 ? value : undefined;

@Controller()
export class RecommendationsController {
  constructor(
    private readonly recommendationsService: RecommendationsService,
    private readonly parlayService: ParlayService,
    private readonly valueBettingService: ValueBettingService,
  ) {}

  @GrpcMethod('RecommendationService', 'GetRecommendations')
  GetRecommendations(data: GetRecommendationsRequest): Promise<RecommendationSet> {
    return this.recommendationsService.recommendFromSource(
      positiveOrUndefined(data.limit),
      data.sport || undefined,
    );
  }

  @GrpcMethod('RecommendationService', 'RecommendParlays')
  RecommendParlays(data: RecommendParlaysRequest): RecommendationSet {
    return this.recommendationsService.recommendAll(data.opportunities || []);
  }

  @GrpcMethod('RecommendationService', 'GetFavoriteParlays')
  GetFavoriteParlays(data: GetFavoriteParlaysRequest): FavoriteParlaysResponse {
    const options: FavoriteParlayOptions = {
      legCount: positiveOrUndefined(data.legCount),
      minOdds: positiveOrUndefined(data.minOdds),
      minWinProb: positiveOrUndefined(data.minWinProb),
    };

    return {
      favoriteParlays: this.parlayService.getFavoriteParlays(data.opportunities || [], options),
    };
  }

  @GrpcMethod('RecommendationService', 'FindValueBets')
  FindValueBets(data: FindValueBetsRequest): ValueBetReport {
    return this.valueBettingService.report(data.opportunities || [], {
      minEdge: positiveOrUndefined(data.minEdge),
      confidenceThreshold: positiveOrUndefined(data.confidenceThreshold),
      maxBets: positiveOrUndefined(data.maxBets),
      maxLegs: positiveOrUndefined(data.maxLegs),
    });
  }
}
