import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JsonLogger, LoggerFactory } from 'json-logger-service';
import { DEFAULT_POOL_LIMIT } from '../constants';
import { DiagnosticsService } from '../diagnostics/diagnostics.service';
import { OpportunitiesService } from '../opportunities/opportunities.service';
import { Opportunity } from './interfaces/opportunity.interface';
import {
  Recommendation,
  RecommendationCategory,
  RecommendationSet,
} from './interfaces/recommendation.interface';
import { ParlayService } from './parlay.service';

export const emptyRecommendationSet = (): RecommendationSet => ({
  singleBets: [],
  twoLegParlays: [],
  threeLegParlays: [],
  favoriteParlays: [],
});

const isPoolLimit = (value?: number): value is number =>
  value !== undefined && Number.isInteger(value) && value > 0;

@Injectable()
export class RecommendationsService {
  private readonly logger: JsonLogger = LoggerFactory.createLogger(
    RecommendationsService.name,
  );

  constructor(
    private readonly parlayService: ParlayService,
    private readonly opportunitiesService: OpportunitiesService,
    private readonly diagnostics: DiagnosticsService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Runs every generator with its default thresholds. A generator that throws only
   * empties its own category.
   */
  recommendAll(opportunities: Opportunity[]): RecommendationSet {
    const result: RecommendationSet = {
      singleBets: this.isolate('single_bets', () =>
        this.parlayService.getSingleBets(opportunities),
      ),
      twoLegParlays: this.isolate('two_leg_parlays', () =>
        this.parlayService.getTwoLegParlays(opportunities),
      ),
      threeLegParlays: this.isolate('three_leg_parlays', () =>
        this.parlayService.getThreeLegParlays(opportunities),
      ),
      favoriteParlays: this.isolate('favorite_parlays', () =>
        this.parlayService.getFavoriteParlays(opportunities),
      ),
    };

    this.diagnostics.emit({
      type: 'recommendations_generated',
      poolSize: opportunities.length,
      counts: {
        single_bets: result.singleBets.length,
        two_leg_parlays: result.twoLegParlays.length,
        three_leg_parlays: result.threeLegParlays.length,
        favorite_parlays: result.favoriteParlays.length,
      },
    });

    return result;
  }

  // a number matches sportId, a string matches the sport name
  recommendBySport(opportunities: Opportunity[], sport?: string | number): RecommendationSet {
    if (sport === undefined || sport === '') {
      return this.recommendAll(opportunities);
    }

    const filtered = opportunities.filter((opportunity) =>
      typeof sport === 'number' ? opportunity.sportId === sport : opportunity.sport === sport,
    );

    return this.recommendAll(filtered);
  }

  async recommendFromSource(limit?: number, sport?: string | number): Promise<RecommendationSet> {
    const poolLimit = isPoolLimit(limit) ? limit : this.configuredPoolLimit();

    let opportunities: Opportunity[];
    try {
      opportunities = await this.opportunitiesService.getOpenOpportunities(poolLimit);
    } catch (e) {
      this.diagnostics.emit({
        type: 'source_failed',
        limit: poolLimit,
        error: String(e),
      });
      return emptyRecommendationSet();
    }

    this.logger.info('read ' + opportunities.length + ' open opportunities');

    return this.recommendBySport(opportunities, sport);
  }

  private configuredPoolLimit(): number {
    const configured = Number(
      this.configService.get<number | string>('RECOMMENDATION_POOL_LIMIT', DEFAULT_POOL_LIMIT),
    );
    return isPoolLimit(configured) ? configured : DEFAULT_POOL_LIMIT;
  }

  private isolate(
    category: RecommendationCategory,
    generate: () => Recommendation[],
  ): Recommendation[] {
    try {
      return generate();
    } catch (e) {
      this.diagnostics.emit({ type: 'category_failed', category, error: String(e) });
      return [];
    }
  }
}
