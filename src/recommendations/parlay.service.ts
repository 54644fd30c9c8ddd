import { Inject, Injectable } from '@nestjs/common';
import { JsonLogger, LoggerFactory } from 'json-logger-service';
import {
  DEFAULT_FAVORITE_LEGS,
  FAVORITE_CORRELATION,
  FAVORITE_THRESHOLDS,
  FAVORITE_WINDOW,
  MAX_RESULTS,
  RANDOM_ATTEMPTS,
  RANDOM_SOURCE,
  SINGLE_BET_THRESHOLDS,
  THREE_LEG_CORRELATION,
  THREE_LEG_THRESHOLDS,
  THREE_LEG_WINDOW,
  TWO_LEG_CORRELATION,
  TWO_LEG_THRESHOLDS,
  TWO_LEG_WINDOW,
} from '../constants';
import { countItem, recommendationType } from '../commons/helper';
import { decimalToAmerican } from '../commons/odds';
import { Opportunity, ResolvedOpportunity } from './interfaces/opportunity.interface';
import {
  FavoriteParlayOptions,
  Recommendation,
  RecommendationCategory,
  ScoredGrouping,
  Thresholds,
} from './interfaces/recommendation.interface';
import { resolveProbabilities } from './probability';
import { RandomSource, sampleWithoutReplacement } from './random';
import { hasDistinctTeams, scoreGrouping } from './scoring';

@Injectable()
export class ParlayService {
  private readonly logger: JsonLogger = LoggerFactory.createLogger(
    ParlayService.name,
  );

  constructor(
    @Inject(RANDOM_SOURCE)
    private readonly random: RandomSource,
  ) {}

  getSingleBets(
    opportunities: Opportunity[],
    thresholds: Thresholds = SINGLE_BET_THRESHOLDS,
  ): Recommendation[] {
    const candidates = resolveProbabilities(opportunities).map((bet) =>
      scoreGrouping([bet], 0),
    );

    return this.rankByExpectedValue(candidates, thresholds, 'single_bets');
  }

  getTwoLegParlays(
    opportunities: Opportunity[],
    thresholds: Thresholds = TWO_LEG_THRESHOLDS,
  ): Recommendation[] {
    const window = this.candidateWindow(opportunities, TWO_LEG_WINDOW);
    if (window.length < 2) {
      return [];
    }

    const candidates: ScoredGrouping[] = [];
    for (let i = 0; i < window.length; i++) {
      for (let j = i + 1; j < window.length; j++) {
        if (window[i].teamName === window[j].teamName) {
          continue;
        }
        candidates.push(scoreGrouping([window[i], window[j]], TWO_LEG_CORRELATION));
      }
    }

    return this.rankByExpectedValue(candidates, thresholds, 'two_leg_parlays');
  }

  getThreeLegParlays(
    opportunities: Opportunity[],
    thresholds: Thresholds = THREE_LEG_THRESHOLDS,
  ): Recommendation[] {
    const window = this.candidateWindow(opportunities, THREE_LEG_WINDOW);
    if (window.length < 3) {
      return [];
    }

    const candidates = this.sampleGroupings(window, 3, THREE_LEG_CORRELATION);

    return this.rankByExpectedValue(candidates, thresholds, 'three_leg_parlays');
  }

  /**
   * Random N-leg groupings of the strongest favorites. Ranked by probability rather
   * than EV, and the same set of teams drawn twice is only returned once.
   */
  getFavoriteParlays(
    opportunities: Opportunity[],
    options: FavoriteParlayOptions = {},
  ): Recommendation[] {
    const legCount = options.legCount ?? DEFAULT_FAVORITE_LEGS;
    const thresholds: Thresholds = {
      minOdds: options.minOdds ?? FAVORITE_THRESHOLDS.minOdds,
      minWinProb: options.minWinProb ?? FAVORITE_THRESHOLDS.minWinProb,
    };

    const window = this.candidateWindow(opportunities, FAVORITE_WINDOW);
    if (!Number.isInteger(legCount) || legCount < 1 || window.length < legCount) {
      this.logger.info(
        `not enough favorites for a ${legCount}-leg parlay: ${window.length}`,
      );
      return [];
    }

    const qualifying = this.sampleGroupings(window, legCount, FAVORITE_CORRELATION)
      .filter((candidate) => this.meetsThresholds(candidate, thresholds))
      .sort((a, b) => b.probability - a.probability);

    const seen = new Set<string>();
    const unique: ScoredGrouping[] = [];
    for (const candidate of qualifying) {
      const key = JSON.stringify(candidate.bets.map((bet) => bet.teamName).sort());
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      unique.push(candidate);
    }

    return unique
      .slice(0, MAX_RESULTS)
      .map((candidate, index) => this.toRecommendation(candidate, 'favorite_parlays', index));
  }

  private candidateWindow(opportunities: Opportunity[], size: number): ResolvedOpportunity[] {
    return resolveProbabilities(opportunities)
      .sort((a, b) => b.probability - a.probability)
      .slice(0, size);
  }

  // attempts that draw the same team twice are spent without producing a candidate
  private sampleGroupings(
    window: ResolvedOpportunity[],
    legCount: number,
    increment: number,
  ): ScoredGrouping[] {
    const candidates: ScoredGrouping[] = [];

    for (let attempt = 0; attempt < RANDOM_ATTEMPTS; attempt++) {
      const legs = sampleWithoutReplacement(window, legCount, this.random);
      if (!hasDistinctTeams(legs)) {
        continue;
      }
      candidates.push(scoreGrouping(legs, increment));
    }

    return candidates;
  }

  private meetsThresholds(candidate: ScoredGrouping, thresholds: Thresholds): boolean {
    return (
      candidate.decimalOdds >= thresholds.minOdds &&
      candidate.probability * 100 >= thresholds.minWinProb
    );
  }

  private rankByExpectedValue(
    candidates: ScoredGrouping[],
    thresholds: Thresholds,
    category: RecommendationCategory,
  ): Recommendation[] {
    return candidates
      .filter((candidate) => this.meetsThresholds(candidate, thresholds))
      .sort((a, b) => b.expectedValue - a.expectedValue)
      .slice(0, MAX_RESULTS)
      .map((candidate, index) => this.toRecommendation(candidate, category, index));
  }

  private toRecommendation(
    candidate: ScoredGrouping,
    category: RecommendationCategory,
    index: number,
  ): Recommendation {
    const legCount = candidate.bets.length;

    return {
      type: recommendationType(category, legCount),
      category,
      rank: index + 1,
      sport: countItem(candidate.bets, (bet) => bet.sport, 'sports'),
      bets: candidate.bets,
      legCount,
      decimalOdds: candidate.decimalOdds,
      americanOdds: decimalToAmerican(candidate.decimalOdds),
      winProbability: candidate.probability * 100,
      expectedValue: candidate.expectedValue,
      correlationPenalty: candidate.correlationPenalty,
    };
  }
}
