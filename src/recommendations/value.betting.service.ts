import { Injectable } from '@nestjs/common';
import { JsonLogger, LoggerFactory } from 'json-logger-service';
import {
  MAX_RESULTS,
  VALUE_CONFIDENCE_THRESHOLD,
  VALUE_MIN_EDGE,
  VALUE_PARLAY_MAX_LEGS,
} from '../constants';
import { decimalToAmerican } from '../commons/odds';
import { Opportunity, ResolvedOpportunity } from './interfaces/opportunity.interface';
import {
  ValueBet,
  ValueBetOptions,
  ValueBetReport,
  ValueParlay,
} from './interfaces/value.bet.interface';
import { resolveProbabilities } from './probability';
import { combinedOdds } from './scoring';

interface ValueCriteria {
  minEdge: number;
  confidenceThreshold: number;
}

const clampUnit = (value: number | undefined, fallback: number): number =>
  value === undefined ? fallback : Math.min(1, Math.max(0, value));

// only a caller-supplied estimate strictly between 0 and 1 can be compared with the bookmaker
const hasTrueProbability = (opportunity: Opportunity): boolean =>
  typeof opportunity.probability === 'number' &&
  opportunity.probability > 0 &&
  opportunity.probability < 1;

@Injectable()
export class ValueBettingService {
  private readonly logger: JsonLogger = LoggerFactory.createLogger(
    ValueBettingService.name,
  );

  /**
   * Compares a bet's own probability with the one implied by its odds. Edge and
   * expected value are percentages, probabilities stay in [0, 1].
   */
  analyze(bet: ResolvedOpportunity, criteria: ValueCriteria): ValueBet {
    const impliedProbability = 1 / bet.odds;
    const edge = bet.probability - impliedProbability;

    return {
      bet,
      decimalOdds: bet.odds,
      americanOdds: decimalToAmerican(bet.odds),
      impliedProbability,
      edge: edge * 100,
      expectedValue: (bet.odds * bet.probability - 1) * 100,
      fairOdds: decimalToAmerican(1 / bet.probability),
      confidence: bet.probability * (1 + edge),
      isValueBet: edge >= criteria.minEdge && bet.probability >= criteria.confidenceThreshold,
    };
  }

  findValueBets(opportunities: Opportunity[], options: ValueBetOptions = {}): ValueBet[] {
    const criteria: ValueCriteria = {
      minEdge: clampUnit(options.minEdge, VALUE_MIN_EDGE),
      confidenceThreshold: clampUnit(options.confidenceThreshold, VALUE_CONFIDENCE_THRESHOLD),
    };

    return resolveProbabilities(opportunities.filter(hasTrueProbability))
      .map((bet) => this.analyze(bet, criteria))
      .sort((a, b) => b.confidence - a.confidence)
      .filter((valueBet) => valueBet.isValueBet)
      .slice(0, options.maxBets ?? MAX_RESULTS);
  }

  /**
   * Best value bet by expected value, then the next best from sports not yet in
   * the parlay. Undefined when fewer than two legs can be found.
   */
  suggestParlay(valueBets: ValueBet[], maxLegs: number = VALUE_PARLAY_MAX_LEGS): ValueParlay | undefined {
    if (valueBets.length < 2 || maxLegs < 2) {
      return undefined;
    }

    const [best, ...rest] = [...valueBets].sort((a, b) => b.expectedValue - a.expectedValue);
    const legs: ValueBet[] = [best];
    for (const candidate of rest) {
      if (legs.length >= maxLegs) {
        break;
      }
      if (legs.every((leg) => leg.bet.sport !== candidate.bet.sport)) {
        legs.push(candidate);
      }
    }

    if (legs.length < 2) {
      return undefined;
    }

    let combinedProbability = 1;
    for (const leg of legs) {
      combinedProbability = combinedProbability * leg.bet.probability;
    }
    const decimalOdds = combinedOdds(legs.map((leg) => leg.bet));
    const expectedValue = (decimalOdds * combinedProbability - 1) * 100;

    return {
      bets: legs,
      legCount: legs.length,
      combinedProbability,
      decimalOdds,
      bookmakerOdds: decimalToAmerican(decimalOdds),
      fairOdds: decimalToAmerican(1 / combinedProbability),
      expectedValue,
      isValueParlay: expectedValue > 0,
    };
  }

  report(opportunities: Opportunity[], options: ValueBetOptions = {}): ValueBetReport {
    const valueBets = this.findValueBets(opportunities, options);
    const parlay = this.suggestParlay(valueBets, options.maxLegs);

    this.logger.info(
      'found ' + valueBets.length + ' value bets in ' + opportunities.length + ' opportunities',
    );

    return { valueBets, parlay };
  }
}
