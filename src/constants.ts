export const OPPORTUNITY_OPEN = 0
export const OPPORTUNITY_CLOSED = 1

export const PROBABILITY_BOOST = 2.5
export const PROBABILITY_CEILING = 0.9
export const MINIMUM_ODDS = 1.0

export const MAX_RESULTS = 5
export const RANDOM_ATTEMPTS = 10

export const TWO_LEG_WINDOW = 20
export const THREE_LEG_WINDOW = 15
export const FAVORITE_WINDOW = 15

export const TWO_LEG_CORRELATION = 0.05
export const THREE_LEG_CORRELATION = 0.02
export const FAVORITE_CORRELATION = 0.03

export const DEFAULT_POOL_LIMIT = 100
export const DEFAULT_FAVORITE_LEGS = 6

export const SINGLE_BET_THRESHOLDS = {minOdds: 2.0, minWinProb: 80.0} as const
export const TWO_LEG_THRESHOLDS = {minOdds: 4.0, minWinProb: 60.0} as const
export const THREE_LEG_THRESHOLDS = {minOdds: 5.0, minWinProb: 60.0} as const
export const FAVORITE_THRESHOLDS = {minOdds: 3.0, minWinProb: 53.0} as const

export const RANDOM_SOURCE = 'RANDOM_SOURCE'

export const VALUE_MIN_EDGE = 0.05
export const VALUE_CONFIDENCE_THRESHOLD = 0.6
export const VALUE_PARLAY_MAX_LEGS = 3
