import { MalformedOddsError } from '../errors.js';
import type { OddsTriple } from '../types/match.js';
import type { ProbabilityDistribution } from '../types/prediction.js';

const OUTCOMES = ['home', 'draw', 'away'] as const;

function assertValidOdds(odds: OddsTriple | null): asserts odds is OddsTriple {
  if (!odds) {
    throw new MalformedOddsError('No odds available');
  }
  for (const outcome of OUTCOMES) {
    const value = odds[outcome];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 1) {
      throw new MalformedOddsError(`Invalid ${outcome} odds: ${String(value)}`);
    }
  }
}

/** Sum of implied probabilities minus one, i.e. the bookmaker margin. */
export function impliedOverround(odds: OddsTriple): number {
  return 1 / odds.home + 1 / odds.draw + 1 / odds.away - 1;
}

/**
 * Converts decimal odds into a margin-free distribution.
 * Each implied probability (1 / odds) is divided by their sum.
 * @throws MalformedOddsError when a value is missing, non-numeric or <= 1.0
 */
export function normalizeOdds(odds: OddsTriple | null): ProbabilityDistribution {
  assertValidOdds(odds);

  const home = 1 / odds.home;
  const draw = 1 / odds.draw;
  const away = 1 / odds.away;
  const total = home + draw + away;

  return {
    home: home / total,
    draw: draw / total,
    away: away / total,
  };
}
