import type { Outcome, Scoreline } from './match.js';

/** Margin-free outcome probabilities. Always sums to 1. */
export interface ProbabilityDistribution {
  home: number;
  draw: number;
  away: number;
}

export interface PredictionTier {
  name: string;
  /** Upper bound (exclusive) on the gap between the top two probabilities */
  maxMargin: number;
  scorelines: Record<Outcome, Scoreline>;
}

export interface PredictionPolicy {
  /** |p(home) - p(away)| below this predicts a draw */
  drawThreshold: number;
  /** Probabilities closer than this count as tied */
  tieEpsilon: number;
  /** Ordered by maxMargin; the last tier catches everything above */
  tiers: PredictionTier[];
}

export interface Prediction {
  outcome: Outcome;
  margin: number;
  tier: string;
  scoreline: Scoreline;
}

export interface Tip {
  matchId: string;
  scoreline: Scoreline;
  outcome: Outcome;
}
