import type { Outcome } from '../types/match.js';
import type { Prediction, PredictionPolicy, ProbabilityDistribution } from '../types/prediction.js';

export const DEFAULT_PREDICTION_POLICY: PredictionPolicy = {
  drawThreshold: 0.05,
  tieEpsilon: 1e-9,
  tiers: [
    {
      name: 'narrow',
      maxMargin: 0.1,
      scorelines: { home: { home: 1, away: 0 }, draw: { home: 0, away: 0 }, away: { home: 0, away: 1 } },
    },
    {
      name: 'moderate',
      maxMargin: 0.3,
      scorelines: { home: { home: 2, away: 1 }, draw: { home: 1, away: 1 }, away: { home: 1, away: 2 } },
    },
    {
      name: 'decisive',
      maxMargin: 1,
      scorelines: { home: { home: 3, away: 1 }, draw: { home: 1, away: 1 }, away: { home: 1, away: 3 } },
    },
  ],
};

function selectOutcome(p: ProbabilityDistribution, policy: PredictionPolicy): Outcome {
  // Evenly matched sides are called a draw even if one edges the other
  if (Math.abs(p.home - p.away) < policy.drawThreshold) return 'draw';

  const top = Math.max(p.home, p.draw, p.away);
  const leaders = (['home', 'draw', 'away'] as const).filter(
    (o) => top - p[o] <= policy.tieEpsilon,
  );
  if (leaders.length > 1) return 'draw';
  return leaders[0] ?? 'draw';
}

/** Gap between the highest and second-highest probability. */
export function winningMargin(p: ProbabilityDistribution): number {
  const [first = 0, second = 0] = [p.home, p.draw, p.away].sort((a, b) => b - a);
  return first - second;
}

/**
 * Maps a distribution to a scoreline. Pure: the same distribution and policy
 * always give the same prediction.
 */
export function predictTip(
  p: ProbabilityDistribution,
  policy: PredictionPolicy = DEFAULT_PREDICTION_POLICY,
): Prediction {
  const outcome = selectOutcome(p, policy);
  const margin = winningMargin(p);

  const tier =
    policy.tiers.find((t) => margin < t.maxMargin) ?? policy.tiers[policy.tiers.length - 1];
  if (!tier) {
    throw new Error('Prediction policy has no tiers');
  }

  const { home, away } = tier.scorelines[outcome];
  return { outcome, margin, tier: tier.name, scoreline: { home, away } };
}
