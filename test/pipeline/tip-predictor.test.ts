import { describe, it, expect } from 'vitest';
import { normalizeOdds } from '../../src/pipeline/odds-normalizer.js';
import { DEFAULT_PREDICTION_POLICY, predictTip, winningMargin } from '../../src/pipeline/tip-predictor.js';
import type { PredictionPolicy } from '../../src/types/prediction.js';

describe('predictTip', () => {
  it('should call a clear home favourite a home win', () => {
    const prediction = predictTip(normalizeOdds({ home: 2.0, draw: 3.4, away: 4.0 }));

    expect(prediction.outcome).toBe('home');
    expect(prediction.tier).toBe('moderate');
    expect(prediction.scoreline).toEqual({ home: 2, away: 1 });
    expect(prediction.scoreline.home).toBeGreaterThan(prediction.scoreline.away);
  });

  it('should call near-equal odds a draw', () => {
    const prediction = predictTip(normalizeOdds({ home: 3.0, draw: 3.05, away: 3.1 }));

    expect(prediction.outcome).toBe('draw');
    expect(prediction.tier).toBe('narrow');
    expect(prediction.scoreline).toEqual({ home: 0, away: 0 });
  });

  it('should call a heavy away favourite a decisive away win', () => {
    const prediction = predictTip(normalizeOdds({ home: 6.0, draw: 4.5, away: 1.4 }));

    expect(prediction.outcome).toBe('away');
    expect(prediction.tier).toBe('decisive');
    expect(prediction.scoreline).toEqual({ home: 1, away: 3 });
  });

  it('should use the narrow tier for a small edge', () => {
    const prediction = predictTip({ home: 0.4, draw: 0.32, away: 0.28 });

    expect(prediction.outcome).toBe('home');
    expect(prediction.margin).toBeCloseTo(0.08, 12);
    expect(prediction.scoreline).toEqual({ home: 1, away: 0 });
  });

  it('should pick the draw when it is the most likely outcome', () => {
    const prediction = predictTip({ home: 0.32, draw: 0.45, away: 0.23 });

    expect(prediction.outcome).toBe('draw');
    expect(prediction.tier).toBe('moderate');
    expect(prediction.scoreline).toEqual({ home: 1, away: 1 });
  });

  it('should resolve a tie at the top to a draw', () => {
    const prediction = predictTip({ home: 0.4, draw: 0.4, away: 0.2 });

    expect(prediction.outcome).toBe('draw');
    expect(prediction.margin).toBe(0);
    expect(prediction.scoreline).toEqual({ home: 0, away: 0 });
  });

  it('should be deterministic', () => {
    const p = normalizeOdds({ home: 1.55, draw: 4.2, away: 5.8 });
    const first = predictTip(p);
    const second = predictTip(p);

    expect(second).toEqual(first);
  });

  it('should follow a custom policy', () => {
    const policy: PredictionPolicy = {
      drawThreshold: 0,
      tieEpsilon: 1e-9,
      tiers: [
        {
          name: 'bold',
          maxMargin: 1,
          scorelines: {
            home: { home: 4, away: 0 },
            draw: { home: 2, away: 2 },
            away: { home: 0, away: 4 },
          },
        },
      ],
    };

    const prediction = predictTip(normalizeOdds({ home: 3.0, draw: 3.05, away: 3.1 }), policy);
    expect(prediction.outcome).toBe('home');
    expect(prediction.tier).toBe('bold');
    expect(prediction.scoreline).toEqual({ home: 4, away: 0 });
  });

  it('should fall back to the last tier when the margin exceeds every bound', () => {
    const prediction = predictTip({ home: 1, draw: 0, away: 0 });

    expect(prediction.tier).toBe('decisive');
    expect(prediction.scoreline).toEqual({ home: 3, away: 1 });
  });

  it('should not hand out the default policy scorelines by reference', () => {
    const prediction = predictTip({ home: 0.4, draw: 0.32, away: 0.28 });
    prediction.scoreline.home = 9;

    expect(DEFAULT_PREDICTION_POLICY.tiers[0]?.scorelines.home).toEqual({ home: 1, away: 0 });
  });
});

describe('winningMargin', () => {
  it('should return the gap between the two most likely outcomes', () => {
    expect(winningMargin({ home: 0.2, draw: 0.3, away: 0.5 })).toBeCloseTo(0.2, 12);
  });
});
