import { describe, it, expect } from 'vitest';
import { AuthenticationError, FetchError } from '../../src/errors.js';
import { DEFAULT_PREDICTION_POLICY } from '../../src/pipeline/tip-predictor.js';
import { countOutcomes, runCycle, type CycleDeps } from '../../src/scheduler/cycle.js';
import { FakeDriver, type FakeSession, NOW, hoursFromNow, makeMatch, silentLogger } from '../helpers/fakes.js';

function deps(driver: FakeDriver): CycleDeps<FakeSession> {
  return {
    driver,
    credentials: { email: 'user@example.com', password: 'test-secret' },
    competition: 'test-league',
    leadTimeHours: 2,
    overwriteTips: false,
    policy: DEFAULT_PREDICTION_POLICY,
    retry: { maxAttempts: 3, baseDelayMs: 0 },
    logger: silentLogger,
    now: () => NOW,
    sleep: async () => {},
  };
}

describe('runCycle', () => {
  it('should tip eligible matches and report the rest', async () => {
    const driver = new FakeDriver();
    driver.matches = [
      makeMatch({ id: 'due' }),
      makeMatch({ id: 'later', kickoff: hoursFromNow(30) }),
      makeMatch({ id: 'done', tipStatus: 'tipped', currentTip: { home: 1, away: 1 } }),
    ];

    const result = await runCycle(7, deps(driver));

    expect(result.cycleId).toBe(7);
    expect(result.competition).toBe('test-league');
    expect(result.status).toBe('completed');
    expect(result.error).toBeNull();
    expect(result.startedAt).toEqual(NOW);
    expect(result.counts).toEqual({
      submitted: 1,
      'skipped-already-tipped': 1,
      'skipped-ineligible': 1,
      'skipped-malformed': 0,
      failed: 0,
    });
    expect(driver.closedSessions).toEqual([{ id: 1 }]);
  });

  it('should abort when login fails', async () => {
    const driver = new FakeDriver();
    driver.authErrors = [new AuthenticationError('Login rejected, still on the login page')];
    driver.matches = [makeMatch()];

    const result = await runCycle(1, deps(driver));

    expect(result.status).toBe('aborted');
    expect(result.error).toBe('Login rejected, still on the login page');
    expect(result.outcomes).toEqual([]);
    expect(driver.closedSessions).toEqual([]);
  });

  it('should abort when the match list cannot be read, closing the session', async () => {
    const driver = new FakeDriver();
    driver.listError = new FetchError('No tipping table found for competition "test-league"');

    const result = await runCycle(1, deps(driver));

    expect(result.status).toBe('aborted');
    expect(result.error).toBe('No tipping table found for competition "test-league"');
    expect(driver.closedSessions).toHaveLength(1);
  });

  it('should keep outcomes recorded before the session was lost and leave out the rest', async () => {
    const driver = new FakeDriver();
    driver.matches = [
      makeMatch({ id: 'far', kickoff: hoursFromNow(10) }),
      makeMatch({ id: 'a' }),
      makeMatch({ id: 'b' }),
      makeMatch({ id: 'c' }),
    ];
    driver.submitErrors.set('b', [new AuthenticationError('Session expired')]);

    const result = await runCycle(1, deps(driver));

    expect(result.status).toBe('aborted');
    expect(result.error).toBe('Session lost: Session expired');
    expect(result.outcomes.map((o) => [o.match.id, o.status])).toEqual([
      ['far', 'skipped-ineligible'],
      ['a', 'submitted'],
    ]);
    expect(result.counts.failed).toBe(0);
    expect(driver.closedSessions).toHaveLength(1);
  });
});

describe('countOutcomes', () => {
  it('should return zero for every status on an empty list', () => {
    expect(countOutcomes([])).toEqual({
      submitted: 0,
      'skipped-already-tipped': 0,
      'skipped-ineligible': 0,
      'skipped-malformed': 0,
      failed: 0,
    });
  });
});
