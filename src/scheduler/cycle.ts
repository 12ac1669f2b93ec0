import type { Logger } from 'pino';
import { CycleAbortedError, describeError } from '../errors.js';
import { filterEligible } from '../pipeline/eligibility.js';
import type { Credentials, SiteDriver } from '../types/driver.js';
import type { PredictionPolicy } from '../types/prediction.js';
import type { CycleResult, MatchOutcome, OutcomeStatus } from '../types/result.js';
import { coordinateSubmissions } from './coordinator.js';

export interface CycleDeps<S> {
  driver: SiteDriver<S>;
  credentials: Credentials;
  competition: string;
  leadTimeHours: number;
  overwriteTips: boolean;
  policy: PredictionPolicy;
  retry: { maxAttempts: number; baseDelayMs: number };
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function countOutcomes(outcomes: MatchOutcome[]): Record<OutcomeStatus, number> {
  const counts: Record<OutcomeStatus, number> = {
    submitted: 0,
    'skipped-already-tipped': 0,
    'skipped-ineligible': 0,
    'skipped-malformed': 0,
    failed: 0,
  };
  for (const o of outcomes) counts[o.status]++;
  return counts;
}

export function buildCycleResult(input: {
  cycleId: number;
  competition: string;
  startedAt: Date;
  finishedAt: Date;
  outcomes: MatchOutcome[];
  error?: unknown;
}): CycleResult {
  const aborted = input.error !== undefined;
  return {
    cycleId: input.cycleId,
    competition: input.competition,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    status: aborted ? 'aborted' : 'completed',
    outcomes: input.outcomes,
    counts: countOutcomes(input.outcomes),
    error: aborted ? describeError(input.error) : null,
  };
}

/**
 * One pass against the site: log in, read the match list, filter, tip.
 * Never throws; a failure anywhere turns into an aborted result that keeps
 * whatever outcomes were recorded before it.
 */
export async function runCycle<S>(cycleId: number, deps: CycleDeps<S>): Promise<CycleResult> {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger.child({ cycle: cycleId });
  const startedAt = now();
  const outcomes: MatchOutcome[] = [];
  let session: S | undefined;
  let failure: unknown;

  try {
    session = await deps.driver.authenticate(deps.credentials);
    log.debug('Authenticated');

    const matches = await deps.driver.listMatches(session, deps.competition);
    const { eligible, skipped } = filterEligible(matches, {
      now: now(),
      leadTimeHours: deps.leadTimeHours,
      overwriteTips: deps.overwriteTips,
    });
    outcomes.push(...skipped);
    log.info({ total: matches.length, eligible: eligible.length }, 'Match list filtered');

    const tipped = await coordinateSubmissions(session, eligible, {
      driver: deps.driver,
      competition: deps.competition,
      policy: deps.policy,
      retry: deps.retry,
      logger: log,
      sleep: deps.sleep,
    });
    outcomes.push(...tipped);
  } catch (err) {
    if (err instanceof CycleAbortedError) outcomes.push(...err.outcomes);
    failure = err;
    log.error({ err }, 'Cycle aborted');
  } finally {
    if (session !== undefined) {
      await deps.driver.closeSession(session).catch((err: unknown) => {
        log.warn({ err }, 'Failed to close site session');
      });
    }
  }

  const result = buildCycleResult({
    cycleId,
    competition: deps.competition,
    startedAt,
    finishedAt: now(),
    outcomes,
    error: failure,
  });
  log.info({ status: result.status, counts: result.counts }, 'Cycle finished');
  return result;
}
