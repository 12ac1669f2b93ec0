import type { Logger } from 'pino';
import {
  AuthenticationError,
  CycleAbortedError,
  MalformedOddsError,
  TransientSiteError,
  VerificationError,
  describeError,
} from '../errors.js';
import { impliedOverround, normalizeOdds } from '../pipeline/odds-normalizer.js';
import { predictTip } from '../pipeline/tip-predictor.js';
import type { SiteDriver } from '../types/driver.js';
import type { Match, Scoreline } from '../types/match.js';
import type { PredictionPolicy, Tip } from '../types/prediction.js';
import type { MalformedOutcome, MatchOutcome } from '../types/result.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';

export interface CoordinatorDeps<S> {
  driver: SiteDriver<S>;
  competition: string;
  policy: PredictionPolicy;
  retry: { maxAttempts: number; baseDelayMs: number };
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function sameScoreline(a: Scoreline | null, b: Scoreline): boolean {
  return a !== null && a.home === b.home && a.away === b.away;
}

async function submitAndVerify<S>(session: S, tip: Tip, deps: CoordinatorDeps<S>): Promise<void> {
  await deps.driver.submitTip(session, deps.competition, tip);

  const state = await deps.driver.verifyTip(session, deps.competition, tip.matchId);
  if (!state.tipped || !sameScoreline(state.scoreline, tip.scoreline)) {
    const seen = state.scoreline ? `${state.scoreline.home}:${state.scoreline.away}` : 'nothing';
    throw new VerificationError(
      `Site shows ${seen} after submitting ${tip.scoreline.home}:${tip.scoreline.away}`,
    );
  }
}

function buildTip(match: Match, policy: PredictionPolicy, log: Logger): Tip | MalformedOutcome {
  try {
    const distribution = normalizeOdds(match.odds);
    const prediction = predictTip(distribution, policy);
    const overround = match.odds ? impliedOverround(match.odds) : null;
    log.debug({ odds: match.odds, overround, distribution, prediction }, 'Prediction computed');
    return { matchId: match.id, scoreline: prediction.scoreline, outcome: prediction.outcome };
  } catch (err) {
    if (err instanceof MalformedOddsError) {
      log.warn({ odds: match.odds }, `Skipping match with malformed odds: ${err.message}`);
      return { status: 'skipped-malformed', message: err.message, match };
    }
    throw err;
  }
}

async function processMatch<S>(session: S, match: Match, deps: CoordinatorDeps<S>): Promise<MatchOutcome> {
  const log = deps.logger.child({ match: match.id, fixture: `${match.homeTeam} vs ${match.awayTeam}` });

  const built = buildTip(match, deps.policy, log);
  if ('status' in built) return built;
  const tip = built;

  // Non-retryable errors escape withRetry without an attempt count
  let lastAttempt = 0;
  let attempts = 0;
  try {
    ({ attempts } = await withRetry(
      async (attempt) => {
        lastAttempt = attempt;
        await submitAndVerify(session, tip, deps);
      },
      {
        attempts: deps.retry.maxAttempts,
        backoff: { type: 'exponential', delay: deps.retry.baseDelayMs },
        retryable: (err) => err instanceof TransientSiteError,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ attempt, delayMs, err: describeError(err) }, 'Transient submission failure, retrying'),
        sleep: deps.sleep,
      },
    ));
  } catch (err) {
    if (err instanceof AuthenticationError) throw err;

    const cause = err instanceof RetryExhaustedError ? err.lastError : err;
    const made = err instanceof RetryExhaustedError ? err.attempts : lastAttempt;
    log.error({ attempts: made, err: describeError(cause) }, 'Tip submission failed');
    return { status: 'failed', error: describeError(cause), attempts: made, tip, match };
  }

  log.info({ tip: `${tip.scoreline.home}:${tip.scoreline.away}`, attempts }, 'Tip submitted and verified');
  return { status: 'submitted', tip, attempts, match };
}

/**
 * Tips each eligible match in turn. Per-match failures become outcomes;
 * only a lost session escapes, as a CycleAbortedError holding the outcomes
 * recorded before it. Matches after that point are left out entirely.
 */
export async function coordinateSubmissions<S>(
  session: S,
  matches: Match[],
  deps: CoordinatorDeps<S>,
): Promise<MatchOutcome[]> {
  const outcomes: MatchOutcome[] = [];

  for (const match of matches) {
    try {
      outcomes.push(await processMatch(session, match, deps));
    } catch (err) {
      if (err instanceof AuthenticationError) {
        throw new CycleAbortedError(`Session lost: ${err.message}`, outcomes, { cause: err });
      }
      deps.logger.error({ match: match.id, err }, 'Unexpected error while tipping match');
      outcomes.push({ status: 'failed', error: describeError(err), attempts: 0, tip: null, match });
    }
  }

  return outcomes;
}
