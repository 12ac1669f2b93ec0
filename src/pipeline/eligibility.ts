import type { Match } from '../types/match.js';
import type { SkippedOutcome } from '../types/result.js';

export interface EligibilityOptions {
  now: Date;
  leadTimeHours: number;
  /** Keep already tipped matches eligible so their tip is replaced */
  overwriteTips?: boolean;
}

export interface EligibilityResult {
  eligible: Match[];
  skipped: SkippedOutcome[];
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Splits the fetched match list into matches to tip now and matches skipped
 * with a reason. Nothing is dropped silently.
 */
export function filterEligible(matches: Match[], options: EligibilityOptions): EligibilityResult {
  const nowMs = options.now.getTime();
  const windowMs = options.leadTimeHours * HOUR_MS;
  const eligible: Match[] = [];
  const skipped: SkippedOutcome[] = [];

  for (const match of matches) {
    const untilKickoff = match.kickoff.getTime() - nowMs;

    if (untilKickoff <= 0) {
      skipped.push({ status: 'skipped-ineligible', reason: 'started', match });
    } else if (match.tipStatus === 'tipped' && !options.overwriteTips) {
      skipped.push({ status: 'skipped-already-tipped', currentTip: match.currentTip, match });
    } else if (untilKickoff > windowMs) {
      skipped.push({ status: 'skipped-ineligible', reason: 'too-far', match });
    } else {
      eligible.push(match);
    }
  }

  return { eligible, skipped };
}
