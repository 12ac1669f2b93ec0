import type { Match, Scoreline } from './match.js';
import type { Tip } from './prediction.js';

export type IneligibleReason = 'too-far' | 'started';

export type OutcomeStatus =
  | 'submitted'
  | 'skipped-already-tipped'
  | 'skipped-ineligible'
  | 'skipped-malformed'
  | 'failed';

interface OutcomeBase {
  match: Match;
}

export interface SubmittedOutcome extends OutcomeBase {
  status: 'submitted';
  tip: Tip;
  attempts: number;
}

export interface AlreadyTippedOutcome extends OutcomeBase {
  status: 'skipped-already-tipped';
  currentTip: Scoreline | null;
}

export interface IneligibleOutcome extends OutcomeBase {
  status: 'skipped-ineligible';
  reason: IneligibleReason;
}

export interface MalformedOutcome extends OutcomeBase {
  status: 'skipped-malformed';
  message: string;
}

export interface FailedOutcome extends OutcomeBase {
  status: 'failed';
  error: string;
  attempts: number;
  tip: Tip | null;
}

export type MatchOutcome =
  | SubmittedOutcome
  | AlreadyTippedOutcome
  | IneligibleOutcome
  | MalformedOutcome
  | FailedOutcome;

export type SkippedOutcome = AlreadyTippedOutcome | IneligibleOutcome;

export type CycleStatus = 'completed' | 'aborted';

/** Everything one pass produced. Consumed by notifiers and logs, never stored. */
export interface CycleResult {
  cycleId: number;
  competition: string;
  startedAt: Date;
  finishedAt: Date;
  status: CycleStatus;
  outcomes: MatchOutcome[];
  counts: Record<OutcomeStatus, number>;
  /** Set when the cycle was aborted */
  error: string | null;
}
