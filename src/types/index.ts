export type { Outcome, TipStatus, OddsTriple, Scoreline, Match } from './match.js';
export type {
  ProbabilityDistribution,
  PredictionTier,
  PredictionPolicy,
  Prediction,
  Tip,
} from './prediction.js';
export type {
  IneligibleReason,
  OutcomeStatus,
  SubmittedOutcome,
  AlreadyTippedOutcome,
  IneligibleOutcome,
  MalformedOutcome,
  FailedOutcome,
  MatchOutcome,
  SkippedOutcome,
  CycleStatus,
  CycleResult,
} from './result.js';
export type { Credentials, TippedState, SiteDriver } from './driver.js';
export type { Notifier, NotificationChannel } from './notifier.js';
