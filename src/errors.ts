import type { MatchOutcome } from './types/result.js';

export type ErrorCode =
  | 'CONFIGURATION'
  | 'AUTHENTICATION'
  | 'FETCH'
  | 'MALFORMED_ODDS'
  | 'TRANSIENT_SITE'
  | 'SUBMIT'
  | 'VERIFICATION'
  | 'CYCLE_ABORTED';

export abstract class TipBotError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings. Fatal at startup. */
export class ConfigurationError extends TipBotError {
  readonly code = 'CONFIGURATION';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/** The site rejected the login or the session expired. Aborts the cycle. */
export class AuthenticationError extends TipBotError {
  readonly code = 'AUTHENTICATION';
}

/** The match list could not be read. Aborts the cycle. */
export class FetchError extends TipBotError {
  readonly code = 'FETCH';
}

export class MalformedOddsError extends TipBotError {
  readonly code = 'MALFORMED_ODDS';
}

/** Timeouts, dropped connections, stale pages. Worth another attempt. */
export class TransientSiteError extends TipBotError {
  readonly code = 'TRANSIENT_SITE';
}

/** The site refused the tip outright. Not retried. */
export class SubmitError extends TipBotError {
  readonly code = 'SUBMIT';
}

export class VerificationError extends TipBotError {
  readonly code = 'VERIFICATION';
}

/** Raised by the coordinator when the rest of the cycle cannot proceed. */
export class CycleAbortedError extends TipBotError {
  readonly code = 'CYCLE_ABORTED';

  constructor(
    message: string,
    readonly outcomes: MatchOutcome[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
