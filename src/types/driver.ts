import type { Match, Scoreline } from './match.js';
import type { Tip } from './prediction.js';

export interface Credentials {
  email: string;
  password: string;
}

export interface TippedState {
  tipped: boolean;
  scoreline: Scoreline | null;
}

/**
 * Everything the cycle needs from the tipping site.
 * The session handle is passed explicitly into every call; implementations
 * keep no ambient login state.
 */
export interface SiteDriver<S = unknown> {
  /** @throws AuthenticationError */
  authenticate(credentials: Credentials): Promise<S>;

  /** @throws FetchError, TransientSiteError or AuthenticationError */
  listMatches(session: S, competition: string): Promise<Match[]>;

  /** @throws TransientSiteError, SubmitError or AuthenticationError */
  submitTip(session: S, competition: string, tip: Tip): Promise<void>;

  verifyTip(session: S, competition: string, matchId: string): Promise<TippedState>;

  closeSession(session: S): Promise<void>;
}
