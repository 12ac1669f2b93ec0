export type Outcome = 'home' | 'draw' | 'away';
export type TipStatus = 'open' | 'tipped';

/** Decimal bookmaker odds, one per 1X2 outcome. */
export interface OddsTriple {
  home: number;
  draw: number;
  away: number;
}

export interface Scoreline {
  home: number;
  away: number;
}

/** A match as read from the tipping page. Valid for one cycle only. */
export interface Match {
  /** Site-assigned identifier */
  id: string;
  competition: string;
  /** Kickoff in UTC */
  kickoff: Date;
  homeTeam: string;
  awayTeam: string;
  /** Null when the site shows no quotes for the match */
  odds: OddsTriple | null;
  tipStatus: TipStatus;
  /** Scoreline already entered on the site, if any */
  currentTip: Scoreline | null;
}
