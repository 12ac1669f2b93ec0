import type { MatchOutcome, CycleResult } from '../types/result.js';
import type { Scoreline } from '../types/match.js';
import { formatKickoff } from '../utils/date.js';

export function formatScoreline(s: Scoreline): string {
  return `${s.home}:${s.away}`;
}

export function describeOutcome(o: MatchOutcome): string {
  const fixture = `${o.match.homeTeam} vs ${o.match.awayTeam}`;
  const kickoff = formatKickoff(o.match.kickoff);

  switch (o.status) {
    case 'submitted':
      return `${fixture} tipped ${formatScoreline(o.tip.scoreline)} (${kickoff})`;
    case 'skipped-already-tipped':
      return o.currentTip
        ? `${fixture} already tipped ${formatScoreline(o.currentTip)}`
        : `${fixture} already tipped`;
    case 'skipped-ineligible':
      return o.reason === 'started' ? `${fixture} already started` : `${fixture} not due yet (${kickoff})`;
    case 'skipped-malformed':
      return `${fixture} skipped: ${o.message}`;
    case 'failed':
      return `${fixture} FAILED after ${o.attempts} attempt(s): ${o.error}`;
  }
}

export function summaryTitle(result: CycleResult): string {
  if (result.status === 'aborted') {
    return `Tipping cycle #${result.cycleId} aborted (${result.competition})`;
  }
  return `Tipping cycle #${result.cycleId}: ${result.counts.submitted} tip(s) submitted (${result.competition})`;
}

export function summaryCounts(result: CycleResult): string {
  const c = result.counts;
  return [
    `submitted ${c.submitted}`,
    `already tipped ${c['skipped-already-tipped']}`,
    `not eligible ${c['skipped-ineligible']}`,
    `malformed odds ${c['skipped-malformed']}`,
    `failed ${c.failed}`,
  ].join(', ');
}

/**
 * Plain-text summary. Matches that are simply not due yet are left out of the
 * detail lines; they show up in the counts.
 */
export function formatSummary(result: CycleResult): string {
  const lines = [summaryCounts(result)];
  if (result.error) lines.push(`Error: ${result.error}`);
  for (const o of result.outcomes) {
    if (o.status === 'skipped-ineligible' && o.reason === 'too-far') continue;
    lines.push(describeOutcome(o));
  }
  return lines.join('\n');
}

export interface OutcomePayload {
  matchId: string;
  homeTeam: string;
  awayTeam: string;
  kickoff: string;
  odds: { home: number; draw: number; away: number } | null;
  status: MatchOutcome['status'];
  tip: Scoreline | null;
  detail: string | null;
}

export interface CyclePayload {
  cycleId: number;
  competition: string;
  status: CycleResult['status'];
  startedAt: string;
  finishedAt: string;
  counts: CycleResult['counts'];
  error: string | null;
  matches: OutcomePayload[];
}

function outcomeDetail(o: MatchOutcome): string | null {
  switch (o.status) {
    case 'skipped-ineligible':
      return o.reason;
    case 'skipped-malformed':
      return o.message;
    case 'failed':
      return o.error;
    default:
      return null;
  }
}

function outcomeTip(o: MatchOutcome): Scoreline | null {
  if (o.status === 'submitted') return o.tip.scoreline;
  if (o.status === 'failed') return o.tip?.scoreline ?? null;
  if (o.status === 'skipped-already-tipped') return o.currentTip;
  return null;
}

/** JSON shape sent to webhooks. */
export function toPayload(result: CycleResult): CyclePayload {
  return {
    cycleId: result.cycleId,
    competition: result.competition,
    status: result.status,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    counts: result.counts,
    error: result.error,
    matches: result.outcomes.map((o) => ({
      matchId: o.match.id,
      homeTeam: o.match.homeTeam,
      awayTeam: o.match.awayTeam,
      kickoff: o.match.kickoff.toISOString(),
      odds: o.match.odds,
      status: o.status,
      tip: outcomeTip(o),
      detail: outcomeDetail(o),
    })),
  };
}
