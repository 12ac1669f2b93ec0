import { describeError } from '../errors.js';
import type { NotificationChannel } from '../types/notifier.js';
import type { CycleResult, SubmittedOutcome } from '../types/result.js';
import { post } from './http.js';

function formFields(o: SubmittedOutcome): URLSearchParams {
  const { match, tip } = o;
  return new URLSearchParams({
    date: match.kickoff.toISOString(),
    team1: match.homeTeam,
    team2: match.awayTeam,
    quoteteam1: match.odds ? String(match.odds.home) : '',
    quotedraw: match.odds ? String(match.odds.draw) : '',
    quoteteam2: match.odds ? String(match.odds.away) : '',
    tipteam1: String(tip.scoreline.home),
    tipteam2: String(tip.scoreline.away),
  });
}

/**
 * One form-encoded post per submitted tip, for Zapier catch hooks.
 * Every tip is posted even when an earlier one fails; the failures are
 * reported together afterwards.
 */
export class ZapierChannel implements NotificationChannel {
  readonly name = 'zapier';

  constructor(private readonly url: string) {}

  async send(result: CycleResult): Promise<void> {
    const submitted = result.outcomes.filter((o): o is SubmittedOutcome => o.status === 'submitted');
    const failures: string[] = [];

    for (const outcome of submitted) {
      try {
        await post(this.url, {
          label: this.name,
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: formFields(outcome).toString(),
        });
      } catch (err) {
        failures.push(`${outcome.match.homeTeam} vs ${outcome.match.awayTeam}: ${describeError(err)}`);
      }
    }

    if (failures.length) {
      throw new Error(`${this.name}: ${failures.length} of ${submitted.length} tip posts failed (${failures.join('; ')})`);
    }
  }
}
