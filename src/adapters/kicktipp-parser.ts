import * as cheerio from 'cheerio';
import type { Match, OddsTriple, Scoreline } from '../types/match.js';
import { parseKickoff } from '../utils/date.js';

export interface ParsedTippingPage {
  /** False when #tippabgabeSpiele is missing, e.g. a layout change or error page */
  tableFound: boolean;
  matches: Match[];
}

const MATCH_ID_PATTERN = /\[(\d+)\]/;

/**
 * Parses the "Quote: 2.00 / 3.40 / 4.00" text next to a match.
 * Values that are not numbers come back as NaN so the odds normalizer can
 * reject them; a missing or wrongly shaped quote gives null.
 */
export function parseQuotes(text: string | undefined): OddsTriple | null {
  if (!text) return null;
  const cleaned = text.replace(/^\s*Quote:?/i, '').trim();
  if (!cleaned) return null;

  const parts = cleaned.includes('/') ? cleaned.split('/') : cleaned.split('|');
  if (parts.length !== 3) return null;

  const [home, draw, away] = parts.map((p) => {
    const value = p.trim().replace(',', '.');
    return /^\d+(\.\d+)?$/.test(value) ? parseFloat(value) : NaN;
  });
  if (home === undefined || draw === undefined || away === undefined) return null;
  return { home, draw, away };
}

export function parseMatchId(inputName: string | undefined): string | null {
  const m = inputName?.match(MATCH_ID_PATTERN);
  return m?.[1] ?? null;
}

function parseGoals(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? '';
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Reads the tipping form.
 *
 * Rows come in two kinds: `rowheader` rows carry the kickoff for the group
 * below them, `datarow` rows carry one match. A datarow whose time cell is
 * hidden or empty inherits the last kickoff seen. Rows without tip inputs
 * are already closed and are left out.
 */
export function parseTippingPage(html: string, competition: string): ParsedTippingPage {
  const $ = cheerio.load(html);
  const table = $('#tippabgabeSpiele');
  if (!table.length) return { tableFound: false, matches: [] };

  const matches: Match[] = [];
  let lastKickoff: Date | null = null;

  table.find('tbody > tr').each((_i, el) => {
    const row = $(el);

    if (row.hasClass('rowheader')) {
      row.children('td').each((_j, cell) => {
        const kickoff = parseKickoff($(cell).text());
        if (kickoff) {
          lastKickoff = kickoff;
          return false;
        }
        return undefined;
      });
      return;
    }

    if (!row.hasClass('datarow')) return;

    const cells = row.children('td');
    const timeCell = cells.eq(0);
    if (!timeCell.hasClass('hide')) {
      const visible = parseKickoff(timeCell.text());
      if (visible) lastKickoff = visible;
    }

    const homeInput = row.find('input[name*="heimTipp"]').first();
    const awayInput = row.find('input[name*="gastTipp"]').first();
    if (!homeInput.length || !awayInput.length) return;

    const id = parseMatchId(homeInput.attr('name'));
    const homeTeam = cells.eq(1).text().trim();
    const awayTeam = cells.eq(2).text().trim();
    const kickoff: Date | null = lastKickoff;
    if (!id || !homeTeam || !awayTeam || !kickoff) return;

    const homeGoals = parseGoals(homeInput.attr('value'));
    const awayGoals = parseGoals(awayInput.attr('value'));
    const currentTip: Scoreline | null =
      homeGoals !== null && awayGoals !== null ? { home: homeGoals, away: awayGoals } : null;

    matches.push({
      id,
      competition,
      kickoff,
      homeTeam,
      awayTeam,
      odds: parseQuotes(row.find('a.quote-link').first().text()),
      tipStatus: currentTip ? 'tipped' : 'open',
      currentTip,
    });
  });

  return { tableFound: true, matches };
}
