/** Timezone the tipping site shows kickoff times in. */
export const SITE_TIME_ZONE = 'Europe/Berlin';

const KICKOFF_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})$/;

function zonedParts(date: Date, timeZone: string): Record<string, number> {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(date);

  const out: Record<string, number> = {};
  for (const part of parts) {
    if (part.type !== 'literal') out[part.type] = Number(part.value);
  }
  return out;
}

function offsetMs(utcMs: number, timeZone: string): number {
  const p = zonedParts(new Date(utcMs), timeZone);
  const asUtc = Date.UTC(p.year ?? 0, (p.month ?? 1) - 1, p.day ?? 1, p.hour ?? 0, p.minute ?? 0, p.second ?? 0);
  return asUtc - utcMs;
}

/** Converts a wall-clock time in `timeZone` to the matching UTC instant. */
export function zonedTimeToUtc(
  wall: { year: number; month: number; day: number; hour: number; minute: number },
  timeZone: string = SITE_TIME_ZONE,
): Date {
  const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
  const first = offsetMs(guess, timeZone);
  const second = offsetMs(guess - first, timeZone);
  return new Date(guess - (first === second ? first : second));
}

/** Parses "dd.mm.yy HH:MM" (site local time). Returns null when unparseable. */
export function parseKickoff(raw: string | null | undefined): Date | null {
  if (!raw) return null;
  const m = raw.trim().match(KICKOFF_PATTERN);
  if (!m) return null;

  const [, day, month, year, hour, minute] = m.map(Number);
  if (day === undefined || month === undefined || year === undefined || hour === undefined || minute === undefined) {
    return null;
  }
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) return null;

  return zonedTimeToUtc({
    year: year < 100 ? 2000 + year : year,
    month,
    day,
    hour,
    minute,
  });
}

const pad = (n: number | undefined) => String(n ?? 0).padStart(2, '0');

/** Renders an instant as "dd.mm.yy HH:MM" in site local time. */
export function formatKickoff(date: Date, timeZone: string = SITE_TIME_ZONE): string {
  const p = zonedParts(date, timeZone);
  return `${pad(p.day)}.${pad(p.month)}.${pad((p.year ?? 0) % 100)} ${pad(p.hour)}:${pad(p.minute)}`;
}
