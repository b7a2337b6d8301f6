/**
 * Parse an image caption into (spot, date) by naive whitespace splitting:
 * first token = spot, second token = date. Everything after is ignored.
 *
 * Accepted date tokens: YYYY-MM-DD, DD.MM.YYYY, DD.MM (current year),
 * today/tomorrow (сегодня/завтра). Missing or unreadable => today at the spot.
 */

export type ParsedCaption = {
  spotToken: string | null;
  dateToken: string | null;
};

export function parseCaption(caption: string | null | undefined): ParsedCaption {
  const tokens = (caption ?? "").trim().split(/\s+/).filter(Boolean);
  return {
    spotToken: tokens[0] ?? null,
    dateToken: tokens[1] ?? null,
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function toIsoDate(year: number, month: number, day: number): string | null {
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  // Rejects 31.02 and friends
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/** Calendar day at the spot for `now` */
export function localIsoDate(now: Date, utcOffsetMinutes: number): string {
  return new Date(now.getTime() + utcOffsetMinutes * 60_000).toISOString().slice(0, 10);
}

function addDays(isoDate: string, days: number): string {
  const ms = Date.parse(`${isoDate}T00:00:00Z`) + days * 24 * 3600 * 1000;
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Resolve a caption date token to "YYYY-MM-DD".
 */
export function resolveForecastDate(
  dateToken: string | null,
  now: Date = new Date(),
  utcOffsetMinutes = 0
): string {
  const today = localIsoDate(now, utcOffsetMinutes);
  if (!dateToken) return today;

  const token = dateToken.trim().toLowerCase();
  if (token === "today" || token === "сегодня") return today;
  if (token === "tomorrow" || token === "завтра") return addDays(today, 1);

  const iso = token.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3])) ?? today;
  }

  const dotted = token.match(/^(\d{1,2})[./](\d{1,2})(?:[./](\d{4}))?$/);
  if (dotted) {
    const year = dotted[3] ? Number(dotted[3]) : Number(today.slice(0, 4));
    return toIsoDate(year, Number(dotted[2]), Number(dotted[1])) ?? today;
  }

  return today;
}
