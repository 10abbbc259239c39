const DAY_MS = 86_400_000;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

const parseUTC = (isoDate: string): Date => new Date(`${isoDate}T00:00:00Z`);

/** Normalizes a date-ish cell (ISO date, ISO timestamp or anything Date understands) to YYYY-MM-DD. */
export const toISODate = (value: string): string => {
  const trimmed = value.trim();
  if (/^\d{4}-\d{2}-\d{2}/.test(trimmed)) return trimmed.slice(0, 10);
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid date: ${value}`);
  }
  return formatISODate(new Date(Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate())));
};

export const daysBetween = (from: string, to: string): number =>
  Math.round((parseUTC(to).getTime() - parseUTC(from).getTime()) / DAY_MS);

export const addDays = (isoDate: string, days: number): string => {
  const d = parseUTC(isoDate);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

export const monthKey = (isoDate: string): string => isoDate.slice(0, 7);

export const isWeekday = (isoDate: string): boolean => {
  const day = parseUTC(isoDate).getUTCDay();
  return day !== 0 && day !== 6;
};

export const businessDays = (start: string, end: string): string[] => {
  const days: string[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    if (isWeekday(d)) days.push(d);
  }
  return days;
};

/** First weekday of the month `monthOffset` months after the month of `isoDate`. */
const businessMonthStart = (isoDate: string, monthOffset: number): string => {
  const base = parseUTC(isoDate);
  const first = new Date(Date.UTC(base.getUTCFullYear(), base.getUTCMonth() + monthOffset, 1));
  let day = formatISODate(first);
  while (!isWeekday(day)) day = addDays(day, 1);
  return day;
};

/**
 * Business-month-start dates every `every` months, anchored on the first one on or after
 * `start`, up to and including `end`.
 */
export const businessMonthStarts = (start: string, end: string, every: number): string[] => {
  if (every <= 0) return [];
  let anchorOffset = 0;
  if (businessMonthStart(start, 0) < start) anchorOffset = 1;
  const out: string[] = [];
  for (let offset = anchorOffset; ; offset += every) {
    const day = businessMonthStart(start, offset);
    if (day > end) break;
    out.push(day);
  }
  return out;
};

/** Third Friday of the month `monthOffset` months after the month of `isoDate`. */
export const thirdFriday = (isoDate: string, monthOffset = 0): string => {
  const base = parseUTC(isoDate);
  const first = new Date(Date.UTC(base.getUTCFullYear(), base.getUTCMonth() + monthOffset, 1));
  const toFriday = (5 - first.getUTCDay() + 7) % 7;
  first.setUTCDate(1 + toFriday + 14);
  return formatISODate(first);
};

export const makeRunId = (now = new Date()): string => `bt-${now.toISOString().slice(0, 19).replace(/:/g, '-')}`;
