const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar date (YYYY-MM-DD) of `now` as seen from `timeZone`. */
export function todayIn(timeZone: string, now: Date = new Date()): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

function formatDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  return isValidDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  const [fy, fm, fd] = from.split("-").map(Number);
  const [ty, tm, td] = to.split("-").map(Number);
  return Math.round((Date.UTC(ty, tm - 1, td) - Date.UTC(fy, fm - 1, fd)) / DAY_MS);
}

const FULL_DATE = /(\d{4})\s*[-./년]\s*(\d{1,2})\s*[-./월]\s*(\d{1,2})/;
const MONTH_DAY = /(\d{1,2})\s*(?:[./]|월)\s*(\d{1,2})/;

/**
 * Resolves a date written on a menu page to YYYY-MM-DD. Month/day-only dates take the
 * year that puts them closest to `referenceDate`, so a January menu read in late
 * December lands in the next year. Returns null when nothing resolvable is found.
 */
export function resolveServingDate(text: string, referenceDate: string): string | null {
  const full = FULL_DATE.exec(text);
  if (full) {
    const [year, month, day] = [Number(full[1]), Number(full[2]), Number(full[3])];
    return isValidDate(year, month, day) ? formatDate(year, month, day) : null;
  }

  const partial = MONTH_DAY.exec(text);
  if (!partial) return null;

  const [month, day] = [Number(partial[1]), Number(partial[2])];
  const referenceYear = Number(referenceDate.slice(0, 4));
  let best: string | null = null;
  for (const year of [referenceYear - 1, referenceYear, referenceYear + 1]) {
    if (!isValidDate(year, month, day)) continue;
    const candidate = formatDate(year, month, day);
    if (best === null || Math.abs(daysBetween(referenceDate, candidate)) < Math.abs(daysBetween(referenceDate, best))) {
      best = candidate;
    }
  }
  return best;
}
