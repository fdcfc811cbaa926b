const DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function toIso(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1) return undefined;
  const limit = month === 2 && !isLeapYear(year) ? 28 : DAYS_IN_MONTH[month - 1];
  if (day > limit) return undefined;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Normalizes the date spellings found across generator versions to `YYYY-MM-DD`:
 * `19420801`, `1942-08-01` (optionally followed by a time), `01/08/1942` and the
 * mission-file form `1.8.1942`. Returns undefined for anything else.
 */
export function normalizeCampaignDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const value = raw.trim();

  let match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (match) return toIso(Number(match[1]), Number(match[2]), Number(match[3]));

  match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/);
  if (match) return toIso(Number(match[1]), Number(match[2]), Number(match[3]));

  match = value.match(/^(\d{1,2})[/.](\d{1,2})[/.](\d{4})$/);
  if (match) return toIso(Number(match[3]), Number(match[2]), Number(match[1]));

  return undefined;
}

/** Compact `YYYYMMDD` key used when comparing dates embedded in file names. */
export function dateKey(raw: string | undefined): string | undefined {
  return normalizeCampaignDate(raw)?.replace(/-/g, '');
}

/** Finds a date embedded in a file name such as `Pilot 1942-08-01.mission`. */
export function dateKeyFromFileName(fileName: string): string | undefined {
  const match = fileName.match(/(\d{4})[-_.]?(\d{2})[-_.]?(\d{2})(?!\d)/);
  if (!match) return undefined;
  const iso = toIso(Number(match[1]), Number(match[2]), Number(match[3]));
  return iso?.replace(/-/g, '');
}

/**
 * Orders values chronologically. Undated entries sort after dated ones; callers rely
 * on Array#sort being stable to keep source order among equal dates.
 */
export function compareOptionalDates(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}

/** Whole years between two ISO dates, or undefined when either is missing. */
export function yearsBetween(fromIso: string | undefined, toIsoDate: string | undefined): number | undefined {
  if (!fromIso || !toIsoDate) return undefined;
  const [fy, fm, fd] = fromIso.split('-').map(Number);
  const [ty, tm, td] = toIsoDate.split('-').map(Number);
  let years = ty - fy;
  if (tm < fm || (tm === fm && td < fd)) years -= 1;
  return years >= 0 ? years : undefined;
}
