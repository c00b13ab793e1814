type DateFormat = {
  pattern: RegExp;
  /** Capture group indexes for year, month, day. */
  order: [year: number, month: number, day: number];
  /** Time groups (hour, minute, second) when the format carries a time. */
  time?: [hour: number, minute: number, second: number];
};

// Tried in order; the first that yields a real calendar date wins.
const DATE_FORMATS: readonly DateFormat[] = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: [1, 2, 3] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: [3, 1, 2] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: [3, 2, 1] },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: [1, 2, 3] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: [3, 1, 2] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: [3, 2, 1] },
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
    order: [1, 2, 3],
    time: [4, 5, 6],
  },
  {
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})Z$/,
    order: [1, 2, 3],
    time: [4, 5, 6],
  },
];

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const group = (match: RegExpMatchArray, index: number): number =>
  Number(match[index] ?? NaN);

const matchFormat = (value: string, format: DateFormat): string | null => {
  const match = value.match(format.pattern);
  if (!match) return null;

  const [y, m, d] = format.order;
  const year = group(match, y);
  const month = group(match, m);
  const day = group(match, d);
  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  if (format.time) {
    const [h, min, s] = format.time;
    if (group(match, h) > 23 || group(match, min) > 59 || group(match, s) > 59) {
      return null;
    }
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
};

/**
 * Parses a user-supplied date into ISO `YYYY-MM-DD`.
 * Returns `null` for blank or unrecognised input.
 *
 * Ambiguous day/month input resolves month-first: `03/04/2025` is 4 March.
 */
export function parseFlexibleDate(input: string | null | undefined): string | null {
  const value = input?.trim();
  if (!value) return null;
  for (const format of DATE_FORMATS) {
    const iso = matchFormat(value, format);
    if (iso) return iso;
  }
  return null;
}

export const ACCEPTED_DATE_FORMATS = [
  'YYYY-MM-DD',
  'MM/DD/YYYY',
  'DD/MM/YYYY',
  'YYYY/MM/DD',
  'MM-DD-YYYY',
  'DD-MM-YYYY',
  'YYYY-MM-DDTHH:MM:SS',
  'YYYY-MM-DDTHH:MM:SSZ',
] as const;

/** `YYYY-MM-DD` of a timestamp, in UTC. */
export const isoDay = (date: Date): string => date.toISOString().slice(0, 10);
