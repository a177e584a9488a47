/**
 * Permissive date parser
 *
 * Accepts the date spellings commonly found in exported spreadsheets and
 * CSV files and returns a UTC instant. Results never depend on the local
 * timezone or on the current date; anything ambiguous beyond the rules
 * below is rejected.
 */

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12
};

const WEEKDAY_PREFIX = /^(mon|tue|tues|wed|thu|thur|thurs|fri|sat|sun)[a-z]*\.?,?\s+/i;

const YEAR_FIRST = /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(.*)$/;
const MONTH_FIRST = /^(\d{1,2})([/-])(\d{1,2})\2(\d{4}|\d{2})(.*)$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const NAMED_MONTH_FIRST = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(.*)$/i;
const NAMED_DAY_FIRST = /^(\d{1,2})(?:st|nd|rd|th)?[\s-]+([a-z]+)\.?,?[\s-]+(\d{4})(.*)$/i;
const NAMED_MONTH_YEAR = /^([a-z]+)\.?,?\s+(\d{4})$/i;

const TIME_SUFFIX =
  /^(?:T|\s+)(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(am|pm)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/** Two-digit years below this pivot belong to the 2000s */
const TWO_DIGIT_YEAR_PIVOT = 69;

interface DateParts {
  year: number;
  month: number;
  day: number;
}

interface TimeParts {
  hours: number;
  minutes: number;
  seconds: number;
  millis: number;
  offsetMinutes: number;
}

const MIDNIGHT: TimeParts = { hours: 0, minutes: 0, seconds: 0, millis: 0, offsetMinutes: 0 };

/**
 * Parses a date or date-time string.
 *
 * @param value - Raw cell text
 * @returns The instant in UTC, or null when the text is not a valid date
 *
 * @example
 * ```typescript
 * parseDate("2024-03-05");        // 2024-03-05T00:00:00.000Z
 * parseDate("3/5/2024 14:30");    // 2024-03-05T14:30:00.000Z
 * parseDate("31/12/2023");        // 2023-12-31T00:00:00.000Z (day first)
 * parseDate("Mar 5, 2024");       // 2024-03-05T00:00:00.000Z
 * parseDate("2024-02-30");        // null
 * ```
 */
export function parseDate(value: string): Date | null {
  const text = value.trim().replace(WEEKDAY_PREFIX, "");
  if (text === "") {
    return null;
  }

  let match = YEAR_FIRST.exec(text);
  if (match) {
    return build(
      { year: Number(match[1]), month: Number(match[3]), day: Number(match[4]) },
      match[5]
    );
  }

  match = MONTH_FIRST.exec(text);
  if (match) {
    let month = Number(match[1]);
    let day = Number(match[3]);
    // Day-first only when month-first cannot be right
    if (month > 12 && day <= 12) {
      [month, day] = [day, month];
    }
    return build({ year: expandYear(match[4]), month, day }, match[5]);
  }

  match = COMPACT.exec(text);
  if (match) {
    return build(
      { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) },
      ""
    );
  }

  match = NAMED_MONTH_FIRST.exec(text);
  if (match) {
    const month = monthFromName(match[1]);
    return month === null
      ? null
      : build({ year: Number(match[3]), month, day: Number(match[2]) }, match[4]);
  }

  match = NAMED_DAY_FIRST.exec(text);
  if (match) {
    const month = monthFromName(match[2]);
    return month === null
      ? null
      : build({ year: Number(match[3]), month, day: Number(match[1]) }, match[4]);
  }

  match = NAMED_MONTH_YEAR.exec(text);
  if (match) {
    const month = monthFromName(match[1]);
    return month === null ? null : build({ year: Number(match[2]), month, day: 1 }, "");
  }

  return null;
}

function expandYear(raw: string): number {
  if (raw.length === 4) {
    return Number(raw);
  }
  const short = Number(raw);
  return short < TWO_DIGIT_YEAR_PIVOT ? 2000 + short : 1900 + short;
}

function monthFromName(name: string): number | null {
  return MONTHS[name.toLowerCase()] ?? null;
}

function parseTime(rest: string): TimeParts | null {
  if (rest.trim() === "") {
    return MIDNIGHT;
  }

  const match = TIME_SUFFIX.exec(rest.trimEnd());
  if (!match) {
    return null;
  }

  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  const millis = match[4] ? Number(match[4].slice(0, 3).padEnd(3, "0")) : 0;
  const meridiem = match[5]?.toLowerCase();

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    if (meridiem === "am" && hours === 12) hours = 0;
    if (meridiem === "pm" && hours !== 12) hours += 12;
  }

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return { hours, minutes, seconds, millis, offsetMinutes: parseOffset(match[6]) };
}

function parseOffset(raw: string | undefined): number {
  if (!raw || raw.toUpperCase() === "Z") {
    return 0;
  }
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function build(parts: DateParts, rest: string): Date | null {
  const { year, month, day } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  const time = parseTime(rest);
  if (!time) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(time.hours, time.minutes, time.seconds, time.millis);

  // Reject overflow such as February 30th rolling into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return new Date(date.getTime() - time.offsetMinutes * 60_000);
}
