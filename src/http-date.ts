import { getHeader } from './classify.js';
import type { HeaderSource } from './classify.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const DAY = '(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)';
const DAY_NAME = '(?:Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday)';
const MONTH = `(${MONTHS.join('|')})`;
const TIME = '(\\d{2}):(\\d{2}):(\\d{2})';

// Sun, 06 Nov 1994 08:49:37 GMT
const RFC1123 = new RegExp(`^${DAY}, (\\d{2}) ${MONTH} (\\d{4}) ${TIME} GMT$`);
// Sunday, 06-Nov-94 08:49:37 GMT
const RFC850 = new RegExp(`^${DAY_NAME}, (\\d{2})-${MONTH}-(\\d{2}) ${TIME} GMT$`);
// Sun Nov  6 08:49:37 1994
const ASCTIME = new RegExp(`^${DAY} ${MONTH} +(\\d{1,2}) ${TIME} (\\d{4})$`);

interface DateFields {
  year: number;
  month: string;
  day: string;
  hours: string;
  minutes: string;
  seconds: string;
}

function toDate({ year, month, day, hours, minutes, seconds }: DateFields): Date | undefined {
  const monthIndex = MONTHS.indexOf(month);
  const fields = [year, monthIndex, Number(day), Number(hours), Number(minutes), Number(seconds)];
  const date = new Date(Date.UTC(year, monthIndex, fields[2], fields[3], fields[4], fields[5]));
  // Date.UTC rolls over out-of-range fields, e.g. 31 Feb
  const actual = [
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ];
  return actual.every((value, i) => value === fields[i]) ? date : undefined;
}

/**
 * Resolves a two-digit RFC 850 year to the century that puts it no more than
 * 50 years in the future of `now`
 */
function expandTwoDigitYear(twoDigitYear: number, now: Date): number {
  const start = now.getUTCFullYear() - 49;
  const year = Math.floor(start / 100) * 100 + twoDigitYear;
  return year < start ? year + 100 : year;
}

/**
 * Parses an HTTP-date header value, as used by Date, Last-Modified, Expires
 * and Retry-After.
 *
 * Accepts the IMF-fixdate form along with the obsolete RFC 850 and asctime
 * forms. Month and weekday names are case-sensitive and the weekday is not
 * checked against the date.
 *
 * @param value - The raw header value
 * @param now - Reference time for two-digit RFC 850 years
 * @returns The date, or undefined if the value is not an HTTP-date
 */
export function parseHttpDate(value: string, now: Date = new Date()): Date | undefined {
  const text = value.trim();

  let match = RFC1123.exec(text);
  if (match) {
    const [, day, month, year, hours, minutes, seconds] = match;
    return toDate({ year: Number(year), month, day, hours, minutes, seconds });
  }

  match = RFC850.exec(text);
  if (match) {
    const [, day, month, year, hours, minutes, seconds] = match;
    return toDate({
      year: expandTwoDigitYear(Number(year), now),
      month,
      day,
      hours,
      minutes,
      seconds,
    });
  }

  match = ASCTIME.exec(text);
  if (match) {
    const [, month, day, hours, minutes, seconds, year] = match;
    return toDate({ year: Number(year), month, day, hours, minutes, seconds });
  }

  return undefined;
}

/**
 * Reads a header holding an HTTP-date
 * @param headers - Response headers
 * @param name - Header name, "Date" by default
 * @returns The date, or undefined if the header is missing or malformed
 */
export function getDateHeader(
  headers: HeaderSource,
  name: string = 'date',
  now?: Date
): Date | undefined {
  const value = getHeader(headers, name);
  return value === undefined ? undefined : parseHttpDate(value, now);
}
