// src/core/normalizer/utils.ts

const WEEKDAYS = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const UTC_OFFSET = / [+-][0-9]{4} /g;
const TIMESTAMP_LAYOUT = /^([A-Za-z]+) ([A-Za-z]+) (\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2}) (\d{4})$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullish(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Recursively drops null, undefined, empty string, empty array and empty
 * object values from objects and arrays. 0 and false are kept.
 */
export function trimNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(trimNulls).filter((item) => !isNullish(item));
  }

  if (isPlainObject(value)) {
    const trimmed: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = trimNulls(item);
      if (!isNullish(result)) {
        trimmed[key] = result;
      }
    }
    return trimmed;
  }

  return value;
}

/**
 * True for the empty document returned for unconvertible records
 */
export function isEmpty(value: object | null | undefined): boolean {
  return !value || Object.keys(value).length === 0;
}

/**
 * Tag URI (RFC 4151) for a name within a domain, e.g. tag:twitter.com:alice
 */
export function tagUri(domain: string, name: string): string {
  return `tag:${domain}:${name}`;
}

// abbreviations only, any case
function matchName(names: string[], text: string): number {
  return names.indexOf(text.toLowerCase());
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Converts a Twitter timestamp to ISO 8601.
 *
 *   'Wed May 23 06:01:13 +0000 2007' -> '2007-05-23T06:01:13'
 *
 * The UTC offset is removed, not applied: the result is the wall-clock time
 * the API reported, with no zone suffix. Text that does not fit the layout
 * gives undefined.
 */
export function rfc2822ToIso8601(text: string | null | undefined): string | undefined {
  if (!text) {
    return undefined;
  }

  const match = TIMESTAMP_LAYOUT.exec(text.replace(UTC_OFFSET, ' '));
  if (!match) {
    return undefined;
  }

  const [, weekday, monthName, dayText, hourText, minuteText, secondText, yearText] = match;
  const month = matchName(MONTHS, monthName) + 1;
  if (matchName(WEEKDAYS, weekday) < 0 || month === 0) {
    return undefined;
  }

  const year = Number(yearText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (
    year < 1 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}
