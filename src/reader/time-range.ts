/**
 * Parsing of the --from specification into a resume point
 */

import { formatRFC3339, isValid, parse, subHours, subMinutes, subSeconds } from 'date-fns';
import { ConfigurationError } from '../errors';
import { TimeRange } from '../types';

const TAIL = 'tail';
const RELATIVE_PATTERN = /^(\d+)([smhd])$/;
const ABSOLUTE_PATTERN = /^\d{4}(-\d{2}){2}T(\d{2}:){2}\d{2}$/;
const ABSOLUTE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Resolves a "from" value into a time range.
 *
 * Accepted forms:
 * - `tail`: live entries only
 * - `<n>s`, `<n>m`, `<n>h`, `<n>d`: relative to `now` (a day is 24 hours)
 * - `YYYY-MM-DDTHH:MM:SS`: local time
 *
 * Timestamps are rendered as local-time RFC3339.
 *
 * @throws ConfigurationError for anything else
 */
export function parseFrom(input: string, now: Date = new Date()): TimeRange {
  const value = input.trim();

  if (value === TAIL) {
    return { mode: 'tail' };
  }

  const relative = RELATIVE_PATTERN.exec(value);
  if (relative) {
    const amount = Number.parseInt(relative[1], 10);
    const start = subtractUnit(now, amount, relative[2]);
    if (!isValid(start)) {
      throw new ConfigurationError(`Invalid parameter for 'from' flag - out of range: ${value}`);
    }
    return { mode: 'from', watermark: formatRFC3339(start) };
  }

  if (ABSOLUTE_PATTERN.test(value)) {
    const start = parse(value, ABSOLUTE_FORMAT, now);
    if (!isValid(start)) {
      throw new ConfigurationError(`Invalid parameter for 'from' flag - bad format: ${value}`);
    }
    return { mode: 'from', watermark: formatRFC3339(start) };
  }

  throw new ConfigurationError(`Invalid parameter for 'from' flag: ${value}`);
}

function subtractUnit(now: Date, amount: number, unit: string): Date {
  switch (unit) {
    case 's':
      return subSeconds(now, amount);
    case 'm':
      return subMinutes(now, amount);
    case 'h':
      return subHours(now, amount);
    default:
      return subHours(now, amount * 24);
  }
}
