// YYYY-MM-DD, optionally followed by THH:MM:SS[.fraction][Z|+HH:MM|-HH:MM]
const DATE_TIME_REGEX = /^(\d{4})-(\d{2})-(\d{2})(?:[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Parses a date-time literal. Date-only literals and literals without an
 * offset are read as UTC. Returns `undefined` for anything that is not a
 * valid calendar date and time.
 */
export function parseDateTimeLiteral(text: string): Date | undefined {
  const match = DATE_TIME_REGEX.exec(text);
  if (!match) {
    return undefined;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }

  if (match[4] === undefined) {
    return utcDate(year, month, day, 0, 0, 0, 0);
  }

  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  if (hour > 23 || minute > 59 || second > 60) {
    return undefined;
  }

  const millis = match[7] === undefined ? 0 : Number(match[7].padEnd(3, '0').slice(0, 3));
  let offsetMinutes = 0;
  const offset = match[8];
  if (offset !== undefined && offset.toUpperCase() !== 'Z') {
    const offsetHours = Number(offset.slice(1, 3));
    const offsetMins = Number(offset.slice(4, 6));
    if (offsetHours > 23 || offsetMins > 59) {
      return undefined;
    }
    const sign = offset.startsWith('-') ? -1 : 1;
    offsetMinutes = sign * (offsetHours * 60 + offsetMins);
  }

  const local = utcDate(year, month, day, hour, minute, Math.min(second, 59), millis);
  return new Date(local.getTime() - offsetMinutes * 60_000);
}

// Date.UTC maps years 0-99 onto 1900-1999, so the year is set separately
function utcDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millis: number
): Date {
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
  date.setUTCFullYear(year);
  return date;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
