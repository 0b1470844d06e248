export const DAY_MS = 24 * 60 * 60 * 1000;

interface ZonedParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
  };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds (east positive).
 */
export function utcOffsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const wallClock = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return wallClock - (date.getTime() - date.getUTCMilliseconds());
}

/**
 * Wall-clock reading of an instant in the zone, carried in the UTC fields of the result.
 */
export function toWallClock(date: Date, timeZone: string): Date {
  return new Date(date.getTime() + utcOffsetMs(date, timeZone));
}

/**
 * The instant at which the zone's clocks show the wall-clock time held in the UTC fields
 * of `wallClock`.
 */
export function fromWallClock(wallClock: Date, timeZone: string): Date {
  const guess = wallClock.getTime();
  const firstOffset = utcOffsetMs(new Date(guess), timeZone);
  let instant = guess - firstOffset;
  const secondOffset = utcOffsetMs(new Date(instant), timeZone);
  if (secondOffset !== firstOffset) {
    instant = guess - secondOffset;
  }
  return new Date(instant);
}

/**
 * The instant at which the calendar day year-month-day begins in the zone.
 */
export function startOfDayIn(year: number, monthIndex: number, day: number, timeZone: string): Date {
  return fromWallClock(new Date(Date.UTC(year, monthIndex, day)), timeZone);
}

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatDate(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

export function formatTime(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${pad(p.hour)}:${pad(p.minute)}`;
}

export function zoneAbbreviation(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'short' }).formatToParts(date);
  return parts.find((part) => part.type === 'timeZoneName')?.value ?? timeZone;
}
