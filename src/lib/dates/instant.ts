/**
 * Instant helpers shared by CalendarDate and DateTime.
 *
 * Instants are epoch milliseconds read and written through UTC fields, so a
 * value's text form never depends on the host time zone.
 */

/** A signed span of time in milliseconds. */
export type Duration = number;

export const MILLISECOND: Duration = 1;
export const SECOND: Duration = 1000 * MILLISECOND;
export const MINUTE: Duration = 60 * SECOND;
export const HOUR: Duration = 60 * MINUTE;
export const DAY: Duration = 24 * HOUR;

export const MAX_DURATION: Duration = Number.MAX_SAFE_INTEGER;
export const MIN_DURATION: Duration = -Number.MAX_SAFE_INTEGER;

export interface InstantFields {
  year: number;
  /** 1-12, overflow rolls into the following years. */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * Builds an instant from UTC fields, normalizing overflow the way the
 * calendar does (month 13 is January of the next year, Feb 30 is Mar 2).
 * Unlike `Date.UTC`, years 0-99 are taken literally.
 */
export const utcInstant = ({
  year,
  month,
  day,
  hour,
  minute,
  second,
  millisecond,
}: InstantFields): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date.getTime();
};

export const instantFields = (epochMillis: number): InstantFields => {
  const date = new Date(epochMillis);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
  };
};

/** `0001-01-01T00:00:00.000Z`, the null sentinel of both temporal types. */
export const ZERO_INSTANT_MS = utcInstant({
  year: 1,
  month: 1,
  day: 1,
  hour: 0,
  minute: 0,
  second: 0,
  millisecond: 0,
});

/**
 * Carries the local wall-clock fields of `now` over as UTC fields, so that
 * "today" formats as the local calendar day.
 */
export const floatingInstant = (now: Date): number =>
  utcInstant({
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
    hour: now.getHours(),
    minute: now.getMinutes(),
    second: now.getSeconds(),
    millisecond: now.getMilliseconds(),
  });

export const clampDuration = (duration: number): Duration =>
  Math.max(MIN_DURATION, Math.min(MAX_DURATION, duration));

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export const daysInMonth = (year: number, month: number): number => {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
};
