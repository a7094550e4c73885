import type { AppError } from '../errors/index.js';
import { map, type Result } from '../utils/result.js';
import {
  decodeTemporalJSON,
  parseTemporal,
  parseTrusted,
  scanTemporal,
} from './boundary.js';
import { type Clock, systemClock } from './clock.js';
import { CalendarDate } from './date.js';
import { type Duration, floatingInstant, instantFields, utcInstant, ZERO_INSTANT_MS } from './instant.js';
import { DATETIME_LAYOUT } from './layout.js';
import { TemporalValue } from './temporal-value.js';

/** A point in time at second precision, serialized as `YYYY-MM-DD HH:mm:ss`. */
export class DateTime extends TemporalValue<DateTime> {
  protected readonly layout = DATETIME_LAYOUT;

  private constructor(epochMillis: number) {
    super(epochMillis);
  }

  protected create(epochMillis: number): DateTime {
    return new DateTime(epochMillis);
  }

  static of(
    year: number,
    month: number,
    day: number,
    hour = 0,
    minute = 0,
    second = 0
  ): DateTime {
    return new DateTime(utcInstant({ year, month, day, hour, minute, second, millisecond: 0 }));
  }

  static fromInstant(instant: Date): DateTime {
    return new DateTime(instant.getTime());
  }

  static zero(): DateTime {
    return new DateTime(ZERO_INSTANT_MS);
  }

  /** The current local wall-clock time. */
  static now(clock: Clock = systemClock): DateTime {
    return new DateTime(floatingInstant(clock.now()));
  }

  static parseWithLayout(layout: string, value: string): Result<DateTime, AppError> {
    return map(parseTemporal(layout, value), (epochMillis) => new DateTime(epochMillis));
  }

  /**
   * Parses a `YYYY-MM-DD HH:mm:ss` literal and throws on anything else.
   * Only for trusted input; use `parseWithLayout` for user data.
   */
  static parse(value: string): DateTime {
    return new DateTime(parseTrusted(DATETIME_LAYOUT, value));
  }

  static fromJSON(raw: unknown): Result<DateTime, AppError> {
    return map(decodeTemporalJSON('datetime', raw), (epochMillis) => new DateTime(epochMillis));
  }

  static scan(src: unknown): Result<DateTime, AppError> {
    return map(scanTemporal('datetime', src), (epochMillis) => new DateTime(epochMillis));
  }

  get year(): number {
    return instantFields(this.epochMillis).year;
  }

  get month(): number {
    return instantFields(this.epochMillis).month;
  }

  get day(): number {
    return instantFields(this.epochMillis).day;
  }

  get hour(): number {
    return instantFields(this.epochMillis).hour;
  }

  get minute(): number {
    return instantFields(this.epochMillis).minute;
  }

  get second(): number {
    return instantFields(this.epochMillis).second;
  }

  add(duration: Duration): DateTime {
    return new DateTime(this.epochMillis + duration);
  }

  /** The calendar day of this DateTime, keeping the time of day in memory. */
  toDate(): CalendarDate {
    return CalendarDate.fromInstant(this.instant());
  }
}
