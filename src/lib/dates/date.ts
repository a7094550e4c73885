import type { AppError } from '../errors/index.js';
import { map, type Result } from '../utils/result.js';
import {
  decodeTemporalJSON,
  parseTemporal,
  parseTrusted,
  scanTemporal,
} from './boundary.js';
import { type Clock, systemClock } from './clock.js';
import { DateTime } from './datetime.js';
import { floatingInstant, instantFields, utcInstant, ZERO_INSTANT_MS } from './instant.js';
import { DATE_LAYOUT } from './layout.js';
import { TemporalValue } from './temporal-value.js';

/**
 * A calendar day, serialized as `YYYY-MM-DD`.
 *
 * The wrapped instant may carry a time of day; it survives in memory and in
 * `toDateTime()` but is ignored by equality, zero detection and every text
 * form. The zero value encodes to JSON as `false`.
 */
export class CalendarDate extends TemporalValue<CalendarDate> {
  protected readonly layout = DATE_LAYOUT;

  private constructor(epochMillis: number) {
    super(epochMillis);
  }

  protected create(epochMillis: number): CalendarDate {
    return new CalendarDate(epochMillis);
  }

  static of(year: number, month: number, day: number): CalendarDate {
    return new CalendarDate(
      utcInstant({ year, month, day, hour: 0, minute: 0, second: 0, millisecond: 0 })
    );
  }

  static fromInstant(instant: Date): CalendarDate {
    return new CalendarDate(instant.getTime());
  }

  static zero(): CalendarDate {
    return new CalendarDate(ZERO_INSTANT_MS);
  }

  /** The current local calendar day, time of day included. */
  static today(clock: Clock = systemClock): CalendarDate {
    return new CalendarDate(floatingInstant(clock.now()));
  }

  static parseWithLayout(layout: string, value: string): Result<CalendarDate, AppError> {
    return map(parseTemporal(layout, value), (epochMillis) => new CalendarDate(epochMillis));
  }

  /**
   * Parses a `YYYY-MM-DD` literal and throws on anything else.
   * Only for trusted input; use `parseWithLayout` for user data.
   */
  static parse(value: string): CalendarDate {
    return new CalendarDate(parseTrusted(DATE_LAYOUT, value));
  }

  static fromJSON(raw: unknown): Result<CalendarDate, AppError> {
    return map(decodeTemporalJSON('date', raw), (epochMillis) => new CalendarDate(epochMillis));
  }

  static scan(src: unknown): Result<CalendarDate, AppError> {
    return map(scanTemporal('date', src), (epochMillis) => new CalendarDate(epochMillis));
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

  /** Same instant as a DateTime; nothing is truncated. */
  toDateTime(): DateTime {
    return DateTime.fromInstant(this.instant());
  }
}
