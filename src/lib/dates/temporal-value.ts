import {
  clampDuration,
  type Duration,
  instantFields,
  utcInstant,
  ZERO_INSTANT_MS,
} from './instant.js';
import { formatInstant } from './layout.js';

/**
 * Behaviour shared by CalendarDate and DateTime. A subclass fixes the
 * canonical layout, which is the precision of its equality, zero detection
 * and serialization. Ordering and `sub` use the full underlying instant.
 */
export abstract class TemporalValue<T extends TemporalValue<T>> {
  protected abstract readonly layout: string;

  /** Throws a RangeError when `epochMillis` is outside the `Date` range. */
  protected constructor(readonly epochMillis: number) {
    if (Number.isNaN(new Date(epochMillis).getTime())) {
      throw new RangeError(`Instant out of range: ${epochMillis}`);
    }
  }

  protected abstract create(epochMillis: number): T;

  /** True when the canonical text equals the text of the zero instant. */
  isZero(): boolean {
    return this.toString() === formatInstant(ZERO_INSTANT_MS, this.layout);
  }

  isNull(): boolean {
    return this.isZero();
  }

  toString(): string {
    return formatInstant(this.epochMillis, this.layout);
  }

  format(layout: string): string {
    return formatInstant(this.epochMillis, layout);
  }

  /** `false` for the zero value, the canonical string otherwise. */
  toJSON(): string | false {
    return this.isZero() ? false : this.toString();
  }

  /**
   * Driver value. A zero value becomes the zero instant rather than a
   * storage null.
   */
  value(): Date {
    return new Date(this.isZero() ? ZERO_INSTANT_MS : this.epochMillis);
  }

  instant(): Date {
    return new Date(this.epochMillis);
  }

  equal(other: T): boolean {
    return this.toString() === other.toString();
  }

  greater(other: T): boolean {
    return this.sub(other) > 0;
  }

  greaterEqual(other: T): boolean {
    return this.sub(other) >= 0;
  }

  lower(other: T): boolean {
    return this.sub(other) < 0;
  }

  lowerEqual(other: T): boolean {
    return this.sub(other) <= 0;
  }

  /** `this - other`, clamped to MIN_DURATION..MAX_DURATION. */
  sub(other: T): Duration {
    return clampDuration(this.epochMillis - other.epochMillis);
  }

  /**
   * Shifts by calendar units, keeping the time of day. Overflow follows the
   * calendar: Jan 31 plus one month is Mar 3 (Mar 2 in a leap year).
   * Throws a RangeError when the result leaves the `Date` range.
   */
  addDate(years: number, months: number, days: number): T {
    const fields = instantFields(this.epochMillis);
    return this.create(
      utcInstant({
        ...fields,
        year: fields.year + years,
        month: fields.month + months,
        day: fields.day + days,
      })
    );
  }
}
