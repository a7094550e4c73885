import { customType } from 'drizzle-orm/sqlite-core';
import { CalendarDate, DATE_LAYOUT, DATETIME_LAYOUT, DateTime, formatInstant } from '../lib/dates/index.js';
import { AppErrorClass } from '../lib/errors/index.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';

const log = createLogger('TemporalColumns');

const scanOrThrow = <T>(column: string, raw: unknown, result: Result<T>): T => {
  if (result.ok) {
    return result.value;
  }
  log.error(`Cannot read ${column} column value`, { data: { raw }, error: result.error });
  throw AppErrorClass.from(result.error);
};

/**
 * TEXT column holding a `YYYY-MM-DD` CalendarDate. A zero date is written as
 * `0001-01-01`, never as NULL; declare the column nullable to store a real
 * NULL (read back as `null`).
 */
export const calendarDate = customType<{ data: CalendarDate; driverData: string }>({
  dataType() {
    return 'text';
  },
  toDriver(value: CalendarDate): string {
    return formatInstant(value.value().getTime(), DATE_LAYOUT);
  },
  fromDriver(value: unknown): CalendarDate {
    return scanOrThrow('date', value, CalendarDate.scan(value));
  },
});

/** TEXT column holding a `YYYY-MM-DD HH:mm:ss` DateTime. */
export const dateTime = customType<{ data: DateTime; driverData: string }>({
  dataType() {
    return 'text';
  },
  toDriver(value: DateTime): string {
    return formatInstant(value.value().getTime(), DATETIME_LAYOUT);
  },
  fromDriver(value: unknown): DateTime {
    return scanOrThrow('datetime', value, DateTime.scan(value));
  },
});
