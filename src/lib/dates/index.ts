export { type Clock, fixedClock, systemClock } from './clock.js';
export { CalendarDate } from './date.js';
export { DateTime } from './datetime.js';
export {
  DAY,
  type Duration,
  HOUR,
  MAX_DURATION,
  MILLISECOND,
  MIN_DURATION,
  MINUTE,
  SECOND,
  ZERO_INSTANT_MS,
} from './instant.js';
export { DATE_LAYOUT, DATETIME_LAYOUT, formatInstant, parseInstant } from './layout.js';
export { TemporalValue } from './temporal-value.js';
