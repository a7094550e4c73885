export { calendarDate, dateTime } from './db/columns.js';
export { createDatabase, type DatabaseHandle, type DatabaseOptions, IN_MEMORY } from './db/client.js';
export * from './lib/dates/index.js';
export * from './lib/errors/index.js';
export * from './lib/models/index.js';
export { createLogger, type Logger, type LogLevel } from './lib/logging/logger.js';
export { decodeJSON } from './lib/utils/json.js';
export {
  andThen,
  err,
  isErr,
  isOk,
  map,
  mapErr,
  ok,
  orElse,
  type Result,
  unwrap,
  unwrapOr,
} from './lib/utils/result.js';
