import { z } from 'zod';
import {
  type AppError,
  AppErrorClass,
  DateErrors,
  type TemporalKind,
  ValidationErrors,
} from '../errors/index.js';
import { createLogger } from '../logging/logger.js';
import { describeType } from '../utils/describe-type.js';
import { err, ok, orElse, type Result } from '../utils/result.js';
import { ZERO_INSTANT_MS } from './instant.js';
import { DATE_LAYOUT, DATETIME_LAYOUT, parseInstant } from './layout.js';

const log = createLogger('TemporalScan');

export const CANONICAL_LAYOUT: Record<TemporalKind, string> = {
  date: DATE_LAYOUT,
  datetime: DATETIME_LAYOUT,
};

const FALLBACK_LAYOUT: Record<TemporalKind, string> = {
  date: DATETIME_LAYOUT,
  datetime: DATE_LAYOUT,
};

/** Like `parseInstant`, but the empty string is the zero instant. */
export const parseTemporal = (layout: string, value: string): Result<number, AppError> =>
  value === '' ? ok(ZERO_INSTANT_MS) : parseInstant(layout, value);

/**
 * Parses text that the caller already knows to be well formed. Throws a
 * `DATE_PARSE_FATAL` AppErrorClass otherwise; never use on user input.
 */
export const parseTrusted = (layout: string, value: string): number => {
  const result = parseTemporal(layout, value);
  if (result.ok) {
    return result.value;
  }

  const reason = result.error.details?.reason;
  throw AppErrorClass.from(
    DateErrors.PARSE_FATAL(layout, value, typeof reason === 'string' ? reason : result.error.message)
  );
};

/**
 * Converts a driver value into an instant. Accepts a Date, a string in the
 * kind's canonical layout or in the other kind's layout, and the empty
 * string (zero instant).
 */
export const scanTemporal = (kind: TemporalKind, src: unknown): Result<number, AppError> => {
  if (src instanceof Date) {
    const epochMillis = src.getTime();
    if (Number.isNaN(epochMillis)) {
      return err(DateErrors.PARSE_ERROR(CANONICAL_LAYOUT[kind], String(src), 'invalid Date'));
    }
    return ok(epochMillis);
  }

  if (typeof src === 'string') {
    if (src === '') {
      return ok(ZERO_INSTANT_MS);
    }
    const canonical = parseInstant(CANONICAL_LAYOUT[kind], src);
    return orElse(canonical, (canonicalError) => {
      const fallback = parseInstant(FALLBACK_LAYOUT[kind], src);
      if (!fallback.ok) {
        return err(canonicalError);
      }
      log.debug(`Scanned ${kind} with ${FALLBACK_LAYOUT[kind]} layout`, { data: { value: src } });
      return fallback;
    });
  }

  return err(DateErrors.SCAN_TYPE_MISMATCH(kind, describeType(src)));
};

const temporalJsonSchema = z.union([z.string(), z.literal(false), z.null(), z.undefined()]);

/**
 * Decodes a parsed JSON value: the canonical string, or `false`, `null`,
 * `""` or an absent property (`undefined`) for the zero instant.
 */
export const decodeTemporalJSON = (kind: TemporalKind, raw: unknown): Result<number, AppError> => {
  const parsed = temporalJsonSchema.safeParse(raw);
  if (!parsed.success) {
    return err(ValidationErrors.DECODE_ERROR(kind, parsed.error.issues));
  }
  if (parsed.data === false || parsed.data === null || parsed.data === undefined) {
    return ok(ZERO_INSTANT_MS);
  }
  return parseTemporal(CANONICAL_LAYOUT[kind], parsed.data);
};
