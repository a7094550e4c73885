import { createError } from './base.js';

export type TemporalKind = 'date' | 'datetime';

export const DateErrors = {
  PARSE_ERROR: (layout: string, value: string, reason: string) =>
    createError('DATE_PARSE_ERROR', `Cannot parse "${value}" as "${layout}": ${reason}`, 400, {
      layout,
      value,
      reason,
    }),
  PARSE_FATAL: (layout: string, value: string, reason: string) =>
    createError(
      'DATE_PARSE_FATAL',
      `Trusted value "${value}" does not match "${layout}": ${reason}`,
      500,
      { layout, value, reason }
    ),
  SCAN_TYPE_MISMATCH: (kind: TemporalKind, typeName: string) =>
    createError(
      'SCAN_TYPE_MISMATCH',
      `${kind} data is not a Date or a string but ${typeName}`,
      500,
      { kind, typeName }
    ),
} as const;

export type DateError =
  | ReturnType<typeof DateErrors.PARSE_ERROR>
  | ReturnType<typeof DateErrors.PARSE_FATAL>
  | ReturnType<typeof DateErrors.SCAN_TYPE_MISMATCH>;
