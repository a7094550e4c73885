import { type AppError, DateErrors } from '../errors/index.js';
import { err, ok, type Result } from '../utils/result.js';
import { daysInMonth, type InstantFields, instantFields, utcInstant } from './instant.js';

/** Canonical layout of CalendarDate. */
export const DATE_LAYOUT = 'YYYY-MM-DD';

/** Canonical layout of DateTime. */
export const DATETIME_LAYOUT = 'YYYY-MM-DD HH:mm:ss';

type LayoutToken = 'YYYY' | 'MM' | 'DD' | 'HH' | 'mm' | 'ss';

type LayoutPart = { kind: 'token'; token: LayoutToken } | { kind: 'literal'; text: string };

const TOKEN_PATTERN = /YYYY|MM|DD|HH|mm|ss/g;

const TOKEN_WIDTH: Record<LayoutToken, number> = {
  YYYY: 4,
  MM: 2,
  DD: 2,
  HH: 2,
  mm: 2,
  ss: 2,
};

const TOKEN_FIELD: Record<LayoutToken, keyof InstantFields> = {
  YYYY: 'year',
  MM: 'month',
  DD: 'day',
  HH: 'hour',
  mm: 'minute',
  ss: 'second',
};

const isLayoutToken = (value: string): value is LayoutToken => value in TOKEN_WIDTH;

const splitLayout = (layout: string): LayoutPart[] => {
  const parts: LayoutPart[] = [];
  let cursor = 0;
  for (const match of layout.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? cursor;
    if (index > cursor) {
      parts.push({ kind: 'literal', text: layout.slice(cursor, index) });
    }
    const [token] = match;
    if (isLayoutToken(token)) {
      parts.push({ kind: 'token', token });
    }
    cursor = index + token.length;
  }
  if (cursor < layout.length) {
    parts.push({ kind: 'literal', text: layout.slice(cursor) });
  }

  return parts;
};

const canonicalLayouts = new Map<string, LayoutPart[]>([
  [DATE_LAYOUT, splitLayout(DATE_LAYOUT)],
  [DATETIME_LAYOUT, splitLayout(DATETIME_LAYOUT)],
]);

/** Only the canonical layouts are kept compiled; caller layouts are split per call. */
const compileLayout = (layout: string): LayoutPart[] =>
  canonicalLayouts.get(layout) ?? splitLayout(layout);

const pad = (value: number, width: number): string => {
  const digits = String(Math.abs(value)).padStart(width, '0');
  return value < 0 ? `-${digits}` : digits;
};

/** Formats the UTC fields of an instant under `layout`. */
export const formatInstant = (epochMillis: number, layout: string): string => {
  const fields = instantFields(epochMillis);
  return compileLayout(layout)
    .map((part) =>
      part.kind === 'literal'
        ? part.text
        : pad(fields[TOKEN_FIELD[part.token]], TOKEN_WIDTH[part.token])
    )
    .join('');
};

const checkRanges = (fields: InstantFields): string | null => {
  if (fields.month < 1 || fields.month > 12) return 'month out of range';
  if (fields.day < 1 || fields.day > daysInMonth(fields.year, fields.month)) {
    return 'day out of range';
  }
  if (fields.hour > 23) return 'hour out of range';
  if (fields.minute > 59) return 'minute out of range';
  if (fields.second > 59) return 'second out of range';
  return null;
};

/**
 * Parses `value` strictly under `layout` into a UTC instant. Every token
 * takes its full width in digits and the whole input must be consumed.
 * Fields absent from the layout start at their minimum.
 */
export const parseInstant = (layout: string, value: string): Result<number, AppError> => {
  const fields: InstantFields = {
    year: 1,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  };
  const fail = (reason: string) => err(DateErrors.PARSE_ERROR(layout, value, reason));

  let position = 0;
  for (const part of compileLayout(layout)) {
    if (part.kind === 'literal') {
      if (!value.startsWith(part.text, position)) {
        return fail(`cannot parse "${value.slice(position)}" as "${part.text}"`);
      }
      position += part.text.length;
      continue;
    }

    const width = TOKEN_WIDTH[part.token];
    const digits = value.slice(position, position + width);
    if (digits.length !== width || !/^\d+$/.test(digits)) {
      return fail(`cannot parse "${value.slice(position)}" as "${part.token}"`);
    }
    fields[TOKEN_FIELD[part.token]] = Number(digits);
    position += width;
  }

  if (position < value.length) {
    return fail(`extra text: "${value.slice(position)}"`);
  }

  const rangeError = checkRanges(fields);
  if (rangeError) {
    return fail(rangeError);
  }

  return ok(utcInstant(fields));
};
