import { describe, expect, it } from 'vitest';
import { utcInstant, ZERO_INSTANT_MS } from '../instant.js';
import { DATE_LAYOUT, DATETIME_LAYOUT, formatInstant, parseInstant } from '../layout.js';

const reasonOf = (layout: string, value: string): unknown => {
  const result = parseInstant(layout, value);
  return result.ok ? null : result.error.details?.reason;
};

describe('layouts', () => {
  it('pins the zero instant to 0001-01-01T00:00:00Z', () => {
    expect(ZERO_INSTANT_MS).toBe(-62135596800000);
    expect(formatInstant(ZERO_INSTANT_MS, DATE_LAYOUT)).toBe('0001-01-01');
    expect(formatInstant(ZERO_INSTANT_MS, DATETIME_LAYOUT)).toBe('0001-01-01 00:00:00');
  });

  it('takes two-digit years literally', () => {
    const instant = utcInstant({
      year: 99,
      month: 12,
      day: 31,
      hour: 23,
      minute: 59,
      second: 59,
      millisecond: 0,
    });

    expect(formatInstant(instant, DATETIME_LAYOUT)).toBe('0099-12-31 23:59:59');
  });

  it('normalizes field overflow', () => {
    const instant = utcInstant({
      year: 2017,
      month: 13,
      day: 32,
      hour: 0,
      minute: 0,
      second: 0,
      millisecond: 0,
    });

    expect(formatInstant(instant, DATE_LAYOUT)).toBe('2018-02-01');
  });

  it('parses custom layouts', () => {
    const result = parseInstant('DD/MM/YYYY', '04/10/2017');

    expect(result.ok && formatInstant(result.value, DATE_LAYOUT)).toBe('2017-10-04');
  });

  it('formats and parses the same custom layout repeatedly', () => {
    const instant = utcInstant({
      year: 2017,
      month: 8,
      day: 1,
      hour: 10,
      minute: 2,
      second: 57,
      millisecond: 0,
    });

    for (let round = 0; round < 3; round += 1) {
      expect(formatInstant(instant, 'DD.MM.YYYY HH:mm')).toBe('01.08.2017 10:02');
      expect(parseInstant('DD.MM.YYYY HH:mm', '01.08.2017 10:02')).toEqual({
        ok: true,
        value: instant - 57 * 1000,
      });
    }
  });

  it('defaults fields missing from the layout', () => {
    const result = parseInstant('HH:mm', '10:30');

    expect(result.ok && formatInstant(result.value, DATETIME_LAYOUT)).toBe('0001-01-01 10:30:00');
  });

  it('requires every token at full width', () => {
    expect(reasonOf(DATE_LAYOUT, '2017-8-1')).toBe('cannot parse "8-1" as "MM"');
    expect(reasonOf(DATE_LAYOUT, '17-08-01')).toBe('cannot parse "17-08-01" as "YYYY"');
    expect(reasonOf(DATE_LAYOUT, '2017-08')).toBe('cannot parse "" as "-"');
  });

  it('rejects non-numeric components', () => {
    expect(reasonOf(DATE_LAYOUT, '2017-0a-01')).toBe('cannot parse "0a-01" as "MM"');
    expect(reasonOf(DATETIME_LAYOUT, '2017-08-01 10:02:xx')).toBe('cannot parse "xx" as "ss"');
  });

  it('rejects trailing text', () => {
    expect(reasonOf(DATE_LAYOUT, '2017-08-01 10:02:57')).toBe('extra text: " 10:02:57"');
  });

  it('rejects the empty string', () => {
    expect(reasonOf(DATE_LAYOUT, '')).toBe('cannot parse "" as "YYYY"');
  });

  it('checks field ranges', () => {
    expect(reasonOf(DATE_LAYOUT, '2017-00-10')).toBe('month out of range');
    expect(reasonOf(DATE_LAYOUT, '2017-04-31')).toBe('day out of range');
    expect(reasonOf(DATE_LAYOUT, '1900-02-29')).toBe('day out of range');
    expect(reasonOf(DATE_LAYOUT, '2000-02-29')).toBeNull();
    expect(reasonOf(DATETIME_LAYOUT, '2017-08-01 10:60:00')).toBe('minute out of range');
    expect(reasonOf(DATETIME_LAYOUT, '2017-08-01 10:00:60')).toBe('second out of range');
  });
});
