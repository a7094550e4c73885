import { describe, expect, it } from 'vitest';
import { CalendarDate } from '../../dates/date.js';
import { FieldMap } from '../field-map.js';

describe('FieldMap', () => {
  it('lists keys and values in insertion order', () => {
    const fields = FieldMap.from({ id: 3, name: 'Alice', active: true });

    expect(fields.keys()).toEqual(['id', 'name', 'active']);
    expect(fields.values()).toEqual([3, 'Alice', true]);
    expect(fields.size).toBe(3);
  });

  it('gets, sets and deletes entries', () => {
    const fields = new FieldMap().set('name', 'Alice');

    expect(fields.get('name')).toBe('Alice');
    expect(fields.has('email')).toBe(false);
    expect(fields.delete('name')).toBe(true);
    expect(fields.size).toBe(0);
  });

  describe('removePK', () => {
    it('removes both id spellings', () => {
      const fields = FieldMap.from({ id: 3, ID: 3, name: 'Alice' });

      fields.removePK();

      expect(fields.keys()).toEqual(['name']);
    });
  });

  describe('removePKIfZero', () => {
    it('removes only zero ids', () => {
      const fields = FieldMap.from({ id: 0, ID: 5, name: 'Alice' });

      fields.removePKIfZero();

      expect(fields.keys()).toEqual(['ID', 'name']);
    });

    it('treats a bigint zero as zero', () => {
      const fields = FieldMap.from({ ID: BigInt(0) });

      fields.removePKIfZero();

      expect(fields.has('ID')).toBe(false);
    });

    it('keeps ids that are not the integer zero', () => {
      const fields = FieldMap.from({ id: '0' });

      fields.removePKIfZero();

      expect(fields.get('id')).toBe('0');
    });
  });

  describe('substituteKeys', () => {
    it('renames, keeps originals on request and skips missing keys', () => {
      const fields = FieldMap.from({ name: 'Alice', date: '2017-08-01' });

      fields.substituteKeys([
        { orig: 'name', new: 'display_name' },
        { orig: 'date', new: 'date_col', keep: true },
        { orig: 'missing', new: 'other' },
      ]);

      expect(fields.toJSON()).toEqual({
        date: '2017-08-01',
        display_name: 'Alice',
        date_col: '2017-08-01',
      });
      expect(fields.keys()).toEqual(['date', 'display_name', 'date_col']);
    });

    it('overwrites an existing target key', () => {
      const fields = FieldMap.from({ login: 'alice', name: 'Alice' });

      fields.substituteKeys([{ orig: 'login', new: 'name' }]);

      expect(fields.toJSON()).toEqual({ name: 'alice' });
    });
  });

  it('stores temporal values as plain values', () => {
    const fields = FieldMap.from({
      due: CalendarDate.parse('2017-08-01'),
      closed: CalendarDate.zero(),
    });

    expect(JSON.stringify(fields)).toBe('{"due":"2017-08-01","closed":false}');
  });
});
