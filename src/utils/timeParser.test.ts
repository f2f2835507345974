import { describe, it, expect } from 'vitest';
import { parseTime, toFloatHours, applyMeridiem, TIME_FORMAT_HINT } from './timeParser';
import { ScheduleErrorCode } from '../types/errors';

function hm(text: string): [number, number] | null {
  const result = parseTime(text);
  return result.success ? [result.data.hour, result.data.minute] : null;
}

describe('parseTime', () => {
  it('converts 12-hour times with a meridiem', () => {
    expect(hm('12:00 AM')).toEqual([0, 0]);
    expect(hm('12:00 PM')).toEqual([12, 0]);
    expect(hm('11:59 PM')).toEqual([23, 59]);
    expect(hm('9:05 AM')).toEqual([9, 5]);
    expect(hm('0:30 AM')).toEqual([0, 30]);
  });

  it('accepts each recognized shape', () => {
    expect(hm('14:30')).toEqual([14, 30]);
    expect(hm('2 PM')).toEqual([14, 0]);
    expect(hm('12 AM')).toEqual([0, 0]);
    expect(hm('2.55 PM')).toEqual([14, 55]);
    expect(hm('12.55 AM')).toEqual([0, 55]);
    expect(hm('14.55')).toEqual([14, 55]);
  });

  it('trims, ignores case and allows no space before the meridiem', () => {
    expect(hm('  9:05 am ')).toEqual([9, 5]);
    expect(hm('2:30PM')).toEqual([14, 30]);
    expect(hm('7pm')).toEqual([19, 0]);
  });

  it('rejects hours past 23 with the accepted formats in the message', () => {
    const result = parseTime('25:00');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidTimeFormat);
    expect(result.error.message).toBe(
      "Invalid time format: 25:00. Try formats like '12:55 AM', '14:55', '2 PM', etc."
    );
    expect(result.error.details).toEqual([
      { field: 'time', message: 'Hour or minute out of range', value: '25:00' },
    ]);
  });

  it('keeps trying later patterns after a range failure and reports the last outcome', () => {
    const result = parseTime('13:00 pm');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      "Invalid time format: 13:00 PM. Try formats like '12:55 AM', '14:55', '2 PM', etc."
    );
    expect(result.error.details[0].message).toBe('Hour or minute out of range');
  });

  it('rejects minutes past 59 and unrecognized text', () => {
    expect(hm('10:60')).toBeNull();
    expect(hm('9:5')).toBeNull();
    expect(hm('noon')).toBeNull();
    expect(hm('')).toBeNull();

    const result = parseTime('noon');
    if (result.success) throw new Error('expected failure');
    expect(result.error.details[0].message).toBe('Unrecognized time format');
  });
});

describe('toFloatHours', () => {
  it('returns hour plus fractional minutes', () => {
    expect(toFloatHours('10:30 AM')).toEqual({ success: true, data: 10.5 });
    expect(toFloatHours('9:15')).toEqual({ success: true, data: 9.25 });
    expect(toFloatHours('6 PM')).toEqual({ success: true, data: 18 });
  });

  it('passes parse failures through', () => {
    const result = toFloatHours('later');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidTimeFormat);
  });

  it('is strictly increasing across the day', () => {
    const ordered = ['12:00 AM', '12:01 AM', '0:59', '1 AM', '9.30 AM', '11:59 AM', '12 PM', '12:01 PM', '13:00', '6.45 PM', '11:59 PM'];
    const values = ordered.map(text => {
      const result = toFloatHours(text);
      if (!result.success) throw result.error;
      return result.data;
    });

    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThan(values[i - 1]);
    }
  });
});

describe('applyMeridiem', () => {
  it('maps 12 AM to midnight and adds 12 to PM hours other than noon', () => {
    expect(applyMeridiem(12, 'AM')).toBe(0);
    expect(applyMeridiem(1, 'AM')).toBe(1);
    expect(applyMeridiem(12, 'PM')).toBe(12);
    expect(applyMeridiem(1, 'PM')).toBe(13);
  });
});

describe('TIME_FORMAT_HINT', () => {
  it('names example formats', () => {
    expect(TIME_FORMAT_HINT).toBe('Time formats: 9:30 AM, 14:30, 2 PM, etc.');
  });
});
