import { describe, it, expect } from 'vitest';
import { isDayOfWeek, validateConfig, validateEventInput } from './validators';
import { DayOfWeek } from '../types';
import { ScheduleErrorCode } from '../types/errors';

describe('isDayOfWeek', () => {
  it('accepts Monday through Friday only', () => {
    expect(isDayOfWeek(0)).toBe(true);
    expect(isDayOfWeek(4)).toBe(true);
    expect(isDayOfWeek(5)).toBe(false);
    expect(isDayOfWeek(-1)).toBe(false);
    expect(isDayOfWeek(1.5)).toBe(false);
    expect(isDayOfWeek('1')).toBe(false);
  });
});

describe('validateEventInput', () => {
  it('trims and converts a complete submission', () => {
    const result = validateEventInput({
      title: ' Lab ',
      day: 'tuesday',
      start: '1 PM',
      end: ' 2:15 PM',
      location: ' Room 5 ',
      color: 'Teal',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.title).toBe('Lab');
    expect(result.data.day).toBe(DayOfWeek.Tuesday);
    expect(result.data.startTime.toString()).toBe('13:00');
    expect(result.data.endTime.toString()).toBe('14:15');
    expect(result.data.startText).toBe('1 PM');
    expect(result.data.endText).toBe('2:15 PM');
    expect(result.data.location).toBe('Room 5');
  });

  it('defaults a missing location to empty', () => {
    const result = validateEventInput({ title: 'Seminar', day: 'Friday', start: '9 AM', end: '10 AM', color: 'Red' });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.location).toBe('');
  });

  it('lists every blank required field', () => {
    const result = validateEventInput({ title: '  ', day: 'Monday', start: '9 AM', end: '', color: 'Blue' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.MissingField);
    expect(result.error.message).toBe('Please fill in all required fields');
    expect(result.error.details.map(d => d.field)).toEqual(['title', 'end']);
  });

  it('rejects weekend days', () => {
    const result = validateEventInput({ title: 'Brunch', day: 'Saturday', start: '10 AM', end: '11 AM', color: 'Gold' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidDay);
    expect(result.error.message).toBe('Invalid day: Saturday. Choose Monday through Friday');
  });

  it('reports an unparseable time', () => {
    const result = validateEventInput({ title: 'Review', day: 'Monday', start: 'soon', end: '11 AM', color: 'Gold' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidTimeFormat);
  });

  it('requires start strictly before end', () => {
    const equal = validateEventInput({ title: 'Sync', day: 'Monday', start: '10 AM', end: '10:00', color: 'Gold' });
    const reversed = validateEventInput({ title: 'Sync', day: 'Monday', start: '3 PM', end: '2 PM', color: 'Gold' });

    for (const result of [equal, reversed]) {
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error.code).toBe(ScheduleErrorCode.StartNotBeforeEnd);
      expect(result.error.message).toBe('Start time must be before end time');
    }
  });
});

describe('validateConfig', () => {
  it('accepts a normal work week', () => {
    expect(validateConfig({ days: [DayOfWeek.Monday, DayOfWeek.Wednesday], endHour: 18 })).toEqual({
      success: true,
      data: undefined,
    });
  });

  it('requires at least one day', () => {
    const result = validateConfig({ days: [], endHour: 20 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.NoDaysSelected);
    expect(result.error.message).toBe('Please select at least one day to include');
  });

  it('rejects duplicate days', () => {
    const result = validateConfig({ days: [DayOfWeek.Monday, DayOfWeek.Monday], endHour: 18 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidConfig);
    expect(result.error.details).toEqual([{ field: 'days[1]', message: 'Duplicate day', value: DayOfWeek.Monday }]);
  });

  it('rejects an end hour at or before the start hour', () => {
    const result = validateConfig({ days: [DayOfWeek.Friday], endHour: 18, startHour: 20 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Invalid configuration: endHour must be greater than startHour');
    expect(result.error.details).toEqual([
      { field: 'endHour', message: 'endHour must be greater than startHour', value: { startHour: 20, endHour: 18 } },
    ]);
  });

  it('rejects a start hour outside the day', () => {
    const result = validateConfig({ days: [DayOfWeek.Friday], endHour: 18, startHour: -1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details.map(d => d.field)).toEqual(['startHour']);
  });
});
