import type { DayOfWeek, EventInput, ScheduleConfig, ValidationError, TimeValue } from '../types';
import type { Result } from '../types/internal';
import { DayOfWeek as DayEnum, SCHEDULE_START_HOUR, END_HOUR_OPTIONS, parseDayOfWeek } from '../types';
import { ScheduleError, ScheduleErrorCode } from '../types/errors';
import { parseTime } from './timeParser';

/**
 * Type guard to check if a value is a valid DayOfWeek enum value
 */
export function isDayOfWeek(value: unknown): value is DayOfWeek {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= DayEnum.Monday && value <= DayEnum.Friday;
  }
  return false;
}

/**
 * Event fields after validation, ready to be stored
 */
export interface ValidatedEventInput {
  title: string;
  day: DayOfWeek;
  startTime: TimeValue;
  endTime: TimeValue;
  startText: string;
  endText: string;
  location: string;
}

/**
 * Validate a form submission: required fields, weekday name, both times, and
 * start-before-end. Checks run in that order and the first failing stage is
 * reported.
 */
export function validateEventInput(input: EventInput): Result<ValidatedEventInput, ScheduleError> {
  const title = input.title.trim();
  const dayText = input.day.trim();
  const startText = input.start.trim();
  const endText = input.end.trim();
  const location = (input.location ?? '').trim();

  const missing: ValidationError[] = [];
  const required: Array<[string, string]> = [
    ['title', title],
    ['day', dayText],
    ['start', startText],
    ['end', endText],
  ];
  for (const [field, value] of required) {
    if (value.length === 0) {
      missing.push({ field, message: `${field} is required` });
    }
  }

  if (missing.length > 0) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.MissingField,
        'Please fill in all required fields',
        missing
      ),
    };
  }

  const day = parseDayOfWeek(dayText);
  if (day === null) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.InvalidDay,
        `Invalid day: ${dayText}. Choose Monday through Friday`,
        [{ field: 'day', message: 'Not a weekday', value: input.day }]
      ),
    };
  }

  const start = parseTime(startText);
  if (!start.success) return start;

  const end = parseTime(endText);
  if (!end.success) return end;

  if (!start.data.isBefore(end.data)) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.StartNotBeforeEnd,
        'Start time must be before end time',
        [{
          field: 'end',
          message: 'end must be after start',
          value: { start: start.data.toString(), end: end.data.toString() },
        }]
      ),
    };
  }

  return {
    success: true,
    data: {
      title,
      day,
      startTime: start.data,
      endTime: end.data,
      startText,
      endText,
      location,
    },
  };
}

/**
 * Validate configuration object
 */
export function validateConfig(config: ScheduleConfig): Result<void, ScheduleError> {
  if (config.days.length === 0) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.NoDaysSelected,
        'Please select at least one day to include'
      ),
    };
  }

  const errors: ValidationError[] = [];

  config.days.forEach((day, index) => {
    if (!isDayOfWeek(day)) {
      errors.push({
        field: `days[${index}]`,
        message: 'Invalid day. Must be a valid DayOfWeek enum value (0-4)',
        value: day
      });
    } else if (config.days.indexOf(day) !== index) {
      errors.push({
        field: `days[${index}]`,
        message: 'Duplicate day',
        value: day
      });
    }
  });

  const startHour = config.startHour ?? SCHEDULE_START_HOUR;
  if (!Number.isInteger(startHour) || startHour < 0 || startHour > 23) {
    errors.push({
      field: 'startHour',
      message: 'startHour must be an integer between 0 and 23',
      value: config.startHour
    });
  }

  if (!END_HOUR_OPTIONS.some(option => option.hour === config.endHour)) {
    errors.push({
      field: 'endHour',
      message: 'endHour must be one of 18, 19, 20, 21, 22, 23',
      value: config.endHour
    });
  }

  if (config.endHour <= startHour) {
    errors.push({
      field: 'endHour',
      message: 'endHour must be greater than startHour',
      value: { startHour, endHour: config.endHour }
    });
  }

  if (errors.length > 0) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.InvalidConfig,
        `Invalid configuration: ${errors.map(e => e.message).join(', ')}`,
        errors
      ),
    };
  }

  return { success: true, data: undefined };
}
