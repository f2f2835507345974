import { TimeValue, isHour, isMinute } from '../types';
import { ScheduleError, ScheduleErrorCode } from '../types/errors';
import type { Result } from '../types/internal';

type Meridiem = 'AM' | 'PM';

/**
 * Outcome of a single matcher. `null` is a definite syntax miss.
 */
type MatchOutcome =
  | { kind: 'valid'; time: TimeValue }
  | { kind: 'out-of-range'; hour: number; minute: number }
  | null;

type TimeMatcher = (text: string) => MatchOutcome;

/**
 * Help line shown next to time inputs
 */
export const TIME_FORMAT_HINT = 'Time formats: 9:30 AM, 14:30, 2 PM, etc.';

/**
 * Apply the 12-hour clock convention: 12 AM is midnight, 12 PM is noon
 */
export function applyMeridiem(hour: number, meridiem: Meridiem): number {
  if (meridiem === 'PM' && hour !== 12) return hour + 12;
  if (meridiem === 'AM' && hour === 12) return 0;
  return hour;
}

function toOutcome(hour: number, minute: number): MatchOutcome {
  if (isHour(hour) && isMinute(minute)) {
    return { kind: 'valid', time: new TimeValue(hour, minute) };
  }
  return { kind: 'out-of-range', hour, minute };
}

function isMeridiem(value: string): value is Meridiem {
  return value === 'AM' || value === 'PM';
}

/**
 * Build a matcher for "hours<sep>minutes" with an optional meridiem group
 */
function clockMatcher(pattern: RegExp, withMeridiem: boolean): TimeMatcher {
  return (text) => {
    const match = pattern.exec(text);
    if (!match) return null;

    const [, hourText, minuteText, meridiemText] = match;
    let hour = parseInt(hourText, 10);
    const minute = parseInt(minuteText, 10);
    if (withMeridiem) {
      if (!isMeridiem(meridiemText)) return null;
      hour = applyMeridiem(hour, meridiemText);
    }
    return toOutcome(hour, minute);
  };
}

const hourOnlyMeridiem: TimeMatcher = (text) => {
  const match = /^(\d{1,2})\s*(AM|PM)$/.exec(text);
  if (!match) return null;

  const [, hourText, meridiemText] = match;
  if (!isMeridiem(meridiemText)) return null;
  return toOutcome(applyMeridiem(parseInt(hourText, 10), meridiemText), 0);
};

/**
 * Matchers in priority order. The shapes overlap, so order is the tie-break.
 */
const TIME_MATCHERS: readonly TimeMatcher[] = [
  // 2:55 PM, 12:55AM
  clockMatcher(/^(\d{1,2}):(\d{2})\s*(AM|PM)$/, true),
  // 14:55
  clockMatcher(/^(\d{1,2}):(\d{2})$/, false),
  // 2 PM
  hourOnlyMeridiem,
  // 12.55 AM
  clockMatcher(/^(\d{1,2})\.(\d{2})\s*(AM|PM)$/, true),
  // 14.55
  clockMatcher(/^(\d{1,2})\.(\d{2})$/, false),
];

/**
 * Parse a free-form time string ("2 PM", "14:30", "9.15 am", ...).
 * A pattern that matches but yields an out-of-range hour or minute does not
 * end the search; the next pattern is tried.
 */
export function parseTime(text: string): Result<TimeValue, ScheduleError> {
  const normalized = text.trim().toUpperCase();
  let outOfRange = false;

  for (const matcher of TIME_MATCHERS) {
    const outcome = matcher(normalized);
    if (outcome === null) continue;
    if (outcome.kind === 'valid') {
      return { success: true, data: outcome.time };
    }
    outOfRange = true;
  }

  return {
    success: false,
    error: new ScheduleError(
      ScheduleErrorCode.InvalidTimeFormat,
      `Invalid time format: ${normalized}. Try formats like '12:55 AM', '14:55', '2 PM', etc.`,
      [{
        field: 'time',
        message: outOfRange ? 'Hour or minute out of range' : 'Unrecognized time format',
        value: text,
      }]
    ),
  };
}

/**
 * Parse a time string to float hours (hour + minute / 60)
 */
export function toFloatHours(text: string): Result<number, ScheduleError> {
  const parsed = parseTime(text);
  if (!parsed.success) return parsed;
  return { success: true, data: parsed.data.toFloatHours() };
}
