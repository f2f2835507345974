/**
 * Hour type: valid hour values (0-23)
 * Provides compile-time type safety for hour values
 */
export type Hour = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14 | 15 | 16 | 17 | 18 | 19 | 20 | 21 | 22 | 23;

/**
 * Minute type: valid minute values (0-59)
 * Provides compile-time type safety for minute values
 */
export type Minute = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14 | 15 | 16 | 17 | 18 | 19 | 20 | 21 | 22 | 23 | 24 | 25 | 26 | 27 | 28 | 29 | 30 | 31 | 32 | 33 | 34 | 35 | 36 | 37 | 38 | 39 | 40 | 41 | 42 | 43 | 44 | 45 | 46 | 47 | 48 | 49 | 50 | 51 | 52 | 53 | 54 | 55 | 56 | 57 | 58 | 59;

/**
 * Type guard for Hour values
 */
export function isHour(value: number): value is Hour {
  return Number.isInteger(value) && value >= 0 && value <= 23;
}

/**
 * Type guard for Minute values
 */
export function isMinute(value: number): value is Minute {
  return Number.isInteger(value) && value >= 0 && value <= 59;
}

/**
 * A time of day (hour and minute) without date information.
 * Immutable once constructed.
 */
export class TimeValue {
  readonly hour: Hour;
  readonly minute: Minute;

  constructor(hour: Hour, minute: Minute) {
    this.hour = hour;
    this.minute = minute;
  }

  /**
   * Float-hour representation used by the layout's vertical axis
   * @returns hour + minute / 60 (e.g., 10:30 => 10.5)
   */
  toFloatHours(): number {
    return this.hour + this.minute / 60;
  }

  /**
   * Convert time to total minutes since midnight
   * @returns Total minutes (e.g., 09:30 => 570)
   */
  toMinutes(): number {
    return this.hour * 60 + this.minute;
  }

  /**
   * Format time as HH:mm string
   * @returns Formatted time string (e.g., "09:00", "14:30")
   */
  toString(): string {
    const h = this.hour.toString().padStart(2, '0');
    const m = this.minute.toString().padStart(2, '0');
    return `${h}:${m}`;
  }

  /**
   * Format time on a 12-hour clock (e.g., "9:05 AM", "12:00 PM")
   */
  format12h(): string {
    const suffix = this.hour < 12 ? 'AM' : 'PM';
    const h = this.hour % 12 === 0 ? 12 : this.hour % 12;
    return `${h}:${this.minute.toString().padStart(2, '0')} ${suffix}`;
  }

  /**
   * Compare this time with another time
   * @returns Negative if this < other, 0 if equal, positive if this > other
   */
  compare(other: TimeValue): number {
    return this.toMinutes() - other.toMinutes();
  }

  isBefore(other: TimeValue): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: TimeValue): boolean {
    return this.compare(other) > 0;
  }

  equals(other: TimeValue): boolean {
    return this.hour === other.hour && this.minute === other.minute;
  }
}

export enum DayOfWeek {
  Monday = 0,
  Tuesday = 1,
  Wednesday = 2,
  Thursday = 3,
  Friday = 4
}

/**
 * Work week days (Monday-Friday), in display order
 */
export const WORK_WEEK_DAYS: readonly DayOfWeek[] = [
  DayOfWeek.Monday,
  DayOfWeek.Tuesday,
  DayOfWeek.Wednesday,
  DayOfWeek.Thursday,
  DayOfWeek.Friday
] as const;

/**
 * Day name translations
 */
export interface DayNameTranslations {
  [DayOfWeek.Monday]: string;
  [DayOfWeek.Tuesday]: string;
  [DayOfWeek.Wednesday]: string;
  [DayOfWeek.Thursday]: string;
  [DayOfWeek.Friday]: string;
}

export const DEFAULT_DAY_NAMES: DayNameTranslations = {
  [DayOfWeek.Monday]: 'Monday',
  [DayOfWeek.Tuesday]: 'Tuesday',
  [DayOfWeek.Wednesday]: 'Wednesday',
  [DayOfWeek.Thursday]: 'Thursday',
  [DayOfWeek.Friday]: 'Friday'
};

/**
 * Helper to get day name from enum value
 * @param translations - Optional custom translations (defaults to English)
 */
export function getDayName(
  day: DayOfWeek,
  translations: DayNameTranslations = DEFAULT_DAY_NAMES
): string {
  return translations[day];
}

/**
 * Look up a weekday by its English name, ignoring case and surrounding whitespace
 * @returns The day, or null if the name is not a weekday
 */
export function parseDayOfWeek(name: string): DayOfWeek | null {
  const needle = name.trim().toLowerCase();
  for (const day of WORK_WEEK_DAYS) {
    if (DEFAULT_DAY_NAMES[day].toLowerCase() === needle) {
      return day;
    }
  }
  return null;
}

/**
 * First hour on the time axis. The grid always starts at 8 AM.
 */
export const SCHEDULE_START_HOUR = 8;

/**
 * Selectable last hours for the time axis (6 PM through 11 PM)
 */
export type EndHour = 18 | 19 | 20 | 21 | 22 | 23;

export const END_HOUR_OPTIONS: ReadonlyArray<{ label: string; hour: EndHour }> = [
  { label: '6 PM', hour: 18 },
  { label: '7 PM', hour: 19 },
  { label: '8 PM', hour: 20 },
  { label: '9 PM', hour: 21 },
  { label: '10 PM', hour: 22 },
  { label: '11 PM', hour: 23 }
];

/**
 * Map an end-hour option label ("6 PM" ... "11 PM") to its hour
 * @returns The hour, or null for an unknown label
 */
export function parseEndHourOption(label: string): EndHour | null {
  const needle = label.trim().toUpperCase();
  return END_HOUR_OPTIONS.find(option => option.label === needle)?.hour ?? null;
}

/**
 * A weekly event placed on one weekday between two times.
 * Not tied to any calendar date.
 */
export interface ScheduleEvent {
  id: string;
  title: string;
  day: DayOfWeek;

  startTime: TimeValue;

  /**
   * Must be after startTime
   */
  endTime: TimeValue;

  /**
   * Start time as the user typed it (trimmed); shown in the event's time label
   */
  startText: string;

  endText: string;

  /**
   * Empty string when no location was given
   */
  location: string;

  /**
   * Hex RGB background color, e.g. "#3498db"
   */
  color: string;

  /**
   * Preset name the color was resolved from, or "Custom"
   */
  colorName: string;
}

/**
 * Raw form submission for a new event
 */
export interface EventInput {
  title: string;
  /** Weekday name, e.g. "Monday" */
  day: string;
  start: string;
  end: string;
  location?: string;
  /** Preset name (e.g. "Blue") or a hex color */
  color: string;
}

/**
 * Which days and hours to render
 */
export interface ScheduleConfig {
  /**
   * Days to render as columns, left to right
   */
  days: DayOfWeek[];

  /**
   * Last hour on the time axis
   */
  endHour: EndHour;

  /**
   * Start hour for the time axis.
   * Default: SCHEDULE_START_HOUR
   */
  startHour?: number;

  /**
   * Name appended to the document title
   */
  displayName?: string;
}

/**
 * Name → hex color table offered by the color picker
 */
export type ColorPresets = Readonly<Record<string, string>>;

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * One row of the host's event table
 */
export interface EventSummary {
  day: string;
  time: string;
  title: string;
  location: string;
  color: string;
}
