import type { ScheduleEvent } from '../types';

/**
 * Label for a whole hour on a 12-hour clock
 * @param hour - Hour 0-23
 * @returns e.g. 0 => "12:00 AM", 9 => "9:00 AM", 12 => "12:00 PM", 18 => "6:00 PM"
 */
export function formatHour12h(hour: number): string {
  if (hour === 0) return '12:00 AM';
  if (hour < 12) return `${hour}:00 AM`;
  if (hour === 12) return '12:00 PM';
  return `${hour - 12}:00 PM`;
}

/**
 * Time range as shown inside an event block, using the text as entered
 */
export function formatEventTimeRange(event: Pick<ScheduleEvent, 'startText' | 'endText'>): string {
  return `${event.startText} - ${event.endText}`;
}

/**
 * Integer hours from startHour through endHour, inclusive
 */
export function hourRange(startHour: number, endHour: number): number[] {
  const hours: number[] = [];
  for (let hour = startHour; hour <= endHour; hour++) {
    hours.push(hour);
  }
  return hours;
}
