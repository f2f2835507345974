/**
 * Geometry types produced by the layout engine.
 *
 * All values are in layout units. The vertical axis is inverted: y grows
 * upward, so earlier hours have larger y values and sit at the top of the page.
 */

import type { ScheduleEvent, DayOfWeek } from '../types';
import type { TextColor } from '../utils/color';

/**
 * A rectangle anchored at its lower-left corner
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Color definition - hex string
 */
export type Color = string;

/**
 * Header cell and content column for one selected day
 */
export interface DayLayout {
  day: DayOfWeek;
  /** Upper-case day name shown in the header */
  label: string;
  /** Day index (0-based) in the selected days */
  index: number;
  headerBounds: Rect;
}

/**
 * Horizontal grid line at a whole hour
 */
export interface HourLineLayout {
  hour: number;
  /** 12-hour label, e.g. "9:00 AM" */
  label: string;
  y: number;
  lineStart: Point;
  lineEnd: Point;
  /** Right edge of the label in the left margin */
  labelPosition: Point;
}

/**
 * Vertical line on a day column boundary
 */
export interface DayLineLayout {
  /** Boundary index, 0 through the number of days */
  index: number;
  x: number;
  lineStart: Point;
  lineEnd: Point;
}

export type EventLabelRole = 'title' | 'time' | 'location';

/**
 * One line of text inside an event block, centered on `position`
 */
export interface EventLabel {
  role: EventLabelRole;
  text: string;
  position: Point;
  bold: boolean;
}

/**
 * Computed layout for a single event
 */
export interface EventLayout {
  /** The placed event */
  event: ScheduleEvent;
  bounds: Rect;
  backgroundColor: Color;
  textColor: TextColor;
  /** Title, time range, then location when present */
  labels: EventLabel[];
}

/**
 * Complete computed layout for one schedule page
 */
export interface ScheduleLayout {
  headers: DayLayout[];
  hourLines: HourLineLayout[];
  dayLines: DayLineLayout[];
  /** Placed events, in list order (later events occlude earlier ones) */
  events: EventLayout[];

  /** Area covered by day columns, from the last hour (y = 0) to the first */
  gridBounds: Rect;

  /** Full extents, including time labels, header band and margins */
  bounds: Rect;

  timeHeight: number;
  totalHours: number;
  startHour: number;
  endHour: number;
}
