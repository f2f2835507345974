/**
 * Layout Module
 *
 * Renderer-independent geometry for the weekly grid.
 */

// Types
export type {
  Rect,
  Point,
  Color,
  DayLayout,
  HourLineLayout,
  DayLineLayout,
  EventLabel,
  EventLabelRole,
  EventLayout,
  ScheduleLayout,
} from './types';

// Layout engine
export { LayoutEngine, DEFAULT_DIMENSIONS, EVENT_LABEL_OFFSETS, type LayoutDimensions } from './LayoutEngine';
