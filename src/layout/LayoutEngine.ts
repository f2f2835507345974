/**
 * Layout Engine for the weekly grid
 * Computes positions for headers, grid lines and event blocks in a single pass
 */

import type { ScheduleEvent, ScheduleConfig } from '../types';
import { getDayName, SCHEDULE_START_HOUR } from '../types';
import { ScheduleError } from '../types/errors';
import type { Result } from '../types/internal';
import { parseHexColor, pickTextColor } from '../utils/color';
import { validateConfig } from '../utils/validators';
import { formatEventTimeRange, formatHour12h, hourRange } from '../utils/layoutHelpers';
import type {
  ScheduleLayout,
  EventLayout,
  EventLabel,
  DayLayout,
  HourLineLayout,
  DayLineLayout,
  Rect,
} from './types';

/**
 * Layout dimensions configuration (layout units)
 */
export interface LayoutDimensions {
  /** Width of each day column */
  dayWidth: number;
  /** Height of one hour on the time axis */
  hourHeight: number;
  /** Height of the day header band */
  headerHeight: number;
  /** Horizontal inset of event blocks inside their column */
  eventInset: number;
  /** Gap between the grid's left edge and the right edge of hour labels */
  timeLabelOffset: number;
  /** Space left of the grid for hour labels */
  leftMargin: number;
  rightMargin: number;
  bottomMargin: number;
  /** Space above the header band */
  topMargin: number;
}

export const DEFAULT_DIMENSIONS: LayoutDimensions = {
  dayWidth: 2.0,
  hourHeight: 0.8,
  headerHeight: 0.8,
  eventInset: 0.05,
  timeLabelOffset: 0.15,
  leftMargin: 0.8,
  rightMargin: 0.2,
  bottomMargin: 0.5,
  topMargin: 0.5,
};

/**
 * Vertical offsets of the event label stack, as fractions of block height
 * measured from the block's center
 */
export const EVENT_LABEL_OFFSETS = {
  title: 0.15,
  time: -0.10,
  location: -0.30,
} as const;

/**
 * LayoutEngine computes geometry for a schedule page
 */
export class LayoutEngine {
  private dimensions: LayoutDimensions;

  constructor(dimensions: Partial<LayoutDimensions> = {}) {
    this.dimensions = { ...DEFAULT_DIMENSIONS, ...dimensions };
  }

  /**
   * Update dimensions
   */
  updateDimensions(dimensions: Partial<LayoutDimensions>): void {
    this.dimensions = { ...this.dimensions, ...dimensions };
  }

  getDimensions(): LayoutDimensions {
    return this.dimensions;
  }

  /**
   * Map a float hour onto the inverted vertical axis.
   * startHour maps to the top of the grid (y = timeHeight), endHour to y = 0.
   */
  timeToY(hours: number, startHour: number, endHour: number): number {
    const totalHours = endHour - startHour;
    const timeHeight = totalHours * this.dimensions.hourHeight;
    return timeHeight - (hours - startHour) * (timeHeight / totalHours);
  }

  /**
   * Compute complete layout for the schedule
   * @param events - Events in display order. Events on unselected days, or wholly
   * outside the hour window, are skipped.
   * @param config - Selected days and hour range
   */
  computeLayout(events: ScheduleEvent[], config: ScheduleConfig): Result<ScheduleLayout, ScheduleError> {
    const validation = validateConfig(config);
    if (!validation.success) return validation;

    for (const event of events) {
      const color = parseHexColor(event.color);
      if (!color.success) {
        return {
          success: false,
          error: new ScheduleError(
            color.error.code,
            `Event "${event.title}": ${color.error.message}`,
            color.error.details
          ),
        };
      }
    }

    const { dayWidth, headerHeight, leftMargin, rightMargin, bottomMargin, topMargin } = this.dimensions;
    const startHour = config.startHour ?? SCHEDULE_START_HOUR;
    const endHour = config.endHour;
    const totalHours = endHour - startHour;
    const timeHeight = totalHours * this.dimensions.hourHeight;
    const gridWidth = config.days.length * dayWidth;

    const headers = this.computeDayLayouts(config, timeHeight);
    const hourLines = this.computeHourLines(startHour, endHour, gridWidth);
    const dayLines = this.computeDayLines(config.days.length, timeHeight);
    const eventLayouts = this.computeEventLayouts(events, config, startHour, endHour);

    const gridBounds: Rect = { x: 0, y: 0, width: gridWidth, height: timeHeight };
    const bounds: Rect = {
      x: -leftMargin,
      y: -bottomMargin,
      width: gridWidth + leftMargin + rightMargin,
      height: timeHeight + headerHeight + bottomMargin + topMargin,
    };

    return {
      success: true,
      data: {
        headers,
        hourLines,
        dayLines,
        events: eventLayouts,
        gridBounds,
        bounds,
        timeHeight,
        totalHours,
        startHour,
        endHour,
      },
    };
  }

  /**
   * Compute header cell and column for each selected day
   */
  private computeDayLayouts(config: ScheduleConfig, timeHeight: number): DayLayout[] {
    const { dayWidth, headerHeight } = this.dimensions;

    return config.days.map((day, index) => ({
      day,
      index,
      label: getDayName(day).toUpperCase(),
      headerBounds: {
        x: index * dayWidth,
        y: timeHeight,
        width: dayWidth,
        height: headerHeight,
      },
    }));
  }

  /**
   * Compute one horizontal line per whole hour, startHour through endHour
   */
  private computeHourLines(startHour: number, endHour: number, gridWidth: number): HourLineLayout[] {
    return hourRange(startHour, endHour).map(hour => {
      const y = this.timeToY(hour, startHour, endHour);
      return {
        hour,
        label: formatHour12h(hour),
        y,
        lineStart: { x: 0, y },
        lineEnd: { x: gridWidth, y },
        labelPosition: { x: -this.dimensions.timeLabelOffset, y },
      };
    });
  }

  /**
   * Compute vertical lines on every day boundary, including both outer edges
   */
  private computeDayLines(dayCount: number, timeHeight: number): DayLineLayout[] {
    const { dayWidth, headerHeight } = this.dimensions;
    const lines: DayLineLayout[] = [];

    for (let index = 0; index <= dayCount; index++) {
      const x = index * dayWidth;
      lines.push({
        index,
        x,
        lineStart: { x, y: 0 },
        lineEnd: { x, y: timeHeight + headerHeight },
      });
    }

    return lines;
  }

  /**
   * Compute layout for all events on selected days.
   * Overlapping events are not resolved; they keep list order.
   * Blocks are cut to the hour window and dropped when nothing is left.
   */
  private computeEventLayouts(
    events: ScheduleEvent[],
    config: ScheduleConfig,
    startHour: number,
    endHour: number
  ): EventLayout[] {
    const layouts: EventLayout[] = [];

    for (const event of events) {
      const column = config.days.indexOf(event.day);
      if (column === -1) continue;

      const bounds = this.computeEventBounds(event, column, startHour, endHour);
      if (bounds === null) continue;

      layouts.push({
        event,
        bounds,
        backgroundColor: event.color,
        textColor: pickTextColor(event.color),
        labels: this.computeEventLabels(event, column, bounds),
      });
    }

    return layouts;
  }

  /**
   * Compute bounds for a single event, clamped to the grid's vertical extent
   * @returns null when the event lies entirely outside the hour window
   */
  private computeEventBounds(
    event: ScheduleEvent,
    column: number,
    startHour: number,
    endHour: number
  ): Rect | null {
    const { dayWidth, eventInset } = this.dimensions;
    const timeHeight = this.timeToY(startHour, startHour, endHour);
    const startY = Math.min(this.timeToY(event.startTime.toFloatHours(), startHour, endHour), timeHeight);
    const endY = Math.max(this.timeToY(event.endTime.toFloatHours(), startHour, endHour), 0);
    if (startY <= endY) return null;

    // Later times sit lower, so the block spans endY (bottom) to startY (top)
    return {
      x: column * dayWidth + eventInset,
      y: endY,
      width: dayWidth - eventInset * 2,
      height: startY - endY,
    };
  }

  /**
   * Stack title, time range and location around the block's vertical center
   */
  private computeEventLabels(event: ScheduleEvent, column: number, bounds: Rect): EventLabel[] {
    const centerX = column * this.dimensions.dayWidth + this.dimensions.dayWidth / 2;
    const centerY = bounds.y + bounds.height / 2;

    const labels: EventLabel[] = [
      {
        role: 'title',
        text: event.title,
        position: { x: centerX, y: centerY + bounds.height * EVENT_LABEL_OFFSETS.title },
        bold: true,
      },
      {
        role: 'time',
        text: formatEventTimeRange(event),
        position: { x: centerX, y: centerY + bounds.height * EVENT_LABEL_OFFSETS.time },
        bold: false,
      },
    ];

    if (event.location) {
      labels.push({
        role: 'location',
        text: event.location,
        position: { x: centerX, y: centerY + bounds.height * EVENT_LABEL_OFFSETS.location },
        bold: false,
      });
    }

    return labels;
  }
}
