/**
 * Grid Renderer - Renders grid lines, day headers, and time axis labels
 */

import type { ScheduleLayout, DayLayout } from '../layout/types';
import type { DocumentTheme, FontSpec } from './types';
import { PdfRenderer } from './PdfRenderer';

/**
 * Configuration for grid rendering
 */
export interface GridRendererConfig {
  /** Show hour and day grid lines */
  showGridLines: boolean;
  /** Header font */
  headerFont: FontSpec;
  /** Time label font */
  timeFont: FontSpec;
}

const DEFAULT_CONFIG: GridRendererConfig = {
  showGridLines: true,
  headerFont: { size: 14, bold: true },
  timeFont: { size: 11 },
};

/**
 * GridRenderer handles rendering of the schedule grid structure
 */
export class GridRenderer {
  private renderer: PdfRenderer;
  private config: GridRendererConfig;

  constructor(renderer: PdfRenderer, config: Partial<GridRendererConfig> = {}) {
    this.renderer = renderer;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Render complete grid. Lines go first so that events drawn later cover them.
   */
  render(layout: ScheduleLayout): void {
    const theme = this.renderer.getTheme();

    if (this.config.showGridLines) {
      this.renderGridLines(layout, theme);
    }

    this.renderTimeAxis(layout, theme);

    for (const day of layout.headers) {
      this.renderHeader(day, theme);
    }
  }

  /**
   * Render hour lines and day separator lines
   */
  renderGridLines(layout: ScheduleLayout, theme: DocumentTheme): void {
    for (const line of layout.hourLines) {
      this.renderer.drawLine(line.lineStart, line.lineEnd, theme.gridLineColor, theme.gridLineWidth);
    }

    for (const line of layout.dayLines) {
      this.renderer.drawLine(line.lineStart, line.lineEnd, theme.gridLineColor, theme.gridLineWidth);
    }
  }

  /**
   * Render hour labels, right-aligned in the left margin
   */
  private renderTimeAxis(layout: ScheduleLayout, theme: DocumentTheme): void {
    for (const line of layout.hourLines) {
      this.renderer.drawText(
        line.label,
        line.labelPosition,
        theme.timeTextColor,
        this.config.timeFont,
        'right'
      );
    }
  }

  /**
   * Render one day header cell with its centered label
   */
  private renderHeader(day: DayLayout, theme: DocumentTheme): void {
    const bounds = day.headerBounds;
    this.renderer.fillAndStrokeRect(
      bounds,
      theme.headerBackgroundColor,
      theme.headerBorderColor,
      theme.headerBorderWidth
    );
    this.renderer.drawText(
      day.label,
      { x: bounds.x + bounds.width / 2, y: bounds.y + bounds.height / 2 },
      theme.headerTextColor,
      this.config.headerFont,
      'center',
      bounds.width
    );
  }
}
