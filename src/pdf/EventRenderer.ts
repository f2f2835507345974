/**
 * Event Renderer - Renders schedule events as filled blocks with a label stack
 */

import type { EventLayout, ScheduleLayout } from '../layout/types';
import type { FontSpec } from './types';
import { PdfRenderer } from './PdfRenderer';

/**
 * Configuration for event rendering
 */
export interface EventRendererConfig {
  /** Title font */
  titleFont: FontSpec;
  /** Font for the time range and location */
  detailFont: FontSpec;
  /** Horizontal padding inside events (layout units) */
  padding: number;
}

const DEFAULT_CONFIG: EventRendererConfig = {
  titleFont: { size: 11, bold: true },
  detailFont: { size: 9 },
  padding: 0.05,
};

/**
 * EventRenderer handles rendering of schedule events
 */
export class EventRenderer {
  private renderer: PdfRenderer;
  private config: EventRendererConfig;

  constructor(renderer: PdfRenderer, config: Partial<EventRendererConfig> = {}) {
    this.renderer = renderer;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Render all events in list order; later events paint over earlier ones
   */
  render(layout: ScheduleLayout): void {
    for (const eventLayout of layout.events) {
      this.renderEvent(eventLayout);
    }
  }

  /**
   * Render a single event
   */
  renderEvent(eventLayout: EventLayout): void {
    const { bounds, backgroundColor, textColor, labels } = eventLayout;
    const theme = this.renderer.getTheme();

    this.renderer.fillAndStrokeRect(
      bounds,
      backgroundColor,
      theme.eventBorderColor,
      theme.eventBorderWidth,
      theme.eventOpacity
    );

    const maxWidth = bounds.width - this.config.padding * 2;
    for (const label of labels) {
      this.renderer.drawText(
        label.text,
        label.position,
        textColor,
        label.bold ? this.config.titleFont : this.config.detailFont,
        'center',
        maxWidth
      );
    }
  }
}
