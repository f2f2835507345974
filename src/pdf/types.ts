/**
 * PDF-specific types for the schedule document renderer
 */

import type { Color } from '../layout/types';

/**
 * Font for PDF text rendering (standard Helvetica family)
 */
export interface FontSpec {
  size: number;
  bold?: boolean;
}

export type TextAlign = 'left' | 'center' | 'right';

/**
 * A rectangle in page points, anchored at its top-left corner
 */
export interface PageRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PageMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Theme colors for document rendering
 */
export interface DocumentTheme {
  // Header band
  headerBackgroundColor: Color;
  headerBorderColor: Color;
  headerTextColor: Color;
  headerBorderWidth: number;

  // Grid
  gridLineColor: Color;
  gridLineWidth: number;
  timeTextColor: Color;

  // Events
  eventBorderColor: Color;
  eventBorderWidth: number;
  /** Fill opacity of event blocks (0-1) */
  eventOpacity: number;

  // Page text
  titleTextColor: Color;
  footerTextColor: Color;
}

/**
 * Page setup for the rendered document
 */
export interface PageSetup {
  /** pdfkit paper size name */
  size: string;
  /** Space around the grid, leaving room for the title and footer */
  margins: PageMargins;
  /** Distance from the page top to the title's center */
  titleOffset: number;
  /** Distance from the page bottom to the footer's center */
  footerOffset: number;
}
