/**
 * Schedule Document Renderer - Composes grid, events, title and footer into
 * a single landscape PDF page
 */

import type { ScheduleLayout } from '../layout/types';
import type { DocumentTheme, FontSpec, PageSetup } from './types';
import { PdfRenderer, DEFAULT_PAGE } from './PdfRenderer';
import { GridRenderer, type GridRendererConfig } from './GridRenderer';
import { EventRenderer, type EventRendererConfig } from './EventRenderer';

/**
 * Text placed around the grid
 */
export interface DocumentOptions {
  /** Title text before the optional display name */
  heading: string;
  /** Note printed centered at the bottom of the page */
  footer: string;
}

export const DEFAULT_DOCUMENT_OPTIONS: DocumentOptions = {
  heading: 'Weekly Schedule',
  footer: 'Please knock if door is closed during office hours',
};

/**
 * Renderer configuration
 */
export interface ScheduleDocumentRendererConfig {
  page: PageSetup;
  theme: Partial<DocumentTheme>;
  grid: Partial<GridRendererConfig>;
  events: Partial<EventRendererConfig>;
  titleFont: FontSpec;
  footerFont: FontSpec;
}

const DEFAULT_CONFIG: ScheduleDocumentRendererConfig = {
  page: DEFAULT_PAGE,
  theme: {},
  grid: {},
  events: {},
  titleFont: { size: 18, bold: true },
  footerFont: { size: 10 },
};

/**
 * Page title: the heading, followed by " - <name>" when a display name is set
 */
export function buildDocumentTitle(heading: string, displayName?: string): string {
  const name = displayName?.trim() ?? '';
  return name ? `${heading} - ${name}` : heading;
}

/**
 * ScheduleDocumentRenderer paints a computed layout onto one PDF page
 */
export class ScheduleDocumentRenderer {
  private config: ScheduleDocumentRendererConfig;

  constructor(config: Partial<ScheduleDocumentRendererConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Update configuration
   */
  updateConfig(config: Partial<ScheduleDocumentRendererConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Render the layout and resolve with the finished document's bytes
   */
  render(layout: ScheduleLayout, text: { title: string; footer: string }): Promise<Buffer> {
    const renderer = new PdfRenderer(layout.bounds, this.config.page, this.config.theme, text.title);

    // Grid first so events cover the lines
    new GridRenderer(renderer, this.config.grid).render(layout);
    new EventRenderer(renderer, this.config.events).render(layout);

    this.renderPageText(renderer, text.title, text.footer);

    return renderer.end();
  }

  private renderPageText(renderer: PdfRenderer, title: string, footer: string): void {
    const { width, height } = renderer.getSize();
    const theme = renderer.getTheme();
    const page = renderer.getPageSetup();

    if (title) {
      renderer.drawPageText(
        title,
        { x: width / 2, y: page.titleOffset },
        theme.titleTextColor,
        this.config.titleFont,
        'center',
        width - page.margins.left - page.margins.right
      );
    }

    if (footer) {
      renderer.drawPageText(
        footer,
        { x: width / 2, y: height - page.footerOffset },
        theme.footerTextColor,
        this.config.footerFont,
        'center',
        width - page.margins.left - page.margins.right
      );
    }
  }
}
