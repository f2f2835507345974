/**
 * PDF Renderer - Low-level drawing primitives over a pdfkit document
 */

import PDFDocument from 'pdfkit';
import type { Rect, Point, Color } from '../layout/types';
import type { DocumentTheme, FontSpec, PageRect, PageSetup, TextAlign } from './types';

/**
 * Default theme colors
 */
export const DEFAULT_THEME: DocumentTheme = {
  headerBackgroundColor: '#2c3e50',
  headerBorderColor: '#000000',
  headerTextColor: '#ffffff',
  headerBorderWidth: 2,
  gridLineColor: '#d3d3d3',
  gridLineWidth: 0.5,
  timeTextColor: '#000000',
  eventBorderColor: '#a9a9a9',
  eventBorderWidth: 2,
  eventOpacity: 0.8,
  titleTextColor: '#000000',
  footerTextColor: '#808080',
};

export const DEFAULT_PAGE: PageSetup = {
  size: 'LETTER',
  margins: { top: 64, right: 36, bottom: 44, left: 36 },
  titleOffset: 32,
  footerOffset: 20,
};

const REGULAR_FONT = 'Helvetica';
const BOLD_FONT = 'Helvetica-Bold';

/**
 * PdfRenderer draws on a single landscape page.
 *
 * Callers pass layout-unit geometry (y grows upward); the renderer maps the
 * layout's extents onto the plot area between the page margins and flips y.
 */
export class PdfRenderer {
  private doc: PDFKit.PDFDocument;
  private extents: Rect;
  private page: PageSetup;
  private theme: DocumentTheme;
  private scaleX: number;
  private scaleY: number;

  constructor(
    extents: Rect,
    page: PageSetup = DEFAULT_PAGE,
    theme: Partial<DocumentTheme> = {},
    title: string = ''
  ) {
    if (extents.width <= 0 || extents.height <= 0) {
      throw new Error('Layout extents must have a positive size');
    }

    this.doc = new PDFDocument({
      size: page.size,
      layout: 'landscape',
      margin: 0,
      info: { Title: title },
    });
    this.extents = extents;
    this.page = page;
    this.theme = { ...DEFAULT_THEME, ...theme };

    const plot = this.getPlotArea();
    this.scaleX = plot.width / extents.width;
    this.scaleY = plot.height / extents.height;
  }

  /**
   * Page dimensions in points
   */
  getSize(): { width: number; height: number } {
    return { width: this.doc.page.width, height: this.doc.page.height };
  }

  /**
   * Area between the page margins that the layout extents fill
   */
  getPlotArea(): PageRect {
    const { width, height } = this.getSize();
    const { margins } = this.page;
    return {
      x: margins.left,
      y: margins.top,
      width: width - margins.left - margins.right,
      height: height - margins.top - margins.bottom,
    };
  }

  getPageSetup(): PageSetup {
    return this.page;
  }

  getTheme(): DocumentTheme {
    return this.theme;
  }

  /**
   * Convert a layout point to page points
   */
  toPagePoint(point: Point): Point {
    const plot = this.getPlotArea();
    return {
      x: plot.x + (point.x - this.extents.x) * this.scaleX,
      y: plot.y + (this.extents.y + this.extents.height - point.y) * this.scaleY,
    };
  }

  /**
   * Convert a layout rectangle (lower-left anchored) to a page rectangle (top-left anchored)
   */
  toPageRect(rect: Rect): PageRect {
    const topLeft = this.toPagePoint({ x: rect.x, y: rect.y + rect.height });
    return {
      x: topLeft.x,
      y: topLeft.y,
      width: rect.width * this.scaleX,
      height: rect.height * this.scaleY,
    };
  }

  /**
   * Convert a horizontal layout distance to points
   */
  toPageWidth(width: number): number {
    return width * this.scaleX;
  }

  // ==================== Drawing Primitives ====================

  /**
   * Fill a rectangle and stroke its border. Opacity applies to the fill only.
   */
  fillAndStrokeRect(
    rect: Rect,
    fillColor: Color,
    strokeColor: Color,
    lineWidth: number = 1,
    opacity: number = 1
  ): void {
    const r = this.toPageRect(rect);
    this.doc.save();
    this.doc.lineWidth(lineWidth);
    this.doc.fillOpacity(opacity);
    this.doc.rect(r.x, r.y, r.width, r.height).fillAndStroke(fillColor, strokeColor);
    this.doc.restore();
  }

  /**
   * Draw a line
   */
  drawLine(start: Point, end: Point, color: Color, lineWidth: number = 1): void {
    const from = this.toPagePoint(start);
    const to = this.toPagePoint(end);
    this.doc.save();
    this.doc.lineWidth(lineWidth);
    this.doc.moveTo(from.x, from.y).lineTo(to.x, to.y).stroke(color);
    this.doc.restore();
  }

  // ==================== Text Rendering ====================

  /**
   * Set font for text rendering
   */
  setFont(font: FontSpec): void {
    this.doc.font(font.bold ? BOLD_FONT : REGULAR_FONT).fontSize(font.size);
  }

  /**
   * Measure text width in points using the current font
   */
  measureText(text: string): number {
    return this.doc.widthOfString(text);
  }

  /**
   * Draw a single line of text vertically centered on a layout point
   * @param maxWidth - Optional width in layout units; longer text is ellipsized
   */
  drawText(
    text: string,
    at: Point,
    color: Color,
    font: FontSpec,
    align: TextAlign = 'left',
    maxWidth?: number
  ): void {
    const point = this.toPagePoint(at);
    this.drawPageText(text, point, color, font, align, maxWidth === undefined ? undefined : this.toPageWidth(maxWidth));
  }

  /**
   * Draw a single line of text vertically centered on a page point
   * @param maxWidth - Optional width in points
   */
  drawPageText(
    text: string,
    at: Point,
    color: Color,
    font: FontSpec,
    align: TextAlign = 'left',
    maxWidth?: number
  ): void {
    this.setFont(font);
    const displayText = maxWidth === undefined ? text : this.fitText(text, maxWidth);
    if (displayText.length === 0) return;

    const width = this.measureText(displayText);
    const x = align === 'center' ? at.x - width / 2 : align === 'right' ? at.x - width : at.x;
    const y = at.y - this.doc.currentLineHeight() / 2;

    this.doc.fillColor(color).text(displayText, x, y, { lineBreak: false });
  }

  /**
   * Truncate text with an ellipsis so it fits in maxWidth points
   */
  fitText(text: string, maxWidth: number): string {
    if (maxWidth <= 0) return '';
    if (this.measureText(text) <= maxWidth) return text;

    // Binary search for ellipsis position
    let low = 0;
    let high = text.length;

    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      const testWidth = this.measureText(text.slice(0, mid) + '…');

      if (testWidth <= maxWidth) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low > 0 ? text.slice(0, low) + '…' : '…';
  }

  // ==================== Output ====================

  /**
   * Finish the document and collect its bytes
   */
  end(): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      this.doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      this.doc.on('end', () => resolve(Buffer.concat(chunks)));
      this.doc.on('error', reject);
      this.doc.end();
    });
  }
}
