/**
 * PDF Module
 *
 * Paints a computed layout onto a single landscape page with pdfkit.
 */

// Types
export type {
  FontSpec,
  TextAlign,
  PageRect,
  PageMargins,
  DocumentTheme,
  PageSetup,
} from './types';

// Renderers
export { PdfRenderer, DEFAULT_THEME, DEFAULT_PAGE } from './PdfRenderer';
export { GridRenderer, type GridRendererConfig } from './GridRenderer';
export { EventRenderer, type EventRendererConfig } from './EventRenderer';
export {
  ScheduleDocumentRenderer,
  DEFAULT_DOCUMENT_OPTIONS,
  buildDocumentTitle,
  type DocumentOptions,
  type ScheduleDocumentRendererConfig,
} from './ScheduleDocumentRenderer';
