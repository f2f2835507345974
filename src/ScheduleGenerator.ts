import type {
  ColorPresets,
  EventInput,
  EventSummary,
  ScheduleConfig,
  ScheduleEvent,
} from './types';
import { getDayName } from './types';
import type { Result } from './types/internal';
import { ScheduleError, ScheduleErrorCode } from './types/errors';

import { validateEventInput } from './utils/validators';
import { DEFAULT_COLOR_PRESETS, parseHexColor, resolveColor } from './utils/color';
import { formatEventTimeRange } from './utils/layoutHelpers';

import type { ScheduleLayout } from './layout/types';
import { LayoutEngine, type LayoutDimensions } from './layout/LayoutEngine';
import {
  ScheduleDocumentRenderer,
  DEFAULT_DOCUMENT_OPTIONS,
  buildDocumentTitle,
  type DocumentOptions,
  type ScheduleDocumentRendererConfig,
} from './pdf/ScheduleDocumentRenderer';

/**
 * Options shared by the generator and the standalone export function
 */
export interface DocumentGenerationOptions {
  /** Layout dimensions overrides */
  dimensions?: Partial<LayoutDimensions>;
  /** Title heading and footer text */
  document?: Partial<DocumentOptions>;
  /** Page, theme and font overrides */
  renderer?: Partial<ScheduleDocumentRendererConfig>;
}

/**
 * Generator configuration
 */
export interface ScheduleGeneratorOptions extends DocumentGenerationOptions {
  /** Color table used when addEvent is not given one */
  presets?: ColorPresets;
}

/**
 * Weekly schedule generator
 * Owns the ordered event list and exports it as a one-page PDF grid
 */
export class ScheduleGenerator {
  private events: ScheduleEvent[] = [];
  private nextId: number = 1;
  private presets: ColorPresets;
  private documentOptions: DocumentOptions;
  private layoutEngine: LayoutEngine;
  private documentRenderer: ScheduleDocumentRenderer;

  /**
   * Factory method to create a ScheduleGenerator instance with validation
   * @param options - Presets, layout and document configuration
   * @param events - Initial form submissions, added in order
   * @returns Result containing either the generator or the first error
   */
  static create(
    options: ScheduleGeneratorOptions = {},
    events: EventInput[] = []
  ): Result<ScheduleGenerator, ScheduleError> {
    const presets = options.presets ?? DEFAULT_COLOR_PRESETS;
    for (const [name, hex] of Object.entries(presets)) {
      const parsed = parseHexColor(hex);
      if (!parsed.success) {
        return {
          success: false,
          error: new ScheduleError(
            ScheduleErrorCode.InvalidColorFormat,
            `Invalid preset "${name}": ${parsed.error.message}`,
            parsed.error.details
          ),
        };
      }
    }

    const instance = new ScheduleGenerator({ ...options, presets });

    for (const [index, input] of events.entries()) {
      const result = instance.addEvent(input);
      if (!result.success) {
        return {
          success: false,
          error: new ScheduleError(
            result.error.code,
            `events[${index}]: ${result.error.message}`,
            result.error.details
          ),
        };
      }
    }

    return { success: true, data: instance };
  }

  /**
   * Private constructor - use ScheduleGenerator.create() instead
   */
  private constructor(options: ScheduleGeneratorOptions & { presets: ColorPresets }) {
    this.presets = options.presets;
    this.documentOptions = { ...DEFAULT_DOCUMENT_OPTIONS, ...options.document };
    this.layoutEngine = new LayoutEngine(options.dimensions);
    this.documentRenderer = new ScheduleDocumentRenderer(options.renderer);
  }

  // ==================== Public API ====================

  /**
   * Get current events array (copy)
   */
  getEvents(): ScheduleEvent[] {
    return [...this.events];
  }

  getPresets(): ColorPresets {
    return this.presets;
  }

  /**
   * Validate a form submission and append it to the event list
   * @param input - Raw form values
   * @param presets - Color table to resolve `input.color` against
   */
  addEvent(input: EventInput, presets: ColorPresets = this.presets): Result<ScheduleEvent, ScheduleError> {
    const validation = validateEventInput(input);
    if (!validation.success) return validation;

    const color = resolveColor(input.color.trim(), presets);
    const event: ScheduleEvent = {
      id: `event-${this.nextId++}`,
      ...validation.data,
      color: color.hex,
      colorName: color.name,
    };

    this.events.push(event);
    return { success: true, data: event };
  }

  /**
   * Remove the event at a list position
   * @returns The removed event
   */
  deleteEvent(index: number): Result<ScheduleEvent, ScheduleError> {
    if (!Number.isInteger(index) || index < 0 || index >= this.events.length) {
      return {
        success: false,
        error: new ScheduleError(
          ScheduleErrorCode.IndexOutOfRange,
          `No event at index ${index} (have ${this.events.length})`,
          [{ field: 'index', message: 'Index out of range', value: index }]
        ),
      };
    }

    const [removed] = this.events.splice(index, 1);
    return { success: true, data: removed };
  }

  /**
   * Rows for the host's event table, in list order
   */
  summarizeEvents(): EventSummary[] {
    return this.events.map(event => ({
      day: getDayName(event.day),
      time: formatEventTimeRange(event),
      title: event.title,
      location: event.location,
      color: event.colorName,
    }));
  }

  /**
   * Compute the page geometry for the current events
   */
  computeLayout(config: ScheduleConfig): Result<ScheduleLayout, ScheduleError> {
    return this.layoutEngine.computeLayout(this.events, config);
  }

  /**
   * Export the current events as a PDF. Does not change the event list.
   */
  generateDocument(config: ScheduleConfig): Promise<Result<Buffer, ScheduleError>> {
    return renderDocument(
      this.getEvents(),
      config,
      this.layoutEngine,
      this.documentRenderer,
      this.documentOptions
    );
  }
}

/**
 * Export a caller-held event list as a single-page landscape PDF
 */
export function generateDocument(
  events: ScheduleEvent[],
  config: ScheduleConfig,
  options: DocumentGenerationOptions = {}
): Promise<Result<Buffer, ScheduleError>> {
  return renderDocument(
    events,
    config,
    new LayoutEngine(options.dimensions),
    new ScheduleDocumentRenderer(options.renderer),
    { ...DEFAULT_DOCUMENT_OPTIONS, ...options.document }
  );
}

async function renderDocument(
  events: ScheduleEvent[],
  config: ScheduleConfig,
  layoutEngine: LayoutEngine,
  documentRenderer: ScheduleDocumentRenderer,
  documentOptions: DocumentOptions
): Promise<Result<Buffer, ScheduleError>> {
  if (events.length === 0) {
    return {
      success: false,
      error: new ScheduleError(ScheduleErrorCode.NoEventsToExport, 'Please add at least one event'),
    };
  }

  const layout = layoutEngine.computeLayout(events, config);
  if (!layout.success) return layout;

  const omitted = events.length - layout.data.events.length;
  if (omitted > 0) {
    console.warn(`${omitted} event(s) outside the selected days or hours left out of the document`);
  }

  try {
    const bytes = await documentRenderer.render(layout.data, {
      title: buildDocumentTitle(documentOptions.heading, config.displayName),
      footer: documentOptions.footer,
    });
    return { success: true, data: bytes };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      error: new ScheduleError(ScheduleErrorCode.RenderFailed, `Failed to generate PDF: ${message}`),
    };
  }
}
