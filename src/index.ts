// Event list and document export
export {
  ScheduleGenerator,
  generateDocument,
  type ScheduleGeneratorOptions,
  type DocumentGenerationOptions,
} from './ScheduleGenerator';

// Parsing, colors and validation
export { parseTime, toFloatHours, applyMeridiem, TIME_FORMAT_HINT } from './utils/timeParser';
export {
  TextColor,
  type Rgb,
  LUMINANCE_THRESHOLD,
  DEFAULT_COLOR_NAME,
  DEFAULT_COLOR_HEX,
  CUSTOM_COLOR_NAME,
  DEFAULT_COLOR_PRESETS,
  parseHexColor,
  isHexColor,
  normalizeHexColor,
  relativeLuminance,
  textColorForLuminance,
  pickTextColor,
  withCustomColor,
  resolveColor,
} from './utils/color';
export { isDayOfWeek, validateEventInput, validateConfig, type ValidatedEventInput } from './utils/validators';
export { formatHour12h, formatEventTimeRange } from './utils/layoutHelpers';

// Geometry and rendering (for advanced usage)
export * from './layout';
export * from './pdf';

// Shared types
export * from './types';
export { ScheduleError, ScheduleErrorCode, isScheduleError } from './types/errors';
export type { Result } from './types/internal';
