import type { ColorPresets } from '../types';
import { ScheduleError, ScheduleErrorCode } from '../types/errors';
import type { Result } from '../types/internal';

/**
 * Foreground colors chosen for event text
 */
export enum TextColor {
  Black = '#000000',
  White = '#ffffff'
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Perceived brightness above which dark text is used (0-255 scale)
 */
export const LUMINANCE_THRESHOLD = 127.5;

export const DEFAULT_COLOR_NAME = 'Blue';

export const DEFAULT_COLOR_HEX = '#3498db';

export const CUSTOM_COLOR_NAME = 'Custom';

/**
 * Built-in color picker presets
 */
export const DEFAULT_COLOR_PRESETS: ColorPresets = {
  Gold: '#ffc423',
  Navy: '#002d62',
  Blue: DEFAULT_COLOR_HEX,
  Orange: '#e67e22',
  Green: '#27ae60',
  Purple: '#9b59b6',
  Red: '#e74c3c',
  Teal: '#1abc9c',
  Yellow: '#f1c40f',
  Gray: '#7f8c8d',
};

const HEX_PATTERN = /^[0-9a-fA-F]{6}$/;

/**
 * Decode "#rrggbb" or "rrggbb" into channels
 */
export function parseHexColor(hex: string): Result<Rgb, ScheduleError> {
  const digits = hex.startsWith('#') ? hex.slice(1) : hex;
  if (!HEX_PATTERN.test(digits)) {
    return {
      success: false,
      error: new ScheduleError(
        ScheduleErrorCode.InvalidColorFormat,
        `Invalid color: ${hex}. Expected six hex digits such as '#3498db'`,
        [{ field: 'color', message: 'Expected #RRGGBB', value: hex }]
      ),
    };
  }

  return {
    success: true,
    data: {
      r: parseInt(digits.slice(0, 2), 16),
      g: parseInt(digits.slice(2, 4), 16),
      b: parseInt(digits.slice(4, 6), 16),
    },
  };
}

export function isHexColor(value: string): boolean {
  return parseHexColor(value).success;
}

/**
 * Lower-case, "#"-prefixed form of a valid hex color
 */
export function normalizeHexColor(hex: string): string {
  const digits = hex.startsWith('#') ? hex.slice(1) : hex;
  return `#${digits.toLowerCase()}`;
}

export function relativeLuminance({ r, g, b }: Rgb): number {
  return (0.299 * r) + (0.587 * g) + (0.114 * b);
}

export function textColorForLuminance(luminance: number): TextColor {
  return luminance > LUMINANCE_THRESHOLD ? TextColor.Black : TextColor.White;
}

/**
 * Pick legible text color for a background
 * @param hexColor - Background color, e.g. "#70CCD1" or "70CCD1"
 * @throws ScheduleError (InvalidColorFormat) for malformed hex
 */
export function pickTextColor(hexColor: string): TextColor {
  const parsed = parseHexColor(hexColor);
  if (!parsed.success) {
    throw parsed.error;
  }
  return textColorForLuminance(relativeLuminance(parsed.data));
}

/**
 * Return a copy of the presets with a "Custom" entry for the given color
 */
export function withCustomColor(
  presets: ColorPresets,
  hex: string
): Result<ColorPresets, ScheduleError> {
  const parsed = parseHexColor(hex);
  if (!parsed.success) return parsed;

  return {
    success: true,
    data: { ...presets, [CUSTOM_COLOR_NAME]: normalizeHexColor(hex) },
  };
}

/**
 * Resolve a picker value to a hex color.
 * Preset names win; a bare hex value is taken as-is; anything else falls back
 * to the default preset.
 */
export function resolveColor(
  nameOrHex: string,
  presets: ColorPresets = DEFAULT_COLOR_PRESETS
): { name: string; hex: string } {
  if (Object.prototype.hasOwnProperty.call(presets, nameOrHex) && isHexColor(presets[nameOrHex])) {
    return { name: nameOrHex, hex: normalizeHexColor(presets[nameOrHex]) };
  }

  if (isHexColor(nameOrHex)) {
    return { name: CUSTOM_COLOR_NAME, hex: normalizeHexColor(nameOrHex) };
  }

  console.warn(`Unknown color "${nameOrHex}", using ${DEFAULT_COLOR_NAME}`);
  return { name: DEFAULT_COLOR_NAME, hex: DEFAULT_COLOR_HEX };
}
