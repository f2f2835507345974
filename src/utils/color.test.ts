import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_COLOR_PRESETS,
  TextColor,
  normalizeHexColor,
  parseHexColor,
  pickTextColor,
  relativeLuminance,
  resolveColor,
  textColorForLuminance,
  withCustomColor,
} from './color';
import { ScheduleError, ScheduleErrorCode } from '../types/errors';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('pickTextColor', () => {
  it('uses white on black and black on white', () => {
    expect(pickTextColor('#000000')).toBe(TextColor.White);
    expect(pickTextColor('#FFFFFF')).toBe(TextColor.Black);
    expect(pickTextColor('ffffff')).toBe(TextColor.Black);
  });

  it('keeps white text at exactly the threshold', () => {
    expect(relativeLuminance({ r: 16, g: 164, b: 232 })).toBe(127.5);
    expect(pickTextColor('#10a4e8')).toBe(TextColor.White);
    expect(textColorForLuminance(127.5)).toBe(TextColor.White);
    expect(textColorForLuminance(127.51)).toBe(TextColor.Black);
  });

  it('weights green most heavily', () => {
    expect(relativeLuminance({ r: 52, g: 152, b: 219 })).toBeCloseTo(129.738, 3);
    expect(pickTextColor('#3498db')).toBe(TextColor.Black);
    expect(pickTextColor('#002d62')).toBe(TextColor.White);
    expect(pickTextColor('#ffc423')).toBe(TextColor.Black);
  });

  it('throws InvalidColorFormat for malformed hex', () => {
    for (const bad of ['#12345', 'zzzzzz', '##123456', '#1234567', '']) {
      let thrown: unknown;
      try {
        pickTextColor(bad);
      } catch (error) {
        thrown = error;
      }
      expect(thrown).toBeInstanceOf(ScheduleError);
      if (thrown instanceof ScheduleError) {
        expect(thrown.code).toBe(ScheduleErrorCode.InvalidColorFormat);
      }
    }
  });
});

describe('parseHexColor', () => {
  it('decodes channels with or without the leading #', () => {
    expect(parseHexColor('#3498db')).toEqual({ success: true, data: { r: 52, g: 152, b: 219 } });
    expect(parseHexColor('FF0080')).toEqual({ success: true, data: { r: 255, g: 0, b: 128 } });
  });

  it('reports the rejected value', () => {
    const result = parseHexColor('#12');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Invalid color: #12. Expected six hex digits such as '#3498db'");
  });
});

describe('normalizeHexColor', () => {
  it('lower-cases and adds the #', () => {
    expect(normalizeHexColor('ABCDEF')).toBe('#abcdef');
    expect(normalizeHexColor('#A1B2C3')).toBe('#a1b2c3');
  });
});

describe('withCustomColor', () => {
  it('returns a new table with a Custom entry', () => {
    const result = withCustomColor(DEFAULT_COLOR_PRESETS, '#ABCDEF');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.Custom).toBe('#abcdef');
    expect(result.data.Gold).toBe('#ffc423');
    expect(Object.prototype.hasOwnProperty.call(DEFAULT_COLOR_PRESETS, 'Custom')).toBe(false);
  });

  it('rejects a malformed custom color', () => {
    const result = withCustomColor(DEFAULT_COLOR_PRESETS, 'blue-ish');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ScheduleErrorCode.InvalidColorFormat);
  });
});

describe('resolveColor', () => {
  it('looks up preset names', () => {
    expect(resolveColor('Green')).toEqual({ name: 'Green', hex: '#27ae60' });
    expect(resolveColor('Navy')).toEqual({ name: 'Navy', hex: '#002d62' });
  });

  it('takes a bare hex value as a custom color', () => {
    expect(resolveColor('#FF0000')).toEqual({ name: 'Custom', hex: '#ff0000' });
  });

  it('falls back to Blue and warns for unknown names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(resolveColor('Magenta')).toEqual({ name: 'Blue', hex: '#3498db' });
    expect(resolveColor('toString')).toEqual({ name: 'Blue', hex: '#3498db' });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Unknown color "Magenta", using Blue');
  });

  it('resolves against a caller-supplied table', () => {
    const presets = { Brand: '#123ABC' };
    expect(resolveColor('Brand', presets)).toEqual({ name: 'Brand', hex: '#123abc' });
  });
});
