import type { RGB, Color565 } from '@pixelpet/protocol';
import { TRANSPARENT_565, TRANSPARENT_FALLBACK_565 } from '@pixelpet/protocol';
import { InvalidColorComponentError } from '../errors.js';

function checkComponent(channel: 'r' | 'g' | 'b', value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new InvalidColorComponentError(channel, value);
  }
}

/**
 * Convert 8-bit RGB to RGB565 by truncating the low bits.
 * Never returns the transparent key: opaque magenta moves one bit over.
 */
export function encode565(r: number, g: number, b: number): Color565 {
  checkComponent('r', r);
  checkComponent('g', g);
  checkComponent('b', b);

  const value = ((r >> 3) << 11) | ((g >> 2) << 5) | (b >> 3);
  return value === TRANSPARENT_565 ? TRANSPARENT_FALLBACK_565 : value;
}

/**
 * Convert RGB565 back to 8-bit RGB.
 * High bits are replicated into the truncated low bits so full-scale
 * channels come back as 255. Callers handle the transparent key first.
 */
export function decode565(value: Color565): RGB {
  const r5 = (value >> 11) & 0x1f;
  const g6 = (value >> 5) & 0x3f;
  const b5 = value & 0x1f;

  return {
    r: (r5 << 3) | (r5 >> 2),
    g: (g6 << 2) | (g6 >> 4),
    b: (b5 << 3) | (b5 >> 2),
  };
}

export function isTransparent(value: Color565): boolean {
  return value === TRANSPARENT_565;
}

/**
 * Format a packed color the way the header writes it (0xF81F)
 */
export function formatHex565(value: Color565): string {
  return `0x${value.toString(16).toUpperCase().padStart(4, '0')}`;
}
