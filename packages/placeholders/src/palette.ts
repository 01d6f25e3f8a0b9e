import type { Color565 } from '@pixelpet/protocol';
import { encode565 } from '@pixelpet/codec';

// Pixel art palette - limited colors for retro look
export const PALETTE = {
  white: encode565(255, 255, 255),
  cream: encode565(255, 240, 220),
  lightGray: encode565(200, 200, 200),
  darkGray: encode565(80, 80, 80),
  black: encode565(20, 20, 20),
  red: encode565(255, 60, 60),
  darkRed: encode565(180, 30, 30),
  green: encode565(60, 200, 60),
  blue: encode565(80, 120, 255),
  lightBlue: encode565(150, 200, 255),
  yellow: encode565(255, 220, 50),
  orange: encode565(255, 160, 40),
  pink: encode565(255, 150, 180),
  lightPink: encode565(255, 200, 220),
  purple: encode565(180, 100, 255),
  lightPurple: encode565(220, 180, 255),
  cyan: encode565(80, 220, 220),
  brown: encode565(160, 100, 40),
  lightBrown: encode565(200, 140, 80),
  teal: encode565(50, 180, 160),
  sickBody: encode565(180, 220, 150),
  sickOutline: encode565(100, 150, 80),
} as const satisfies Record<string, Color565>;

export type PaletteColor = keyof typeof PALETTE;
