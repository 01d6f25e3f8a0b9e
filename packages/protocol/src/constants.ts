import type { AnimConfig, AnimConfigTable } from './types/sprite.js';

// RGB565 color keys
export const TRANSPARENT_565 = 0xf81f;          // magenta, reserved for "no pixel"
export const TRANSPARENT_FALLBACK_565 = 0xf81e; // opaque magenta lands here instead
export const MAX_565 = 0xffff;

// Raster pixels with alpha below this are treated as transparent
export const ALPHA_THRESHOLD = 128;

// Sprite constants
export const DEFAULT_FRAME_WIDTH = 24;
export const DEFAULT_FRAME_HEIGHT = 24;

// Header naming convention
export const FRAME_ARRAY_PREFIX = 'sprite';        // sprite_<name>_frame<N>
export const FRAME_SEQUENCE_PREFIX = 'frames';     // frames_<name>
export const ANIMATION_TABLE_NAME = 'animatedSprites';
export const SPRITE_COUNT_CONSTANT = 'PET_SPRITE_COUNT';
export const CONFIG_FILE_NAME = 'sprite_config.txt';

/**
 * Sprite identifier enumeration, in the order the firmware's SpriteId enum
 * declares them. Fixes slot order of the generated animation table.
 */
export const SPRITE_NAMES = [
  'egg_idle',
  'baby_idle',
  'teen_idle',
  'adult_idle',
  'elder_idle',
  'ghost',
  'sick',
  'happy',
  'sad',
  'eating',
  'playing',
  'sleeping',
] as const;

export type SpriteName = typeof SPRITE_NAMES[number];

/**
 * Delay/loop used for a name the config table doesn't know
 */
export const FALLBACK_ANIM_CONFIG: AnimConfig = Object.freeze({ frameDelayMs: 500, loop: true });

const anim = (frameDelayMs: number, loop: boolean): AnimConfig => Object.freeze({ frameDelayMs, loop });

/**
 * Built-in playback timings per sprite
 */
export const DEFAULT_ANIM_CONFIG: AnimConfigTable = new Map<string, AnimConfig>([
  ['egg_idle', anim(800, true)],
  ['baby_idle', anim(600, true)],
  ['teen_idle', anim(500, true)],
  ['adult_idle', anim(400, true)],
  ['elder_idle', anim(700, true)],
  ['ghost', anim(500, true)],
  ['sick', anim(1000, true)],
  ['happy', anim(400, true)],
  ['sad', anim(800, true)],
  ['eating', anim(300, false)],
  ['playing', anim(300, false)],
  ['sleeping', anim(1000, true)],
]);
