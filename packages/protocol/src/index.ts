// Types
export type { RGB, Color565, RasterImage, Point } from './types/pixel.js';
export type {
  AnimConfig,
  AnimConfigTable,
  Frame,
  AnimationEntry,
  CatalogSlot,
  SpriteReport,
} from './types/sprite.js';

// Constants
export * from './constants.js';
