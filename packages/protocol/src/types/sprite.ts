import type { Color565 } from './pixel.js';

/**
 * Playback metadata for one animated sprite
 */
export interface AnimConfig {
  frameDelayMs: number;  // positive integer
  loop: boolean;
}

/**
 * Name -> playback metadata
 */
export type AnimConfigTable = ReadonlyMap<string, AnimConfig>;

/**
 * Read side of a frame. Implemented by FrameBuffer in @pixelpet/codec;
 * declared here so the catalog types don't depend on the codec package.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly pixels: readonly Color565[];
}

/**
 * One named animation. Frozen once built, replaced whole, never edited.
 */
export interface AnimationEntry<F extends Frame = Frame> {
  readonly name: string;
  readonly frames: readonly F[];  // non-empty, all the same size
  readonly frameDelayMs: number;
  readonly loop: boolean;
}

/**
 * Catalog position. A `missing` slot keeps its place in a fixed name
 * enumeration when no source produced that sprite.
 */
export type CatalogSlot<F extends Frame = Frame> =
  | { kind: 'entry'; entry: AnimationEntry<F> }
  | { kind: 'missing'; name: string };

/**
 * Outcome for one sprite in a batch conversion
 */
export type SpriteReport =
  | { name: string; status: 'converted'; frameCount: number; source?: string }
  | { name: string; status: 'missing'; source?: string }
  | { name: string; status: 'failed'; error: Error; source?: string }
  | { name: string; status: 'skipped'; reason: string; source?: string };
