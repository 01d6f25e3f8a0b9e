/**
 * RGB color for a single opaque pixel
 */
export interface RGB {
  r: number; // 0-255
  g: number; // 0-255
  b: number; // 0-255
}

/**
 * Packed 16-bit color: 5 bits red, 6 bits green, 5 bits blue
 */
export type Color565 = number;

/**
 * Decoded raster image - RGBA, 4 bytes per pixel, row-major from the top-left.
 * Same layout sharp hands back from `.ensureAlpha().raw()`.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Anchor point for shape drawing, in frame pixels
 */
export interface Point {
  x: number;
  y: number;
}
