import type { RGB, Color565, Frame, RasterImage } from '@pixelpet/protocol';
import { ALPHA_THRESHOLD, MAX_565, TRANSPARENT_565 } from '@pixelpet/protocol';
import { decode565, encode565 } from '../color/color565.js';
import { DimensionMismatchError, InvalidPixelValueError } from '../errors.js';

export interface FromRasterOptions {
  /** Exact RGB treated as transparent on top of the alpha rule */
  colorKey?: RGB;
}

/**
 * One animation frame: width x height packed colors, row-major.
 * Immutable - build it in a PixelCanvas or from a raster, then freeze here.
 */
export class FrameBuffer implements Frame {
  readonly width: number;
  readonly height: number;
  readonly pixels: readonly Color565[];

  private constructor(width: number, height: number, pixels: Color565[]) {
    this.width = width;
    this.height = height;
    this.pixels = Object.freeze(pixels);
    Object.freeze(this);
  }

  /**
   * Wrap an existing sequence of packed colors
   */
  static fromPixels(pixels: ArrayLike<number>, width: number, height: number): FrameBuffer {
    const expected = width * height;
    if (pixels.length !== expected) {
      throw new DimensionMismatchError(expected, pixels.length, `${width}x${height} frame`);
    }

    const copy: Color565[] = new Array<Color565>(expected);
    for (let i = 0; i < expected; i++) {
      const value = pixels[i] ?? -1;
      if (!Number.isInteger(value) || value < 0 || value > MAX_565) {
        throw new InvalidPixelValueError(i, value);
      }
      copy[i] = value;
    }

    return new FrameBuffer(width, height, copy);
  }

  /**
   * Encode an RGBA buffer. A pixel is transparent when it matches the color
   * key or its alpha is below the threshold; everything else goes through
   * encode565.
   */
  static fromRaster(
    data: Uint8Array,
    width: number,
    height: number,
    options: FromRasterOptions = {},
  ): FrameBuffer {
    const expected = width * height;
    if (data.length !== expected * 4) {
      throw new DimensionMismatchError(expected, Math.floor(data.length / 4), `${width}x${height} raster`);
    }

    const { colorKey } = options;
    const pixels: Color565[] = new Array<Color565>(expected);

    for (let i = 0; i < expected; i++) {
      const idx = i * 4;
      const r = data[idx]!;
      const g = data[idx + 1]!;
      const b = data[idx + 2]!;
      const a = data[idx + 3]!;

      if (colorKey && r === colorKey.r && g === colorKey.g && b === colorKey.b) {
        pixels[i] = TRANSPARENT_565;
      } else if (a < ALPHA_THRESHOLD) {
        pixels[i] = TRANSPARENT_565;
      } else {
        pixels[i] = encode565(r, g, b);
      }
    }

    return new FrameBuffer(width, height, pixels);
  }

  get pixelCount(): number {
    return this.pixels.length;
  }

  pixelAt(x: number, y: number): Color565 | undefined {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return undefined;
    return this.pixels[y * this.width + x];
  }

  /**
   * Decode back to RGBA. The transparent key becomes (0,0,0,0),
   * every other value is fully opaque.
   */
  toRaster(): RasterImage {
    const data = new Uint8Array(this.pixels.length * 4);

    for (let i = 0; i < this.pixels.length; i++) {
      const value = this.pixels[i]!;
      if (value === TRANSPARENT_565) continue; // buffer is zero-filled

      const { r, g, b } = decode565(value);
      const idx = i * 4;
      data[idx] = r;
      data[idx + 1] = g;
      data[idx + 2] = b;
      data[idx + 3] = 255;
    }

    return { width: this.width, height: this.height, data };
  }

  equals(other: Frame): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    if (this.pixels.length !== other.pixels.length) return false;
    for (let i = 0; i < this.pixels.length; i++) {
      if (this.pixels[i] !== other.pixels[i]) return false;
    }
    return true;
  }
}
