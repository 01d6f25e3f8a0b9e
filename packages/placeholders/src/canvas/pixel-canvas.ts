import type { Color565 } from '@pixelpet/protocol';
import { TRANSPARENT_565 } from '@pixelpet/protocol';
import { FrameBuffer } from '@pixelpet/codec';

/**
 * Mutable drawing surface for one frame. Starts fully transparent;
 * writes outside the frame are dropped. Freeze with toFrame().
 */
export class PixelCanvas {
  readonly width: number;
  readonly height: number;
  private pixels: Color565[];

  constructor(width: number, height: number, fill: Color565 = TRANSPARENT_565) {
    this.width = width;
    this.height = height;
    this.pixels = new Array<Color565>(width * height).fill(fill);
  }

  get(x: number, y: number): Color565 | undefined {
    if (!this.contains(x, y)) return undefined;
    return this.pixels[y * this.width + x];
  }

  set(x: number, y: number, color: Color565): void {
    if (!this.contains(x, y)) return;
    this.pixels[y * this.width + x] = color;
  }

  contains(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  toFrame(): FrameBuffer {
    return FrameBuffer.fromPixels(this.pixels, this.width, this.height);
  }
}
