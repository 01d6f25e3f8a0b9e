import type { RasterImage } from '@pixelpet/protocol';
import { FrameBuffer, type FromRasterOptions } from '../frame/frame-buffer.js';
import { DimensionMismatchError, EmptySheetError } from '../errors.js';

export interface SplitOptions extends FromRasterOptions {
  /** Cells per row to read; defaults to as many as fit */
  columns?: number;
}

/**
 * Copy a rectangular region out of an RGBA image
 */
export function extractRegion(
  image: RasterImage,
  x: number,
  y: number,
  width: number,
  height: number,
): RasterImage {
  const data = new Uint8Array(width * height * 4);
  const rowBytes = width * 4;

  for (let row = 0; row < height; row++) {
    const srcStart = ((y + row) * image.width + x) * 4;
    data.set(image.data.subarray(srcStart, srcStart + rowBytes), row * rowBytes);
  }

  return { width, height, data };
}

/**
 * Cut a sheet into frame-sized cells, row-major (all columns of row 0 first)
 */
export function sliceCells(
  image: RasterImage,
  frameWidth: number,
  frameHeight: number,
  columns?: number,
): RasterImage[] {
  if (image.data.length !== image.width * image.height * 4) {
    throw new DimensionMismatchError(
      image.width * image.height,
      Math.floor(image.data.length / 4),
      `${image.width}x${image.height} image`,
    );
  }

  const maxCols = Math.floor(image.width / frameWidth);
  const cols = columns ?? maxCols;
  const rows = Math.floor(image.height / frameHeight);

  if (cols <= 0 || rows <= 0) {
    throw new EmptySheetError(image.width, image.height, frameWidth, frameHeight);
  }
  if (cols > maxCols) {
    throw new DimensionMismatchError(
      cols * frameWidth,
      image.width,
      `${cols} columns of ${frameWidth}px do not fit a ${image.width}px wide image`,
    );
  }

  const cells: RasterImage[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      cells.push(extractRegion(image, col * frameWidth, row * frameHeight, frameWidth, frameHeight));
    }
  }
  return cells;
}

/**
 * Split a spritesheet into packed frames
 */
export function splitSheet(
  image: RasterImage,
  frameWidth: number,
  frameHeight: number,
  options: SplitOptions = {},
): FrameBuffer[] {
  const { columns, ...rasterOptions } = options;
  return sliceCells(image, frameWidth, frameHeight, columns).map((cell) =>
    FrameBuffer.fromRaster(cell.data, cell.width, cell.height, rasterOptions)
  );
}

/**
 * Lay frames out left to right in a single row. One frame gives a plain
 * one-cell image; this is the shape sheets are written back to disk in.
 */
export function composeSheet(frames: readonly FrameBuffer[]): RasterImage {
  const first = frames[0];
  if (!first) {
    throw new DimensionMismatchError(1, 0, 'cannot compose a sheet from zero frames');
  }

  const { width: frameWidth, height: frameHeight } = first;
  const sheetWidth = frameWidth * frames.length;
  const data = new Uint8Array(sheetWidth * frameHeight * 4);
  const rowBytes = frameWidth * 4;

  frames.forEach((frame, i) => {
    if (frame.width !== frameWidth || frame.height !== frameHeight) {
      throw new DimensionMismatchError(
        frameWidth * frameHeight,
        frame.width * frame.height,
        `frame ${i} is ${frame.width}x${frame.height}, sheet cells are ${frameWidth}x${frameHeight}`,
      );
    }

    const cell = frame.toRaster();
    for (let y = 0; y < frameHeight; y++) {
      const src = cell.data.subarray(y * rowBytes, (y + 1) * rowBytes);
      data.set(src, (y * sheetWidth + i * frameWidth) * 4);
    }
  });

  return { width: sheetWidth, height: frameHeight, data };
}

/**
 * Nearest-neighbour integer upscale, for previews
 */
export function scaleRaster(image: RasterImage, factor: number): RasterImage {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new RangeError(`Scale factor must be a positive integer, got ${factor}`);
  }
  if (factor === 1) return image;

  const width = image.width * factor;
  const height = image.height * factor;
  const data = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    const srcY = Math.floor(y / factor);
    for (let x = 0; x < width; x++) {
      const srcIdx = (srcY * image.width + Math.floor(x / factor)) * 4;
      data.set(image.data.subarray(srcIdx, srcIdx + 4), (y * width + x) * 4);
    }
  }

  return { width, height, data };
}
