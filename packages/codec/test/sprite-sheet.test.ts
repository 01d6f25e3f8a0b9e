import type { RasterImage } from '@pixelpet/protocol';
import { composeSheet, scaleRaster, sliceCells, splitSheet } from '../src/sheet/sprite-sheet.js';
import { FrameBuffer } from '../src/frame/frame-buffer.js';
import { DimensionMismatchError, EmptySheetError } from '../src/errors.js';

type RGBA = readonly [number, number, number, number];

function blankRaster(width: number, height: number): RasterImage {
  return { width, height, data: new Uint8Array(width * height * 4) };
}

function fillRect(image: RasterImage, x0: number, y0: number, w: number, h: number, color: RGBA): void {
  for (let y = y0; y < y0 + h; y++) {
    for (let x = x0; x < x0 + w; x++) {
      image.data.set(color, (y * image.width + x) * 4);
    }
  }
}

const WHITE: RGBA = [255, 255, 255, 255];
const BLACK: RGBA = [0, 0, 0, 255];
const MOSS: RGBA = [33, 65, 33, 255];
const RED: RGBA = [255, 0, 0, 255];

describe('splitSheet', () => {
  test('a strip three frames wide yields three frames in order', () => {
    const sheet = blankRaster(72, 24);
    fillRect(sheet, 0, 0, 24, 24, WHITE);
    fillRect(sheet, 24, 0, 24, 24, BLACK);
    fillRect(sheet, 48, 0, 24, 24, MOSS);

    const frames = splitSheet(sheet, 24, 24);
    expect(frames).toHaveLength(3);
    expect(frames.map((f) => f.pixelAt(5, 5))).toEqual([0xffff, 0x0000, 0x2204]);
    expect(frames.every((f) => f.width === 24 && f.height === 24)).toBe(true);
  });

  test('a grid is read row-major', () => {
    const sheet = blankRaster(4, 4);
    fillRect(sheet, 0, 0, 2, 2, WHITE);
    fillRect(sheet, 2, 0, 2, 2, BLACK);
    fillRect(sheet, 0, 2, 2, 2, MOSS);
    fillRect(sheet, 2, 2, 2, 2, RED);

    const frames = splitSheet(sheet, 2, 2);
    expect(frames.map((f) => f.pixels[0])).toEqual([0xffff, 0x0000, 0x2204, 0xf800]);
  });

  test('partial cells at the right and bottom are ignored', () => {
    expect(splitSheet(blankRaster(50, 30), 24, 24)).toHaveLength(2);
  });

  test('columns limits how many cells each row contributes', () => {
    const sheet = blankRaster(72, 48);
    expect(splitSheet(sheet, 24, 24, { columns: 1 })).toHaveLength(2);
    expect(() => splitSheet(sheet, 24, 24, { columns: 4 })).toThrow(DimensionMismatchError);
  });

  test('applies the color key to every frame', () => {
    const sheet = blankRaster(2, 1);
    fillRect(sheet, 0, 0, 2, 1, [255, 0, 255, 255]);
    const frames = splitSheet(sheet, 1, 1, { colorKey: { r: 255, g: 0, b: 255 } });
    expect(frames.map((f) => f.pixels[0])).toEqual([0xf81f, 0xf81f]);
  });

  test('an image smaller than one frame is an empty sheet', () => {
    expect(() => splitSheet(blankRaster(10, 10), 24, 24)).toThrow(EmptySheetError);
    expect(() => splitSheet(blankRaster(10, 10), 24, 24)).toThrow('Image 10x10 is smaller than frame size 24x24');
  });

  test('rejects image data that does not match its size', () => {
    const broken = { width: 4, height: 4, data: new Uint8Array(10) };
    expect(() => sliceCells(broken, 2, 2)).toThrow(DimensionMismatchError);
  });
});

describe('composeSheet', () => {
  test('composing split frames reproduces an exact-color strip', () => {
    const sheet = blankRaster(6, 3);
    fillRect(sheet, 0, 0, 3, 3, WHITE);
    fillRect(sheet, 1, 1, 1, 1, MOSS);
    fillRect(sheet, 3, 0, 3, 2, BLACK);
    // last row of the second frame stays fully transparent

    const composed = composeSheet(splitSheet(sheet, 3, 3));
    expect(composed.width).toBe(6);
    expect(composed.height).toBe(3);
    expect(Array.from(composed.data)).toEqual(Array.from(sheet.data));
  });

  test('rejects an empty list', () => {
    expect(() => composeSheet([])).toThrow(DimensionMismatchError);
  });

  test('rejects frames of different sizes', () => {
    const a = FrameBuffer.fromPixels([0, 0, 0, 0], 2, 2);
    const b = FrameBuffer.fromPixels([0, 0], 2, 1);
    expect(() => composeSheet([a, b])).toThrow(DimensionMismatchError);
  });
});

describe('scaleRaster', () => {
  test('repeats each pixel factor times in both directions', () => {
    const image: RasterImage = { width: 2, height: 1, data: new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]) };
    const scaled = scaleRaster(image, 2);
    expect(scaled.width).toBe(4);
    expect(scaled.height).toBe(2);
    expect(Array.from(scaled.data)).toEqual([
      1, 2, 3, 4, 1, 2, 3, 4, 5, 6, 7, 8, 5, 6, 7, 8,
      1, 2, 3, 4, 1, 2, 3, 4, 5, 6, 7, 8, 5, 6, 7, 8,
    ]);
  });

  test('factor 1 returns the image unchanged', () => {
    const image = blankRaster(2, 2);
    expect(scaleRaster(image, 1)).toBe(image);
  });

  test('rejects factors that are not positive integers', () => {
    expect(() => scaleRaster(blankRaster(1, 1), 0)).toThrow(RangeError);
    expect(() => scaleRaster(blankRaster(1, 1), 1.5)).toThrow(RangeError);
  });
});
