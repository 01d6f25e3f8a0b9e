import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import type { RasterImage } from '@pixelpet/protocol';

/**
 * Ensure an output directory exists
 */
export function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

/**
 * Encode an RGBA raster as PNG bytes
 */
export async function encodePng(image: RasterImage): Promise<Buffer> {
  const buffer = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);

  return sharp(buffer, {
    raw: {
      width: image.width,
      height: image.height,
      channels: 4,
    },
  })
    .png({ compressionLevel: 9 })
    .toBuffer();
}

/**
 * Decode a PNG (file path or bytes) to RGBA. Grayscale and palette
 * images are widened to sRGB so there are always 4 channels.
 */
export async function decodePng(input: string | Buffer): Promise<RasterImage> {
  const { data, info } = await sharp(input)
    .ensureAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Expected 4 channels after decoding, got ${info.channels}`);
  }

  return { width: info.width, height: info.height, data: new Uint8Array(data) };
}

/**
 * Save a raster as a PNG file
 */
export async function saveRasterAsPng(image: RasterImage, filePath: string): Promise<void> {
  ensureDir(path.dirname(filePath));
  const png = await encodePng(image);
  await fs.promises.writeFile(filePath, png);
}

/**
 * Load a PNG file as a raster
 */
export async function loadPngAsRaster(filePath: string): Promise<RasterImage> {
  return decodePng(filePath);
}

/**
 * Load a PNG that may not exist. Missing files give null; anything
 * else that goes wrong is returned as the Error so a batch can keep going.
 */
export async function loadPngIfExists(filePath: string): Promise<RasterImage | Error | null> {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    return await loadPngAsRaster(filePath);
  } catch (error) {
    console.error(`[PNG] Failed to read ${filePath}:`, error);
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * PNG files in a directory, sorted by name
 */
export async function listPngFiles(dir: string): Promise<string[]> {
  const files = await fs.promises.readdir(dir);
  return files.filter((f) => f.toLowerCase().endsWith('.png')).sort();
}
