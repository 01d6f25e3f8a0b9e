import * as fs from 'fs';
import * as path from 'path';
import type { RasterImage, SpriteReport } from '@pixelpet/protocol';
import { SPRITE_NAMES } from '@pixelpet/protocol';
import { SpriteCodecError, splitSheet } from '@pixelpet/codec';
import { AnimationCatalog, serializeSpriteHeader, serializeToText } from '@pixelpet/catalog';
import { ensureDir, listPngFiles, loadPngAsRaster, loadPngIfExists } from '../utils/png-storage.js';
import { loadAnimConfigFile } from '../utils/anim-config-file.js';
import { printReports } from '../utils/report.js';
import { frameSize, type CommandContext } from './context.js';

export const SPRITE_DATA_FILE = 'SpriteData.h';

function spriteNameFromFile(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Convert one spritesheet PNG into a standalone header. Codec failures
 * come back as a `failed` report; I/O errors propagate.
 */
export async function convertSheetFile(
  filePath: string,
  outputPath: string,
  ctx: CommandContext,
  name: string = spriteNameFromFile(filePath),
): Promise<SpriteReport> {
  const { frameWidth, frameHeight } = frameSize(ctx);
  const image = await loadPngAsRaster(filePath);

  try {
    const frames = splitSheet(image, frameWidth, frameHeight, {
      columns: ctx.options.cols,
      colorKey: ctx.options.transparent,
    });
    const header = serializeSpriteHeader(name, frames, frameWidth, frameHeight);
    ensureDir(path.dirname(outputPath));
    await fs.promises.writeFile(outputPath, header);
    return { name, status: 'converted', frameCount: frames.length, source: path.basename(filePath) };
  } catch (error) {
    if (!(error instanceof SpriteCodecError)) throw error;
    return { name, status: 'failed', error, source: path.basename(filePath) };
  }
}

export async function convertSingle(ctx: CommandContext): Promise<number> {
  const [input] = ctx.inputs;
  if (!input || !fs.existsSync(input)) {
    console.error(`[Sprite] Input file not found: ${input ?? '(none)'}`);
    return 1;
  }

  const name = ctx.options.name ?? spriteNameFromFile(input);
  const outputPath = ctx.options.output ?? path.join(path.dirname(input), `${name}.h`);
  const report = await convertSheetFile(input, outputPath, ctx, name);

  printReports([report]);
  if (report.status === 'converted') {
    console.log(`[Sprite] Wrote ${outputPath}`);
    return 0;
  }
  return 1;
}

/**
 * Every PNG in a directory gets a header beside it. One bad sheet is
 * reported and the rest still convert.
 */
export async function convertBatch(ctx: CommandContext): Promise<number> {
  const [dir] = ctx.inputs;
  if (!dir || !fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    console.error(`[Sprite] Not a directory: ${dir ?? '(none)'}`);
    return 1;
  }

  const files = await listPngFiles(dir);
  if (files.length === 0) {
    console.error(`[Sprite] No PNG files found in ${dir}`);
    return 1;
  }

  const reports: SpriteReport[] = [];
  for (const file of files) {
    const name = spriteNameFromFile(file);
    const filePath = path.join(dir, file);
    try {
      reports.push(await convertSheetFile(filePath, path.join(dir, `${name}.h`), ctx, name));
    } catch (error) {
      const reason = error instanceof Error ? error : new Error(String(error));
      reports.push({ name, status: 'failed', error: reason, source: file });
    }
  }

  printReports(reports);
  return 0;
}

/**
 * Build the combined sprite-data header from `<name>.png` sheets, one per
 * enumerated sprite. Sheets that are absent or unreadable keep a
 * placeholder row so table indices still match the enumeration.
 */
export async function convertSpriteData(ctx: CommandContext): Promise<number> {
  const [dir] = ctx.inputs;
  if (!dir || !fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    console.error(`[Sprite] Not a directory: ${dir ?? '(none)'}`);
    return 1;
  }

  const { frameWidth, frameHeight } = frameSize(ctx);
  const animConfig = await loadAnimConfigFile(dir);

  const sheets = new Map<string, RasterImage | Error | undefined>();
  for (const name of SPRITE_NAMES) {
    const image = await loadPngIfExists(path.join(dir, `${name}.png`));
    sheets.set(name, image ?? undefined);
  }
  // Listed so the report names them; the catalog skips them unread
  for (const file of await listPngFiles(dir)) {
    const name = spriteNameFromFile(file);
    if (!sheets.has(name)) sheets.set(name, undefined);
  }

  const { catalog, report } = AnimationCatalog.fromSpriteSheets(sheets, {
    frameWidth,
    frameHeight,
    columns: ctx.options.cols,
    colorKey: ctx.options.transparent,
    order: SPRITE_NAMES,
    animConfig,
  });

  const outputPath = ctx.options.output ?? path.join(ctx.config.outputDir, SPRITE_DATA_FILE);
  ensureDir(path.dirname(outputPath));
  await fs.promises.writeFile(outputPath, serializeToText(catalog, { frameWidth, frameHeight }));

  printReports(report);
  console.log(`[Header] Wrote ${outputPath} (${catalog.entries().length}/${catalog.size} sprites)`);
  return 0;
}

export async function pngToHeader(ctx: CommandContext): Promise<number> {
  if (ctx.options.spritedata) return convertSpriteData(ctx);
  if (ctx.options.batch) return convertBatch(ctx);
  return convertSingle(ctx);
}
