import * as fs from 'fs';
import * as path from 'path';
import { FrameBuffer, SpriteCodecError, composeSheet, scaleRaster } from '@pixelpet/codec';
import { AnimationCatalog, extractArrays } from '@pixelpet/catalog';
import { ensureDir, saveRasterAsPng } from '../utils/png-storage.js';
import { printReports } from '../utils/report.js';
import { frameSize, type CommandContext } from './context.js';

/**
 * One PNG per raw array, named after the array. Arrays of the wrong size
 * are listed and left out.
 */
async function exportIndividualArrays(text: string, outputDir: string, ctx: CommandContext): Promise<number> {
  const { frameWidth, frameHeight } = frameSize(ctx);
  const expected = frameWidth * frameHeight;
  const arrays = extractArrays(text);

  if (arrays.size === 0) {
    console.error('[Header] No sprite arrays found');
    return 1;
  }

  let written = 0;
  for (const [name, values] of arrays) {
    if (values.length !== expected) {
      console.log(`  SKIP ${name}: ${values.length} pixels (expected ${expected})`);
      continue;
    }

    try {
      const frame = FrameBuffer.fromPixels(values, frameWidth, frameHeight);
      await saveRasterAsPng(scaleRaster(frame.toRaster(), ctx.options.scale), path.join(outputDir, `${name}.png`));
      console.log(`  OK   ${name}`);
      written++;
    } catch (error) {
      if (!(error instanceof SpriteCodecError)) throw error;
      console.log(`  SKIP ${name}: ${error.message}`);
    }
  }

  console.log(`Total: ${written} arrays exported`);
  return 0;
}

/**
 * Rebuild each sprite from its frame arrays and write it as a
 * horizontal spritesheet
 */
async function exportSheets(text: string, outputDir: string, ctx: CommandContext): Promise<number> {
  const { frameWidth, frameHeight } = frameSize(ctx);
  const { catalog, report, warnings } = AnimationCatalog.fromParsedText(text, {
    frameWidth,
    frameHeight,
    allowGaps: ctx.options.allowGaps,
  });

  if (report.length === 0) {
    console.error('[Header] No sprite arrays found');
    return 1;
  }

  for (const warning of warnings) {
    console.warn(`[Header] ${warning}`);
  }

  for (const entry of catalog.entries()) {
    const sheet = scaleRaster(composeSheet(entry.frames), ctx.options.scale);
    await saveRasterAsPng(sheet, path.join(outputDir, `${entry.name}.png`));
  }

  printReports(report);
  return 0;
}

export async function headerToPng(ctx: CommandContext): Promise<number> {
  const [input] = ctx.inputs;
  if (!input || !fs.existsSync(input)) {
    console.error(`[Header] Input file not found: ${input ?? '(none)'}`);
    return 1;
  }

  const text = await fs.promises.readFile(input, 'utf8');
  const outputDir = ensureDir(ctx.options.output ?? ctx.config.outputDir);

  return ctx.options.individual
    ? exportIndividualArrays(text, outputDir, ctx)
    : exportSheets(text, outputDir, ctx);
}
