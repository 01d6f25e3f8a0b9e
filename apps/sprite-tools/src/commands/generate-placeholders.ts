import * as fs from 'fs';
import * as path from 'path';
import { SPRITE_NAMES } from '@pixelpet/protocol';
import { AnimationCatalog, serializeToText } from '@pixelpet/catalog';
import { PLACEHOLDER_SIZE, generatePlaceholderSprites } from '@pixelpet/placeholders';
import { ensureDir } from '../utils/png-storage.js';
import { loadAnimConfigFile } from '../utils/anim-config-file.js';
import { printReports } from '../utils/report.js';
import { SPRITE_DATA_FILE } from './png-to-header.js';
import type { CommandContext } from './context.js';

/**
 * Write the drawn placeholder set as a sprite-data header. Timings come
 * from `sprite_config.txt` in the output directory when present.
 */
export async function generatePlaceholders(ctx: CommandContext): Promise<number> {
  const outputPath = ctx.options.output ?? path.join(ctx.config.outputDir, SPRITE_DATA_FILE);
  const animConfig = await loadAnimConfigFile(path.dirname(outputPath));

  const { catalog, report } = AnimationCatalog.fromProcedural(generatePlaceholderSprites(animConfig), {
    order: SPRITE_NAMES,
  });

  const header = serializeToText(catalog, {
    frameWidth: PLACEHOLDER_SIZE,
    frameHeight: PLACEHOLDER_SIZE,
    title: `Placeholder ${PLACEHOLDER_SIZE}x${PLACEHOLDER_SIZE} RGB565 sprite data`,
  });

  ensureDir(path.dirname(outputPath));
  await fs.promises.writeFile(outputPath, header);

  printReports(report);
  console.log(`[Header] Wrote ${outputPath}`);
  return 0;
}
