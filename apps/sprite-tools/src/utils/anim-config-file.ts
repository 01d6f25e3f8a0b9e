import * as fs from 'fs';
import * as path from 'path';
import type { AnimConfigTable } from '@pixelpet/protocol';
import { CONFIG_FILE_NAME, DEFAULT_ANIM_CONFIG } from '@pixelpet/protocol';
import { parseAnimConfig } from '@pixelpet/catalog';

/**
 * Read `sprite_config.txt` from a directory if it is there, applying it
 * over the built-in timings. Bad lines are logged and skipped.
 */
export async function loadAnimConfigFile(dir: string): Promise<AnimConfigTable> {
  const filePath = path.join(dir, CONFIG_FILE_NAME);
  if (!fs.existsSync(filePath)) {
    return DEFAULT_ANIM_CONFIG;
  }

  const text = await fs.promises.readFile(filePath, 'utf8');
  const { config, warnings } = parseAnimConfig(text);
  for (const warning of warnings) {
    console.warn(`[Config] ${CONFIG_FILE_NAME}: ${warning}`);
  }
  console.log(`[Config] Loaded ${filePath}`);
  return config;
}
