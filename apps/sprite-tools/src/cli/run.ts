import type { ToolsConfig } from '../config.js';
import { parseCommandLine, type ParsedCommandLine } from './args.js';
import { pngToHeader } from '../commands/png-to-header.js';
import { headerToPng } from '../commands/header-to-png.js';
import { generatePlaceholders } from '../commands/generate-placeholders.js';
import type { CommandContext } from '../commands/context.js';

export const USAGE = `Usage: sprite-tools <command> [options]

Commands:
  png2header <file.png>            Spritesheet to a standalone header
  png2header <dir> --batch         Every PNG in <dir> to <name>.h
  png2header <dir> --spritedata    Enumerated sprites to SpriteData.h
  header2png <file.h>              Header arrays back to spritesheet PNGs
  placeholders                     Drawn placeholder set to SpriteData.h

Options:
  -n, --name <name>         Sprite name (default: file name)
  -W, --width <px>          Frame width (default: SPRITE_FRAME_WIDTH or 24)
  -H, --height <px>         Frame height (default: SPRITE_FRAME_HEIGHT or 24)
  -c, --cols <n>            Columns to read from each sheet row
  -t, --transparent R,G,B   Color key mapped to transparent
  -o, --output <path>       Output file or directory
  -b, --batch               Convert a whole directory
  -S, --spritedata          Write the combined sprite-data header
  -s, --scale <n>           Upscale exported PNGs
  -i, --individual          Export each array as its own PNG
      --allow-gaps          Keep sprites with missing frame indices
  -h, --help                Show this help`;

type Command = (ctx: CommandContext) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  png2header: pngToHeader,
  header2png: headerToPng,
  placeholders: generatePlaceholders,
};

/**
 * Run one CLI invocation and return the process exit code
 */
export async function runCli(argv: readonly string[], config: ToolsConfig): Promise<number> {
  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  const { command, inputs, options } = parsed;
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const handler = command ? COMMANDS[command] : undefined;
  if (!handler) {
    console.error(command ? `Unknown command: ${command}` : 'No command given');
    console.error(USAGE);
    return 1;
  }

  return handler({ inputs, options, config });
}
