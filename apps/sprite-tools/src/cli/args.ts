import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { RGB } from '@pixelpet/protocol';

const byte = z.coerce.number().int().min(0).max(255);

export const ColorKeySchema = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()))
  .pipe(z.tuple([byte, byte, byte]));

/**
 * Parse an `R,G,B` color key such as `255,0,255`
 */
export function parseColorKey(value: string): RGB {
  const result = ColorKeySchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid color key '${value}': expected R,G,B with each value 0-255`);
  }
  const [r, g, b] = result.data;
  return { r, g, b };
}

const positiveInt = z.coerce.number().int().positive();

export const CliOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  width: positiveInt.optional(),
  height: positiveInt.optional(),
  cols: positiveInt.optional(),
  transparent: ColorKeySchema.transform(([r, g, b]): RGB => ({ r, g, b })).optional(),
  output: z.string().min(1).optional(),
  batch: z.boolean().default(false),
  spritedata: z.boolean().default(false),
  scale: positiveInt.default(1),
  individual: z.boolean().default(false),
  allowGaps: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface ParsedCommandLine {
  command?: string;
  inputs: string[];
  options: CliOptions;
}

/**
 * Split argv into subcommand, positional inputs and validated options
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      name: { type: 'string', short: 'n' },
      width: { type: 'string', short: 'W' },
      height: { type: 'string', short: 'H' },
      cols: { type: 'string', short: 'c' },
      transparent: { type: 'string', short: 't' },
      output: { type: 'string', short: 'o' },
      batch: { type: 'boolean', short: 'b' },
      spritedata: { type: 'boolean', short: 'S' },
      scale: { type: 'string', short: 's' },
      individual: { type: 'boolean', short: 'i' },
      'allow-gaps': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const result = CliOptionsSchema.safeParse({
    name: values.name,
    width: values.width,
    height: values.height,
    cols: values.cols,
    transparent: values.transparent,
    output: values.output,
    batch: values.batch,
    spritedata: values.spritedata,
    scale: values.scale,
    individual: values.individual,
    allowGaps: values['allow-gaps'],
    help: values.help,
  });

  if (!result.success) {
    const details = result.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid options: ${details}`);
  }

  const [command, ...inputs] = positionals;
  return { command, inputs, options: result.data };
}
