import { z } from 'zod';
import { DEFAULT_FRAME_HEIGHT, DEFAULT_FRAME_WIDTH } from '@pixelpet/protocol';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

/**
 * Environment the tools read. CLI flags override the frame size and
 * output directory per invocation.
 */
export const EnvSchema = z.object({
  SPRITE_FRAME_WIDTH: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(DEFAULT_FRAME_WIDTH)),
  SPRITE_FRAME_HEIGHT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(DEFAULT_FRAME_HEIGHT)),
  SPRITE_OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default('.')),
  SENTRY_DSN: z.preprocess(emptyToUndefined, z.string().url().optional()),
  NODE_ENV: z.preprocess(emptyToUndefined, z.string().default('development')),
});

export interface ToolsConfig {
  frameWidth: number;
  frameHeight: number;
  outputDir: string;
  sentryDsn?: string;
  environment: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolsConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid environment: ${details}`);
  }

  const parsed = result.data;
  return {
    frameWidth: parsed.SPRITE_FRAME_WIDTH,
    frameHeight: parsed.SPRITE_FRAME_HEIGHT,
    outputDir: parsed.SPRITE_OUTPUT_DIR,
    sentryDsn: parsed.SENTRY_DSN,
    environment: parsed.NODE_ENV,
  };
}
