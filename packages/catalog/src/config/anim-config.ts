import { z } from 'zod';
import type { AnimConfig, AnimConfigTable } from '@pixelpet/protocol';
import { DEFAULT_ANIM_CONFIG, FALLBACK_ANIM_CONFIG } from '@pixelpet/protocol';

/**
 * Schema for one `name,delayMs,loop` line, already split on commas
 */
export const AnimConfigLineSchema = z.tuple([
  z.string().trim().regex(/^\w+$/, 'Sprite name must be a C identifier fragment'),
  z.string().trim().regex(/^\d+$/, 'Delay must be a whole number of milliseconds')
    .transform((value) => parseInt(value, 10))
    .pipe(z.number().int().positive('Delay must be positive')),
  z.string().trim().toLowerCase()
    .pipe(z.enum(['true', 'false'], { errorMap: () => ({ message: 'Loop must be true or false' }) }))
    .transform((value) => value === 'true'),
]);

export interface ParsedAnimConfig {
  config: Map<string, AnimConfig>;
  warnings: string[];
}

/**
 * Apply a line-oriented override file on top of a base table.
 * Blank lines and `#` comments are skipped; bad lines become warnings
 * and leave the base value in place. The base table is not modified.
 */
export function parseAnimConfig(
  text: string,
  base: AnimConfigTable = DEFAULT_ANIM_CONFIG,
): ParsedAnimConfig {
  const config = new Map<string, AnimConfig>(base);
  const warnings: string[] = [];

  text.split(/\r?\n/).forEach((rawLine, i) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) return;

    const parts = line.split(',');
    if (parts.length !== 3) {
      warnings.push(`Line ${i + 1}: malformed config line '${line}'`);
      return;
    }

    const result = AnimConfigLineSchema.safeParse(parts);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? 'invalid value';
      warnings.push(`Line ${i + 1}: invalid config line '${line}': ${reason}`);
      return;
    }

    const [name, frameDelayMs, loop] = result.data;
    config.set(name, Object.freeze({ frameDelayMs, loop }));
  });

  return { config, warnings };
}

/**
 * Timing for a sprite, falling back to 500ms looping for unknown names
 */
export function resolveAnimConfig(
  name: string,
  config: AnimConfigTable = DEFAULT_ANIM_CONFIG,
): AnimConfig {
  return config.get(name) ?? FALLBACK_ANIM_CONFIG;
}
