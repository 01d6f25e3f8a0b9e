import type { Frame } from '@pixelpet/protocol';
import {
  ANIMATION_TABLE_NAME,
  FRAME_ARRAY_PREFIX,
  FRAME_SEQUENCE_PREFIX,
  SPRITE_COUNT_CONSTANT,
  TRANSPARENT_565,
} from '@pixelpet/protocol';
import { FrameSizeMismatchError, formatHex565 } from '@pixelpet/codec';
import type { AnimationCatalog } from '../catalog/animation-catalog.js';

export interface HeaderOptions {
  frameWidth: number;
  frameHeight: number;
  prefix?: string;
  sequencePrefix?: string;
  tableName?: string;
  countConstant?: string;
  /** Doc comment brief line */
  title?: string;
  /** What produced the file, for the doc comment */
  generatedBy?: string;
}

export function frameArrayName(spriteName: string, frameIndex: number, prefix: string = FRAME_ARRAY_PREFIX): string {
  return `${prefix}_${spriteName}_frame${frameIndex}`;
}

/**
 * Format one frame as a constexpr array, `rowWidth` values per line
 */
export function formatFrameArray(arrayName: string, pixels: readonly number[], rowWidth: number): string {
  const lines = [`constexpr uint16_t ${arrayName}[${pixels.length}] = {`];

  for (let start = 0; start < pixels.length; start += rowWidth) {
    const row = pixels.slice(start, start + rowWidth).map(formatHex565).join(', ');
    lines.push(`    ${row},`);
  }

  lines.push('};');
  return lines.join('\n');
}

function checkFrameSize(arrayName: string, frame: Frame, frameWidth: number, frameHeight: number): void {
  if (frame.width !== frameWidth || frame.height !== frameHeight || frame.pixels.length !== frameWidth * frameHeight) {
    throw new FrameSizeMismatchError(arrayName, frameWidth * frameHeight, frame.pixels.length);
  }
}

/**
 * Standalone header for one sprite: just its frame arrays
 */
export function serializeSpriteHeader(
  name: string,
  frames: readonly Frame[],
  frameWidth: number,
  frameHeight: number,
  options: { prefix?: string; generatedBy?: string } = {},
): string {
  const { prefix = FRAME_ARRAY_PREFIX, generatedBy = 'sprite-tools' } = options;
  const lines: string[] = [
    `// Auto-generated by ${generatedBy} - ${name}`,
    `// ${frames.length} frame(s), ${frameWidth}x${frameHeight} RGB565`,
    `// Transparent color key: ${formatHex565(TRANSPARENT_565)} (magenta)`,
    '',
    '#pragma once',
    '#include <cstdint>',
    '',
  ];

  frames.forEach((frame, i) => {
    const arrayName = frameArrayName(name, i, prefix);
    checkFrameSize(arrayName, frame, frameWidth, frameHeight);
    lines.push(formatFrameArray(arrayName, frame.pixels, frameWidth));
    lines.push('');
  });

  return lines.join('\n');
}

/**
 * Serialize a catalog as a complete sprite-data header:
 * frame arrays, one AnimFrame list per entry, then the animation table
 * with one row per slot (missing slots keep their row).
 */
export function serializeToText(catalog: AnimationCatalog, options: HeaderOptions): string {
  const {
    frameWidth,
    frameHeight,
    prefix = FRAME_ARRAY_PREFIX,
    sequencePrefix = FRAME_SEQUENCE_PREFIX,
    tableName = ANIMATION_TABLE_NAME,
    countConstant = SPRITE_COUNT_CONSTANT,
    title = `${frameWidth}x${frameHeight} RGB565 sprite data`,
    generatedBy = 'sprite-tools',
  } = options;

  const lines: string[] = [
    '/**',
    ' * @file SpriteData.h',
    ` * @brief ${title}`,
    ' *',
    ` * Auto-generated by ${generatedBy}`,
    ' */',
    '#pragma once',
    '',
    '#include "Sprites.h"',
    '',
  ];

  const entries = catalog.entries();

  // Pixel arrays
  for (const entry of entries) {
    entry.frames.forEach((frame, i) => {
      const arrayName = frameArrayName(entry.name, i, prefix);
      checkFrameSize(arrayName, frame, frameWidth, frameHeight);
      lines.push(formatFrameArray(arrayName, frame.pixels, frameWidth));
      lines.push('');
    });
  }

  // AnimFrame lists
  for (const entry of entries) {
    const refs = entry.frames.map((_, i) => `{${frameArrayName(entry.name, i, prefix)}}`).join(', ');
    lines.push(`constexpr AnimFrame ${sequencePrefix}_${entry.name}[] = { ${refs} };`);
  }
  lines.push('');

  // Animation table, one row per slot
  lines.push(`const AnimatedSprite ${tableName}[${countConstant}] = {`);
  for (const slot of catalog.slots()) {
    if (slot.kind === 'missing') {
      lines.push(`    {nullptr, 0, 0, false},  // ${slot.name} MISSING`);
      continue;
    }
    const { entry } = slot;
    lines.push(`    {${sequencePrefix}_${entry.name}, ${entry.frames.length}, ${entry.frameDelayMs}, ${entry.loop}},`);
  }
  lines.push('};');
  lines.push('');

  return lines.join('\n');
}
