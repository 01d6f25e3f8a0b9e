import type { AnimConfig } from '@pixelpet/protocol';
import { FRAME_ARRAY_PREFIX, FRAME_SEQUENCE_PREFIX } from '@pixelpet/protocol';
import {
  FrameBuffer,
  FrameSizeMismatchError,
  MissingFrameIndexError,
  SpriteCodecError,
  type IndexRange,
} from '@pixelpet/codec';

/**
 * `<type words> <name>[<digits?>] = { <body> };`
 * The body may not contain braces, so aggregate initialisers
 * (`{ {a}, {b} }`) and the animation table never match.
 */
const ARRAY_DECLARATION = /\b((?:[A-Za-z_]\w*\s+)+)([A-Za-z_]\w*)\s*\[\s*(\d*)\s*\]\s*=\s*\{([^{}]*)\}\s*;/g;

const HEX_LITERAL = /^0[xX]([0-9a-fA-F]+)[uUlL]*$/;
const OCTAL_LITERAL = /^0([0-7]+)[uUlL]*$/;
const DECIMAL_LITERAL = /^(0|[1-9]\d*)[uUlL]*$/;

/**
 * `{ frames_<name>, <count>, <delay>, <loop> }`; count and delay take the
 * same integer literals as array bodies
 */
const TABLE_ROW = /\{\s*([A-Za-z_]\w*)\s*,\s*(\w+)\s*,\s*(\w+)\s*,\s*(true|false|1|0)\s*\}/g;

/**
 * Blank out block and line comments so commented-out arrays aren't picked up
 */
export function stripComments(text: string): string {
  return text
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/\/\/[^\n]*/g, '');
}

function parseIntegerLiteral(token: string): number | null {
  const hex = HEX_LITERAL.exec(token);
  if (hex) return parseInt(hex[1]!, 16);

  const octal = OCTAL_LITERAL.exec(token);
  if (octal) return parseInt(octal[1]!, 8);

  const decimal = DECIMAL_LITERAL.exec(token);
  if (decimal) return parseInt(decimal[1]!, 10);

  return null;
}

/**
 * Parse a comma-separated literal list. A trailing comma is allowed;
 * anything that isn't an integer literal makes the whole body invalid.
 */
function parseArrayBody(body: string): number[] | null {
  const tokens = body.split(',').map((t) => t.trim());
  if (tokens.length > 0 && tokens[tokens.length - 1] === '') {
    tokens.pop();
  }

  const values: number[] = [];
  for (const token of tokens) {
    const value = parseIntegerLiteral(token);
    if (value === null) return null;
    values.push(value);
  }
  return values;
}

/**
 * Scan source text for literal integer arrays, in textual order.
 *
 * This is a discovery pass, not a strict parse: declarations that don't
 * look like an integer array are simply left out. When a name repeats,
 * the later values win and the first position is kept.
 */
export function extractArrays(text: string): Map<string, number[]> {
  const arrays = new Map<string, number[]>();

  for (const match of stripComments(text).matchAll(ARRAY_DECLARATION)) {
    const name = match[2]!;
    const values = parseArrayBody(match[4]!);
    if (values === null) continue;
    arrays.set(name, values);
  }

  return arrays;
}

export interface GroupOptions {
  frameWidth: number;
  frameHeight: number;
  /** Array name prefix, `sprite` in `sprite_<name>_frame<N>` */
  prefix?: string;
  /**
   * Compact sprites with missing frame indices instead of rejecting them.
   * Frame order then no longer matches the original indices.
   */
  allowGaps?: boolean;
}

/**
 * Accepted array for one frame index
 */
interface FrameSlot {
  arrayName: string;
  frame: FrameBuffer;
}

export type FrameGroup =
  | { status: 'ok'; name: string; frames: FrameBuffer[]; arrayNames: string[]; missing: IndexRange[] }
  | { status: 'rejected'; name: string; errors: SpriteCodecError[] };

interface SpriteAccumulator {
  slots: Map<number, FrameSlot>;
  errors: SpriteCodecError[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function frameNamePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}_(.+)_frame(\\d+)$`);
}

/**
 * Split a raw array name into sprite name and frame index.
 * Returns null for names outside the `<prefix>_<sprite>_frame<N>` convention.
 */
export function parseFrameArrayName(
  arrayName: string,
  prefix: string = FRAME_ARRAY_PREFIX,
): { spriteName: string; frameIndex: number } | null {
  const match = frameNamePattern(prefix).exec(arrayName);
  if (!match) return null;
  return { spriteName: match[1]!, frameIndex: parseInt(match[2]!, 10) };
}

/**
 * Group frame arrays by sprite, ordering each sprite's frames by index
 * regardless of where they appeared in the text.
 *
 * Every array is size-checked before it's accepted. A sprite with a
 * bad array, or with a hole in its indices, is rejected on its own;
 * the other sprites are unaffected.
 */
export function groupByFrame(
  arrays: ReadonlyMap<string, readonly number[]>,
  options: GroupOptions,
): Map<string, FrameGroup> {
  const { frameWidth, frameHeight, prefix = FRAME_ARRAY_PREFIX, allowGaps = false } = options;
  const expected = frameWidth * frameHeight;
  const pattern = frameNamePattern(prefix);
  const sprites = new Map<string, SpriteAccumulator>();

  for (const [arrayName, values] of arrays) {
    const match = pattern.exec(arrayName);
    if (!match) continue;

    const spriteName = match[1]!;
    const frameIndex = parseInt(match[2]!, 10);

    let acc = sprites.get(spriteName);
    if (!acc) {
      acc = { slots: new Map(), errors: [] };
      sprites.set(spriteName, acc);
    }

    if (values.length !== expected) {
      acc.errors.push(new FrameSizeMismatchError(arrayName, expected, values.length));
      continue;
    }

    try {
      const frame = FrameBuffer.fromPixels(values, frameWidth, frameHeight);
      acc.slots.set(frameIndex, { arrayName, frame });
    } catch (error) {
      if (!(error instanceof SpriteCodecError)) throw error;
      acc.errors.push(error);
    }
  }

  const groups = new Map<string, FrameGroup>();

  for (const [name, acc] of sprites) {
    if (acc.errors.length > 0) {
      groups.set(name, { status: 'rejected', name, errors: acc.errors });
      continue;
    }

    // Only present indices are walked; holes are recorded as runs
    const indices = [...acc.slots.keys()].sort((a, b) => a - b);
    const missing: IndexRange[] = [];
    let expectedNext = 0;
    for (const index of indices) {
      if (index > expectedNext) missing.push({ from: expectedNext, to: index - 1 });
      expectedNext = index + 1;
    }

    if (missing.length > 0 && !allowGaps) {
      groups.set(name, { status: 'rejected', name, errors: [new MissingFrameIndexError(name, missing)] });
      continue;
    }

    const frames: FrameBuffer[] = [];
    const arrayNames: string[] = [];
    for (const index of indices) {
      const slot = acc.slots.get(index);
      if (slot) {
        frames.push(slot.frame);
        arrayNames.push(slot.arrayName);
      }
    }
    groups.set(name, { status: 'ok', name, frames, arrayNames, missing });
  }

  return groups;
}

export interface TableRow extends AnimConfig {
  frameCount: number;
}

/**
 * Recover `{frames_<name>, count, delay, loop}` rows from the animation
 * table so timings survive a header round trip. Placeholder rows
 * (`{nullptr, 0, 0, false}`) carry no name and are skipped.
 */
export function extractAnimationTable(
  text: string,
  sequencePrefix: string = FRAME_SEQUENCE_PREFIX,
): Map<string, TableRow> {
  const rows = new Map<string, TableRow>();
  const refPrefix = `${sequencePrefix}_`;

  for (const match of stripComments(text).matchAll(TABLE_ROW)) {
    const ref = match[1]!;
    if (!ref.startsWith(refPrefix) || ref.length === refPrefix.length) continue;

    const frameCount = parseIntegerLiteral(match[2]!);
    const frameDelayMs = parseIntegerLiteral(match[3]!);
    if (frameCount === null || frameDelayMs === null || frameDelayMs <= 0) continue;

    rows.set(ref.slice(refPrefix.length), {
      frameCount,
      frameDelayMs,
      loop: match[4] === 'true' || match[4] === '1',
    });
  }

  return rows;
}
