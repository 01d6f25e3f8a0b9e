import type {
  AnimConfig,
  AnimConfigTable,
  AnimationEntry,
  CatalogSlot,
  RasterImage,
  RGB,
  SpriteReport,
} from '@pixelpet/protocol';
import { DEFAULT_ANIM_CONFIG } from '@pixelpet/protocol';
import {
  DimensionMismatchError,
  FrameBuffer,
  SpriteCodecError,
  SpriteNotFoundError,
  splitSheet,
} from '@pixelpet/codec';
import { resolveAnimConfig } from '../config/anim-config.js';
import { extractAnimationTable, extractArrays, groupByFrame } from '../header/text-array-parser.js';

export type SpriteEntry = AnimationEntry<FrameBuffer>;
export type SpriteSlot = CatalogSlot<FrameBuffer>;

export interface CatalogOptions {
  /**
   * Fixed name enumeration. When given it decides slot order and slot set:
   * absent names become missing slots, names outside it are skipped.
   */
  order?: readonly string[];
  /** Default timings, keyed by sprite name */
  animConfig?: AnimConfigTable;
}

export interface SheetCatalogOptions extends CatalogOptions {
  frameWidth: number;
  frameHeight: number;
  colorKey?: RGB;
  columns?: number;
}

export interface TextCatalogOptions extends CatalogOptions {
  frameWidth: number;
  frameHeight: number;
  prefix?: string;
  sequencePrefix?: string;
  allowGaps?: boolean;
  /** Timings that win over the ones recovered from the header's table */
  overrides?: AnimConfigTable;
}

export interface ProceduralSprite {
  name: string;
  frames: FrameBuffer[];
  anim?: AnimConfig;
}

export interface CatalogBuild {
  catalog: AnimationCatalog;
  report: SpriteReport[];
  /** Inconsistencies in the source that didn't stop a sprite from loading */
  warnings: string[];
}

/**
 * What a producer made for one sprite name
 */
type Produced =
  | { kind: 'frames'; frames: FrameBuffer[]; anim: AnimConfig; source?: string }
  | { kind: 'failed'; error: Error; source?: string }
  | { kind: 'absent'; source?: string };

/**
 * Validate and freeze an entry. Frames must be non-empty and share one
 * size; delay must be a positive integer.
 */
export function createEntry(name: string, frames: readonly FrameBuffer[], anim: AnimConfig): SpriteEntry {
  const first = frames[0];
  if (!first) {
    throw new DimensionMismatchError(1, 0, `${name} has no frames`);
  }
  for (const frame of frames) {
    if (frame.width !== first.width || frame.height !== first.height) {
      throw new DimensionMismatchError(
        first.width * first.height,
        frame.width * frame.height,
        `${name} mixes ${first.width}x${first.height} and ${frame.width}x${frame.height} frames`,
      );
    }
  }
  if (!Number.isInteger(anim.frameDelayMs) || anim.frameDelayMs <= 0) {
    throw new RangeError(`${name}: frame delay must be a positive integer, got ${anim.frameDelayMs}`);
  }

  return Object.freeze({
    name,
    frames: Object.freeze([...frames]),
    frameDelayMs: anim.frameDelayMs,
    loop: anim.loop,
  });
}

/**
 * Ordered name -> animation mapping. Insertion order is serialization order.
 */
export class AnimationCatalog {
  private slotsByName = new Map<string, SpriteSlot>();

  constructor(slots: Iterable<SpriteSlot> = []) {
    for (const slot of slots) {
      const name = slot.kind === 'entry' ? slot.entry.name : slot.name;
      this.slotsByName.set(name, slot);
    }
  }

  static fromProcedural(sprites: readonly ProceduralSprite[], options: CatalogOptions = {}): CatalogBuild {
    const animConfig = options.animConfig ?? DEFAULT_ANIM_CONFIG;
    const produced = new Map<string, Produced>();

    for (const sprite of sprites) {
      produced.set(sprite.name, {
        kind: 'frames',
        frames: sprite.frames,
        anim: sprite.anim ?? resolveAnimConfig(sprite.name, animConfig),
        source: 'procedural',
      });
    }

    return assemble(produced, options.order);
  }

  /**
   * Build from one spritesheet per sprite. An `undefined` sheet means the
   * source file wasn't there, an Error that it couldn't be read.
   */
  static fromSpriteSheets(
    sheets: ReadonlyMap<string, RasterImage | Error | undefined>,
    options: SheetCatalogOptions,
  ): CatalogBuild {
    const animConfig = options.animConfig ?? DEFAULT_ANIM_CONFIG;
    const produced = new Map<string, Produced>();

    for (const [name, image] of sheets) {
      if (!image) {
        produced.set(name, { kind: 'absent' });
        continue;
      }
      if (image instanceof Error) {
        produced.set(name, { kind: 'failed', error: image });
        continue;
      }

      try {
        const frames = splitSheet(image, options.frameWidth, options.frameHeight, {
          columns: options.columns,
          colorKey: options.colorKey,
        });
        produced.set(name, { kind: 'frames', frames, anim: resolveAnimConfig(name, animConfig) });
      } catch (error) {
        if (!(error instanceof SpriteCodecError)) throw error;
        produced.set(name, { kind: 'failed', error });
      }
    }

    return assemble(produced, options.order);
  }

  /**
   * Rebuild from generated header text. Timings come from the overrides,
   * then the header's own animation table, then the default table.
   */
  static fromParsedText(text: string, options: TextCatalogOptions): CatalogBuild {
    const animConfig = options.animConfig ?? DEFAULT_ANIM_CONFIG;
    const table = extractAnimationTable(text, options.sequencePrefix);
    const groups = groupByFrame(extractArrays(text), {
      frameWidth: options.frameWidth,
      frameHeight: options.frameHeight,
      prefix: options.prefix,
      allowGaps: options.allowGaps,
    });

    const produced = new Map<string, Produced>();
    const warnings: string[] = [];
    for (const [name, group] of groups) {
      if (group.status === 'rejected') {
        const error = group.errors.length === 1
          ? group.errors[0]!
          : new AggregateError(group.errors, `${name}: ${group.errors.map((e) => e.message).join('; ')}`);
        produced.set(name, { kind: 'failed', error });
        continue;
      }

      const recovered = table.get(name);
      if (recovered && recovered.frameCount !== group.frames.length) {
        warnings.push(
          `${name}: animation table lists ${recovered.frameCount} frame(s), header has ${group.frames.length}`,
        );
      }
      const anim = options.overrides?.get(name)
        ?? (recovered ? { frameDelayMs: recovered.frameDelayMs, loop: recovered.loop } : undefined)
        ?? resolveAnimConfig(name, animConfig);
      produced.set(name, { kind: 'frames', frames: group.frames, anim });
    }

    return { ...assemble(produced, options.order), warnings };
  }

  get size(): number {
    return this.slotsByName.size;
  }

  get names(): string[] {
    return [...this.slotsByName.keys()];
  }

  get totalFrames(): number {
    let total = 0;
    for (const entry of this.entries()) total += entry.frames.length;
    return total;
  }

  has(name: string): boolean {
    return this.slotsByName.has(name);
  }

  slots(): SpriteSlot[] {
    return [...this.slotsByName.values()];
  }

  entries(): SpriteEntry[] {
    const entries: SpriteEntry[] = [];
    for (const slot of this.slotsByName.values()) {
      if (slot.kind === 'entry') entries.push(slot.entry);
    }
    return entries;
  }

  /**
   * Entry for a name, or null when the name is unknown or only a
   * placeholder
   */
  lookup(name: string): SpriteEntry | null {
    const slot = this.slotsByName.get(name);
    return slot?.kind === 'entry' ? slot.entry : null;
  }

  require(name: string): SpriteEntry {
    const entry = this.lookup(name);
    if (!entry) throw new SpriteNotFoundError(name);
    return entry;
  }

  /**
   * Replace a whole entry, keeping its position; new names go last
   */
  set(entry: SpriteEntry): void {
    this.slotsByName.set(entry.name, { kind: 'entry', entry: createEntry(entry.name, entry.frames, entry) });
  }
}

function toSlot(name: string, produced: Produced | undefined, report: SpriteReport[]): SpriteSlot {
  if (!produced || produced.kind === 'absent') {
    report.push({ name, status: 'missing', source: produced?.source });
    return { kind: 'missing', name };
  }

  if (produced.kind === 'failed') {
    report.push({ name, status: 'failed', error: produced.error, source: produced.source });
    return { kind: 'missing', name };
  }

  try {
    const entry = createEntry(name, produced.frames, produced.anim);
    report.push({ name, status: 'converted', frameCount: entry.frames.length, source: produced.source });
    return { kind: 'entry', entry };
  } catch (error) {
    if (!(error instanceof SpriteCodecError) && !(error instanceof RangeError)) throw error;
    report.push({ name, status: 'failed', error, source: produced.source });
    return { kind: 'missing', name };
  }
}

/**
 * Turn per-name production results into catalog slots plus a report,
 * honouring the name enumeration when there is one
 */
function assemble(produced: ReadonlyMap<string, Produced>, order?: readonly string[]): CatalogBuild {
  const report: SpriteReport[] = [];
  const slots: SpriteSlot[] = [];

  if (!order) {
    for (const [name, result] of produced) {
      slots.push(toSlot(name, result, report));
    }
    return { catalog: new AnimationCatalog(slots), report, warnings: [] };
  }

  const known = new Set(order);
  for (const name of order) {
    slots.push(toSlot(name, produced.get(name), report));
  }
  for (const name of produced.keys()) {
    if (!known.has(name)) {
      report.push({ name, status: 'skipped', reason: 'not in sprite enumeration' });
    }
  }

  return { catalog: new AnimationCatalog(slots), report, warnings: [] };
}
