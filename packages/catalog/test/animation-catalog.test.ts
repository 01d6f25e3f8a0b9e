import type { RasterImage } from '@pixelpet/protocol';
import { SPRITE_NAMES } from '@pixelpet/protocol';
import {
  DimensionMismatchError,
  EmptySheetError,
  FrameBuffer,
  SpriteNotFoundError,
} from '@pixelpet/codec';
import { AnimationCatalog, createEntry } from '../src/catalog/animation-catalog.js';
import { serializeToText } from '../src/header/header-writer.js';

function frame(...pixels: number[]): FrameBuffer {
  return FrameBuffer.fromPixels(pixels, pixels.length, 1);
}

function solidSheet(width: number, height: number, rgba: readonly number[]): RasterImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) data.set(rgba, i);
  return { width, height, data };
}

describe('createEntry', () => {
  test('rejects an empty frame list', () => {
    expect(() => createEntry('a', [], { frameDelayMs: 100, loop: true })).toThrow(DimensionMismatchError);
  });

  test('rejects frames of different sizes', () => {
    expect(() => createEntry('a', [frame(1, 2), frame(1)], { frameDelayMs: 100, loop: true }))
      .toThrow(DimensionMismatchError);
  });

  test('rejects a delay that is not a positive integer', () => {
    expect(() => createEntry('a', [frame(1)], { frameDelayMs: 0, loop: true })).toThrow(RangeError);
    expect(() => createEntry('a', [frame(1)], { frameDelayMs: 12.5, loop: true })).toThrow(RangeError);
  });

  test('freezes the entry and its frame list', () => {
    const entry = createEntry('a', [frame(1)], { frameDelayMs: 100, loop: false });
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.frames)).toBe(true);
  });
});

describe('AnimationCatalog.fromProcedural', () => {
  test('follows the enumeration and fills gaps with missing slots', () => {
    const { catalog, report } = AnimationCatalog.fromProcedural(
      [
        { name: 'c', frames: [frame(3)] },
        { name: 'a', frames: [frame(1), frame(2)], anim: { frameDelayMs: 120, loop: false } },
        { name: 'z', frames: [frame(9)] },
      ],
      { order: ['a', 'b', 'c'] },
    );

    expect(catalog.names).toEqual(['a', 'b', 'c']);
    expect(catalog.slots().map((s) => s.kind)).toEqual(['entry', 'missing', 'entry']);
    expect(catalog.size).toBe(3);
    expect(catalog.totalFrames).toBe(3);
    expect(report).toEqual([
      { name: 'a', status: 'converted', frameCount: 2, source: 'procedural' },
      { name: 'b', status: 'missing' },
      { name: 'c', status: 'converted', frameCount: 1, source: 'procedural' },
      { name: 'z', status: 'skipped', reason: 'not in sprite enumeration' },
    ]);
  });

  test('keeps producer order without an enumeration', () => {
    const { catalog } = AnimationCatalog.fromProcedural([
      { name: 'b', frames: [frame(1)] },
      { name: 'a', frames: [frame(1)] },
    ]);
    expect(catalog.names).toEqual(['b', 'a']);
  });

  test('takes timings from the config table unless the sprite brings its own', () => {
    const animConfig = new Map([['a', { frameDelayMs: 42, loop: false }]]);
    const { catalog } = AnimationCatalog.fromProcedural(
      [
        { name: 'a', frames: [frame(1)] },
        { name: 'b', frames: [frame(1)] },
        { name: 'c', frames: [frame(1)], anim: { frameDelayMs: 7, loop: true } },
      ],
      { animConfig },
    );
    expect(catalog.require('a')).toMatchObject({ frameDelayMs: 42, loop: false });
    expect(catalog.require('b')).toMatchObject({ frameDelayMs: 500, loop: true });
    expect(catalog.require('c')).toMatchObject({ frameDelayMs: 7, loop: true });
  });

  test('a sprite with no frames is reported as failed', () => {
    const { catalog, report } = AnimationCatalog.fromProcedural([{ name: 'a', frames: [] }]);
    expect(catalog.slots()).toEqual([{ kind: 'missing', name: 'a' }]);
    expect(report[0]?.status).toBe('failed');
  });
});

describe('AnimationCatalog lookup', () => {
  const { catalog } = AnimationCatalog.fromProcedural(
    [{ name: 'a', frames: [frame(1)] }],
    { order: ['a', 'b'] },
  );

  test('lookup returns null for missing and unknown names', () => {
    expect(catalog.lookup('a')?.name).toBe('a');
    expect(catalog.lookup('b')).toBeNull();
    expect(catalog.lookup('nope')).toBeNull();
    expect(catalog.has('b')).toBe(true);
    expect(catalog.has('nope')).toBe(false);
  });

  test('require throws for a name without an entry', () => {
    expect(() => catalog.require('b')).toThrow(SpriteNotFoundError);
    expect(() => catalog.require('b')).toThrow('Sprite not found: b');
  });
});

describe('AnimationCatalog.set', () => {
  test('replaces an entry in place and appends new names', () => {
    const { catalog } = AnimationCatalog.fromProcedural(
      [{ name: 'a', frames: [frame(1)] }],
      { order: ['a', 'b'] },
    );

    catalog.set({ name: 'b', frames: [frame(2), frame(3)], frameDelayMs: 90, loop: false });
    catalog.set({ name: 'c', frames: [frame(4)], frameDelayMs: 90, loop: true });

    expect(catalog.names).toEqual(['a', 'b', 'c']);
    expect(catalog.require('b').frames).toHaveLength(2);
    expect(catalog.totalFrames).toBe(4);
  });

  test('validates the replacement', () => {
    const catalog = new AnimationCatalog();
    expect(() => catalog.set({ name: 'a', frames: [], frameDelayMs: 90, loop: true })).toThrow(DimensionMismatchError);
    expect(catalog.size).toBe(0);
  });
});

describe('AnimationCatalog.fromSpriteSheets', () => {
  test('reports every enumerated sprite and keeps the table full length', () => {
    const sheets = new Map<string, RasterImage | Error | undefined>([
      ['egg_idle', solidSheet(48, 24, [0, 0, 255, 255])],
      ['baby_idle', undefined],
      ['teen_idle', new Error('unreadable')],
      ['adult_idle', solidSheet(10, 10, [0, 0, 0, 255])],
      ['extra', solidSheet(24, 24, [0, 0, 0, 255])],
    ]);

    const { catalog, report } = AnimationCatalog.fromSpriteSheets(sheets, {
      frameWidth: 24,
      frameHeight: 24,
      order: SPRITE_NAMES,
    });

    expect(catalog.size).toBe(SPRITE_NAMES.length);
    expect(catalog.entries().map((e) => e.name)).toEqual(['egg_idle']);
    expect(catalog.require('egg_idle')).toMatchObject({ frameDelayMs: 800, loop: true });
    expect(catalog.require('egg_idle').frames[1]?.pixels[0]).toBe(0x001f);

    const byName = new Map(report.map((r) => [r.name, r]));
    expect(byName.get('egg_idle')).toEqual({ name: 'egg_idle', status: 'converted', frameCount: 2 });
    expect(byName.get('baby_idle')?.status).toBe('missing');
    expect(byName.get('sleeping')?.status).toBe('missing');
    expect(byName.get('extra')).toEqual({ name: 'extra', status: 'skipped', reason: 'not in sprite enumeration' });

    const teen = byName.get('teen_idle');
    expect(teen?.status === 'failed' && teen.error.message).toBe('unreadable');
    const adult = byName.get('adult_idle');
    expect(adult?.status === 'failed' && adult.error).toBeInstanceOf(EmptySheetError);
  });
});

describe('AnimationCatalog.fromParsedText', () => {
  const source = AnimationCatalog.fromProcedural(
    [
      { name: 'a', frames: [frame(1, 2), frame(3, 4)], anim: { frameDelayMs: 250, loop: false } },
      { name: 'c', frames: [frame(0xf81f, 0xffff)], anim: { frameDelayMs: 600, loop: true } },
    ],
    { order: ['a', 'b', 'c'] },
  ).catalog;
  const text = serializeToText(source, { frameWidth: 2, frameHeight: 1 });

  test('rebuilds frames and recovers timings from the table', () => {
    const { catalog, report } = AnimationCatalog.fromParsedText(text, { frameWidth: 2, frameHeight: 1 });

    expect(catalog.names).toEqual(['a', 'c']);
    expect(catalog.require('a').frames.map((f) => f.pixels)).toEqual([[1, 2], [3, 4]]);
    expect(catalog.require('a')).toMatchObject({ frameDelayMs: 250, loop: false });
    expect(catalog.require('c')).toMatchObject({ frameDelayMs: 600, loop: true });
    expect(report.map((r) => r.status)).toEqual(['converted', 'converted']);
  });

  test('reapplying the enumeration restores missing slots', () => {
    const { catalog } = AnimationCatalog.fromParsedText(text, { frameWidth: 2, frameHeight: 1, order: ['a', 'b', 'c'] });
    expect(serializeToText(catalog, { frameWidth: 2, frameHeight: 1 })).toBe(text);
  });

  test('overrides win over recovered timings', () => {
    const overrides = new Map([['a', { frameDelayMs: 99, loop: true }]]);
    const { catalog } = AnimationCatalog.fromParsedText(text, { frameWidth: 2, frameHeight: 1, overrides });
    expect(catalog.require('a')).toMatchObject({ frameDelayMs: 99, loop: true });
  });

  test('warns when the table frame count disagrees with the arrays', () => {
    const edited = text.replace('{frames_a, 2, 250, false}', '{frames_a, 3, 250, false}');
    const { catalog, warnings } = AnimationCatalog.fromParsedText(edited, { frameWidth: 2, frameHeight: 1 });
    expect(warnings).toEqual(['a: animation table lists 3 frame(s), header has 2']);
    expect(catalog.require('a').frames).toHaveLength(2);
  });

  test('a consistent header has no warnings', () => {
    expect(AnimationCatalog.fromParsedText(text, { frameWidth: 2, frameHeight: 1 }).warnings).toEqual([]);
  });

  test('without a table the config defaults apply', () => {
    const { catalog } = AnimationCatalog.fromParsedText('const uint16_t sprite_eating_frame0[2] = {1, 2};', {
      frameWidth: 2,
      frameHeight: 1,
    });
    expect(catalog.require('eating')).toMatchObject({ frameDelayMs: 300, loop: false });
  });

  test('rejected sprites become failed reports', () => {
    const broken = [
      'const uint16_t sprite_a_frame0[2] = {1, 2};',
      'const uint16_t sprite_a_frame2[2] = {1, 2};',
      'const uint16_t sprite_b_frame0[3] = {1, 2, 3};',
      'const uint16_t sprite_b_frame1[1] = {1};',
    ].join('\n');
    const { catalog, report } = AnimationCatalog.fromParsedText(broken, { frameWidth: 2, frameHeight: 1 });

    expect(catalog.entries()).toEqual([]);
    const [a, b] = report;
    expect(a?.status === 'failed' && a.error.message).toBe('a: missing frame index 1');
    expect(b?.status === 'failed' && b.error).toBeInstanceOf(AggregateError);
  });
});
