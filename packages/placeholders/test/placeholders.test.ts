import { DEFAULT_ANIM_CONFIG, SPRITE_NAMES, TRANSPARENT_565 } from '@pixelpet/protocol';
import { AnimationCatalog, serializeToText } from '@pixelpet/catalog';
import { PALETTE, PLACEHOLDER_SIZE, PixelCanvas, generatePlaceholderSprites } from '../src/index.js';
import { fillOval } from '../src/shapes/shapes.js';

describe('PixelCanvas', () => {
  test('starts transparent and drops writes outside the frame', () => {
    const canvas = new PixelCanvas(2, 2);
    canvas.set(1, 0, 0x1234);
    canvas.set(2, 0, 0xffff);
    canvas.set(-1, 1, 0xffff);

    expect(canvas.toFrame().pixels).toEqual([TRANSPARENT_565, 0x1234, TRANSPARENT_565, TRANSPARENT_565]);
    expect(canvas.get(2, 0)).toBeUndefined();
  });

  test('toFrame snapshots the current pixels', () => {
    const canvas = new PixelCanvas(1, 1, 0);
    const before = canvas.toFrame();
    canvas.set(0, 0, 5);
    expect(before.pixels).toEqual([0]);
    expect(canvas.toFrame().pixels).toEqual([5]);
  });
});

describe('fillOval', () => {
  test('paints body inside and outline at the rim', () => {
    const canvas = new PixelCanvas(9, 9);
    fillOval(canvas, { x: 4, y: 4 }, { radiusX: 4, radiusY: 4, body: 1, outline: 2 });
    expect(canvas.get(4, 4)).toBe(1);
    expect(canvas.get(8, 4)).toBe(2);
    expect(canvas.get(0, 0)).toBe(TRANSPARENT_565);
  });
});

describe('PALETTE', () => {
  test('holds packed colors', () => {
    expect(PALETTE.red).toBe(0xf9e7);
    expect(PALETTE.brown).toBe(0xa325);
    expect(PALETTE.white).toBe(0xffff);
  });
});

describe('generatePlaceholderSprites', () => {
  const sprites = generatePlaceholderSprites();

  test('draws every enumerated sprite in order', () => {
    expect(sprites.map((s) => s.name)).toEqual([...SPRITE_NAMES]);
  });

  test('frame counts per sprite', () => {
    expect(sprites.map((s) => s.frames.length)).toEqual([2, 2, 2, 3, 2, 3, 2, 2, 2, 3, 3, 2]);
  });

  test('every frame is 24x24 with transparent corners', () => {
    for (const sprite of sprites) {
      for (const frame of sprite.frames) {
        expect(frame.width).toBe(PLACEHOLDER_SIZE);
        expect(frame.height).toBe(PLACEHOLDER_SIZE);
        expect(frame.pixelAt(0, 0)).toBe(TRANSPARENT_565);
        expect(frame.pixelAt(23, 23)).toBe(TRANSPARENT_565);
      }
    }
  });

  test('egg body is cream and its crack moves with the bounce', () => {
    const egg = sprites[0];
    expect(egg?.frames[0]?.pixelAt(12, 12)).toBe(PALETTE.cream);
    expect(egg?.frames[0]?.pixelAt(10, 5)).toBe(PALETTE.brown);
    expect(egg?.frames[1]?.pixelAt(10, 6)).toBe(PALETTE.brown);
  });

  test('timings come from the config table', () => {
    const eating = sprites.find((s) => s.name === 'eating');
    expect(eating?.anim).toEqual({ frameDelayMs: 300, loop: false });

    const custom = new Map(DEFAULT_ANIM_CONFIG);
    custom.set('eating', { frameDelayMs: 150, loop: true });
    expect(generatePlaceholderSprites(custom).find((s) => s.name === 'eating')?.anim)
      .toEqual({ frameDelayMs: 150, loop: true });
  });

  test('the full set serializes with no missing rows', () => {
    const { catalog } = AnimationCatalog.fromProcedural(sprites, { order: SPRITE_NAMES });
    const text = serializeToText(catalog, { frameWidth: PLACEHOLDER_SIZE, frameHeight: PLACEHOLDER_SIZE });

    expect(catalog.totalFrames).toBe(28);
    expect(text).not.toContain('MISSING');
    expect(text).toContain('    {frames_egg_idle, 2, 800, true},');
    expect(text).toContain('    {frames_sleeping, 2, 1000, true},');
  });
});
