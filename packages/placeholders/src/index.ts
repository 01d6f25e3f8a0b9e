import type { AnimConfigTable } from '@pixelpet/protocol';
import { DEFAULT_ANIM_CONFIG } from '@pixelpet/protocol';
import type { FrameBuffer } from '@pixelpet/codec';
import { resolveAnimConfig, type ProceduralSprite } from '@pixelpet/catalog';
import {
  makeAdult,
  makeBaby,
  makeEating,
  makeEgg,
  makeElder,
  makeGhost,
  makeHappy,
  makePlaying,
  makeSad,
  makeSick,
  makeSleeping,
  makeTeen,
} from './sprites/pet-sprites.js';

export { PixelCanvas } from './canvas/pixel-canvas.js';
export { PALETTE, type PaletteColor } from './palette.js';
export {
  fillOval,
  plot,
  drawEyes,
  drawSmile,
  drawFrown,
  drawOpenMouth,
  drawXEyes,
  drawClosedEyes,
  type OvalStyle,
} from './shapes/shapes.js';
export { PLACEHOLDER_SIZE } from './sprites/pet-sprites.js';

/**
 * Generators in sprite enumeration order
 */
const GENERATORS: ReadonlyArray<readonly [string, () => FrameBuffer[]]> = [
  ['egg_idle', makeEgg],
  ['baby_idle', makeBaby],
  ['teen_idle', makeTeen],
  ['adult_idle', makeAdult],
  ['elder_idle', makeElder],
  ['ghost', makeGhost],
  ['sick', makeSick],
  ['happy', makeHappy],
  ['sad', makeSad],
  ['eating', makeEating],
  ['playing', makePlaying],
  ['sleeping', makeSleeping],
];

/**
 * Draw every placeholder sprite with its timing from the config table
 */
export function generatePlaceholderSprites(animConfig: AnimConfigTable = DEFAULT_ANIM_CONFIG): ProceduralSprite[] {
  return GENERATORS.map(([name, generate]) => ({
    name,
    frames: generate(),
    anim: resolveAnimConfig(name, animConfig),
  }));
}
