import type { FrameBuffer } from '@pixelpet/codec';
import { PixelCanvas } from '../canvas/pixel-canvas.js';
import { PALETTE } from '../palette.js';
import {
  drawClosedEyes,
  drawEyes,
  drawFrown,
  drawOpenMouth,
  drawSmile,
  drawXEyes,
  fillOval,
  plot,
  type OvalStyle,
} from '../shapes/shapes.js';

/**
 * Placeholder pet sprites - Pixel Art Style
 *
 * Colored 24x24 versions of the monochrome pet, two or three frames each.
 * Animation is a one-pixel bounce or a small per-frame detail change.
 */

export const PLACEHOLDER_SIZE = 24;

const CENTER_X = 12;

function canvasWithBody(centerY: number, style: OvalStyle): PixelCanvas {
  const canvas = new PixelCanvas(PLACEHOLDER_SIZE, PLACEHOLDER_SIZE);
  fillOval(canvas, { x: CENTER_X, y: centerY }, style);
  return canvas;
}

const oval = (radiusX: number, radiusY: number, body: number, outline: number): OvalStyle =>
  ({ radiusX, radiusY, body, outline });

// ============================================
// LIFE STAGES
// ============================================

const EGG_CRACK = [[10, 5], [11, 6], [12, 5], [13, 6], [14, 5]] as const;

/**
 * Egg: cream oval with a crack across the top
 */
export function makeEgg(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(12, oval(8, 10, PALETTE.cream, PALETTE.lightBrown));
    plot(g, EGG_CRACK.map(([x, y]) => [x, y + bounce] as const), PALETTE.brown);
    plot(g, [[8, 10 + bounce], [15, 14 + bounce]], PALETTE.lightBrown);
    return g.toFrame();
  });
}

/**
 * Baby: small pink blob with big eyes
 */
export function makeBaby(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(13 - bounce, oval(7, 7, PALETTE.pink, PALETTE.darkRed));
    drawEyes(g, { x: 12, y: 12 - bounce });
    plot(g, [[11, 15 - bounce], [12, 15 - bounce], [13, 15 - bounce]], PALETTE.black);
    plot(g, [[7, 14 - bounce], [16, 14 - bounce]], PALETTE.lightPink);
    return g.toFrame();
  });
}

/**
 * Teen: blue creature with spiky hair
 */
export function makeTeen(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(13 - bounce, oval(8, 8, PALETTE.lightBlue, PALETTE.blue));
    const face = { x: 12, y: 12 - bounce };
    drawEyes(g, face);
    drawSmile(g, face);
    for (const x of [9, 12, 15]) {
      plot(g, [[x, 4 - bounce], [x, 3 - bounce]], PALETTE.blue);
    }
    return g.toFrame();
  });
}

/**
 * Adult: larger green creature with ears, three-frame bounce
 */
export function makeAdult(): FrameBuffer[] {
  return [0, 1, 0].map((bounce) => {
    const g = canvasWithBody(12 - bounce, oval(9, 9, PALETTE.green, PALETTE.teal));
    const face = { x: 12, y: 11 - bounce };
    drawEyes(g, face);
    drawSmile(g, face);
    plot(g, [[7, 2 - bounce], [16, 2 - bounce]], PALETTE.teal);
    plot(g, [[7, 3 - bounce], [16, 3 - bounce]], PALETTE.green);
    return g.toFrame();
  });
}

/**
 * Elder: purple creature with wrinkles
 */
export function makeElder(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(12 - bounce, oval(9, 9, PALETTE.lightPurple, PALETTE.purple));
    drawEyes(g, { x: 12, y: 11 - bounce });
    const y = 14 - bounce;
    plot(g, [[7, y], [8, y], [15, y], [16, y]], PALETTE.purple);
    plot(g, [[11, 15 - bounce], [12, 15 - bounce], [13, 15 - bounce]], PALETTE.black);
    return g.toFrame();
  });
}

/**
 * Ghost: round top, wavy bottom that ripples between frames
 */
export function makeGhost(): FrameBuffer[] {
  return [0, 1, 2].map((phase) => {
    const g = new PixelCanvas(PLACEHOLDER_SIZE, PLACEHOLDER_SIZE);

    for (let y = 4; y < 18; y++) {
      for (let x = 4; x < 20; x++) {
        const dx = (x - 12) / 8;
        const dy = (y - 10) / 8;
        if (dx * dx + dy * dy <= 1.0) g.set(x, y, PALETTE.white);
      }
    }

    for (let x = 4; x < 20; x++) {
      const wave = Math.trunc(Math.sin((x + phase) * 1.2) * 1.5);
      for (let dy = 0; dy < 3; dy++) {
        g.set(x, 17 + dy + wave, dy < 2 ? PALETTE.white : PALETTE.lightGray);
      }
    }

    for (let dy = 0; dy < 2; dy++) {
      for (let dx = 0; dx < 2; dx++) {
        g.set(8 + dx, 10 + dy, PALETTE.black);
        g.set(13 + dx, 10 + dy, PALETTE.black);
      }
    }
    plot(g, [[11, 14], [12, 14], [11, 15], [12, 15]], PALETTE.darkGray);

    return g.toFrame();
  });
}

// ============================================
// MOODS
// ============================================

/**
 * Sick: pale green with X eyes and a sliding sweat drop
 */
export function makeSick(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(12, oval(9, 9, PALETTE.sickBody, PALETTE.sickOutline));
    drawXEyes(g, { x: 12, y: 12 });
    for (let dx = -2; dx <= 2; dx++) {
      g.set(12 + dx, dx % 2 === 0 ? 17 : 16, PALETTE.black);
    }
    g.set(18, 5 + bounce, PALETTE.lightBlue);
    g.set(18, 6 + bounce, PALETTE.blue);
    return g.toFrame();
  });
}

/**
 * Happy: bright yellow with a big smile and sparkles
 */
export function makeHappy(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(12 - bounce, oval(9, 9, PALETTE.yellow, PALETTE.orange));
    const face = { x: 12, y: 11 - bounce };
    drawEyes(g, face);
    drawSmile(g, face);
    plot(g, [[6, 14 - bounce], [17, 14 - bounce]], PALETTE.orange);
    plot(g, bounce === 0 ? [[4, 3], [19, 3]] : [[3, 4], [20, 4]], PALETTE.white);
    return g.toFrame();
  });
}

/**
 * Sad: blue with a frown and a falling tear
 */
export function makeSad(): FrameBuffer[] {
  return [0, 1].map((bounce) => {
    const g = canvasWithBody(12, oval(9, 9, PALETTE.lightBlue, PALETTE.blue));
    const face = { x: 12, y: 11 };
    drawEyes(g, face);
    drawFrown(g, face);
    g.set(7, 14 + bounce, PALETTE.cyan);
    g.set(7, 15 + bounce, PALETTE.blue);
    return g.toFrame();
  });
}

// ============================================
// ACTIVITIES
// ============================================

/**
 * Eating: open, chew, open - with a crumb in the first frame
 */
export function makeEating(): FrameBuffer[] {
  return [0, 1, 2].map((phase) => {
    const g = canvasWithBody(12, oval(9, 9, PALETTE.orange, PALETTE.brown));
    const face = { x: 12, y: 11 };
    drawEyes(g, face);
    if (phase === 1) {
      plot(g, [[11, 15], [12, 15], [13, 15]], PALETTE.black);
    } else {
      drawOpenMouth(g, face);
    }
    if (phase === 0) {
      plot(g, [[4, 10], [4, 11], [5, 10]], PALETTE.green);
    }
    return g.toFrame();
  });
}

/**
 * Playing: jumps up and settles, star eyes, motion lines at the peak
 */
export function makePlaying(): FrameBuffer[] {
  const offsets = [0, -2, -1];
  return offsets.map((offset, phase) => {
    const g = canvasWithBody(12 - offset, oval(9, 8, PALETTE.cyan, PALETTE.teal));
    drawEyes(g, { x: 12, y: 11 - offset }, PALETTE.black, PALETTE.yellow);
    const y = 14 - offset;
    for (let dx = -3; dx <= 3; dx++) {
      g.set(12 + dx, y, PALETTE.black);
    }
    plot(g, [[8, y - 1], [16, y - 1]], PALETTE.black);
    if (phase === 1) {
      plot(g, [[3, 6], [2, 7], [20, 6], [21, 7]], PALETTE.lightGray);
    }
    return g.toFrame();
  });
}

/**
 * Sleeping: curled up, closed eyes, drifting Z
 */
export function makeSleeping(): FrameBuffer[] {
  return [0, 1].map((phase) => {
    const g = canvasWithBody(14, oval(9, 8, PALETTE.lightPurple, PALETTE.purple));
    drawClosedEyes(g, { x: 12, y: 13 });
    plot(g, [[11, 16], [12, 16], [13, 16]], PALETTE.black);
    const zx = 18 + phase;
    const zy = 5 - phase;
    plot(g, [[zx, zy], [zx + 1, zy], [zx, zy + 1]], PALETTE.white);
    g.set(16, 3, PALETTE.lightGray);
    return g.toFrame();
  });
}
