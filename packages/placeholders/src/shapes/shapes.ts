import type { Color565, Point } from '@pixelpet/protocol';
import type { PixelCanvas } from '../canvas/pixel-canvas.js';
import { PALETTE } from '../palette.js';

/**
 * Shape routines. Each takes a canvas, an anchor and its parameters,
 * and paints into the canvas before it gets frozen into a frame.
 */

export interface OvalStyle {
  radiusX: number;
  radiusY: number;
  body: Color565;
  outline: Color565;
}

// Normalised distance thresholds: inside 0.85 is body, up to 1.0 outline
const OVAL_BODY_EDGE = 0.85;
const OVAL_OUTLINE_EDGE = 1.0;

export function fillOval(canvas: PixelCanvas, center: Point, style: OvalStyle): void {
  for (let y = 0; y < canvas.height; y++) {
    for (let x = 0; x < canvas.width; x++) {
      const dx = (x - center.x) / style.radiusX;
      const dy = (y - center.y) / style.radiusY;
      const dist = dx * dx + dy * dy;
      if (dist <= OVAL_BODY_EDGE) {
        canvas.set(x, y, style.body);
      } else if (dist <= OVAL_OUTLINE_EDGE) {
        canvas.set(x, y, style.outline);
      }
    }
  }
}

/**
 * Paint a list of [x, y] points in one color
 */
export function plot(canvas: PixelCanvas, points: ReadonlyArray<readonly [number, number]>, color: Color565): void {
  for (const [x, y] of points) {
    canvas.set(x, y, color);
  }
}

/**
 * Two 2x2 eyes with a highlight in the top-left pixel
 */
export function drawEyes(
  canvas: PixelCanvas,
  face: Point,
  color: Color565 = PALETTE.black,
  highlight: Color565 = PALETTE.white,
): void {
  const lx = face.x - 4;
  const rx = face.x + 3;
  const ey = face.y - 2;

  for (let dy = 0; dy < 2; dy++) {
    for (let dx = 0; dx < 2; dx++) {
      canvas.set(lx + dx, ey + dy, color);
      canvas.set(rx + dx, ey + dy, color);
    }
  }
  canvas.set(lx, ey, highlight);
  canvas.set(rx, ey, highlight);
}

export function drawSmile(canvas: PixelCanvas, face: Point): void {
  const y = face.y + 2;
  for (let dx = -2; dx <= 2; dx++) {
    canvas.set(face.x + dx, y, PALETTE.black);
  }
  canvas.set(face.x - 3, y - 1, PALETTE.black);
  canvas.set(face.x + 3, y - 1, PALETTE.black);
}

export function drawFrown(canvas: PixelCanvas, face: Point): void {
  const y = face.y + 3;
  for (let dx = -2; dx <= 2; dx++) {
    canvas.set(face.x + dx, y, PALETTE.black);
  }
  canvas.set(face.x - 3, y + 1, PALETTE.black);
  canvas.set(face.x + 3, y + 1, PALETTE.black);
}

/**
 * 5x3 open mouth with a red middle
 */
export function drawOpenMouth(canvas: PixelCanvas, face: Point): void {
  const y = face.y + 2;
  for (let dy = 0; dy < 3; dy++) {
    for (let dx = -2; dx <= 2; dx++) {
      canvas.set(face.x + dx, y + dy, PALETTE.black);
    }
  }
  for (let dx = -1; dx <= 1; dx++) {
    canvas.set(face.x + dx, y + 1, PALETTE.red);
  }
}

/**
 * 3x3 crosses
 */
export function drawXEyes(canvas: PixelCanvas, face: Point): void {
  const lx = face.x - 5;
  const rx = face.x + 2;
  const ey = face.y - 2;

  for (let i = 0; i < 3; i++) {
    canvas.set(lx + i, ey + i, PALETTE.black);
    canvas.set(lx + 2 - i, ey + i, PALETTE.black);
    canvas.set(rx + i, ey + i, PALETTE.black);
    canvas.set(rx + 2 - i, ey + i, PALETTE.black);
  }
}

export function drawClosedEyes(canvas: PixelCanvas, face: Point): void {
  const lx = face.x - 5;
  const rx = face.x + 2;
  const ey = face.y - 1;

  for (let dx = 0; dx < 3; dx++) {
    canvas.set(lx + dx, ey, PALETTE.black);
    canvas.set(rx + dx, ey, PALETTE.black);
  }
}
