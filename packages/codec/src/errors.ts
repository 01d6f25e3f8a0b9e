export type SpriteErrorCode =
  | 'INVALID_COLOR_COMPONENT'
  | 'INVALID_PIXEL_VALUE'
  | 'DIMENSION_MISMATCH'
  | 'EMPTY_SHEET'
  | 'FRAME_SIZE_MISMATCH'
  | 'MISSING_FRAME_INDEX'
  | 'NOT_FOUND';

/**
 * Base class for every condition the codec and catalog raise.
 * Batch producers catch these per sprite and turn them into reports.
 */
export class SpriteCodecError extends Error {
  readonly code: SpriteErrorCode;

  constructor(code: SpriteErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidColorComponentError extends SpriteCodecError {
  constructor(
    readonly channel: 'r' | 'g' | 'b',
    readonly value: number,
  ) {
    super('INVALID_COLOR_COMPONENT', `Color component ${channel}=${value} is outside 0-255`);
  }
}

export class InvalidPixelValueError extends SpriteCodecError {
  constructor(
    readonly index: number,
    readonly value: number,
  ) {
    super('INVALID_PIXEL_VALUE', `Pixel ${index} has value ${value}, expected an integer in 0x0000-0xFFFF`);
  }
}

export class DimensionMismatchError extends SpriteCodecError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    detail?: string,
  ) {
    super(
      'DIMENSION_MISMATCH',
      `Expected ${expected} pixels, got ${actual}${detail ? ` (${detail})` : ''}`,
    );
  }
}

export class EmptySheetError extends SpriteCodecError {
  constructor(
    readonly imageWidth: number,
    readonly imageHeight: number,
    readonly frameWidth: number,
    readonly frameHeight: number,
  ) {
    super(
      'EMPTY_SHEET',
      `Image ${imageWidth}x${imageHeight} is smaller than frame size ${frameWidth}x${frameHeight}`,
    );
  }
}

export class FrameSizeMismatchError extends SpriteCodecError {
  constructor(
    readonly arrayName: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super('FRAME_SIZE_MISMATCH', `${arrayName}: ${actual} pixels (expected ${expected})`);
  }
}

/**
 * Inclusive run of frame indices
 */
export interface IndexRange {
  from: number;
  to: number;
}

// Runs listed in the message before it is cut short
const MAX_LISTED_RANGES = 8;

function formatRanges(ranges: readonly IndexRange[]): string {
  const listed = ranges
    .slice(0, MAX_LISTED_RANGES)
    .map(({ from, to }) => (from === to ? `${from}` : `${from}..${to}`));
  if (ranges.length > MAX_LISTED_RANGES) {
    listed.push(`and ${ranges.length - MAX_LISTED_RANGES} more`);
  }
  return listed.join(', ');
}

export class MissingFrameIndexError extends SpriteCodecError {
  constructor(
    readonly spriteName: string,
    readonly missing: readonly IndexRange[],
  ) {
    super('MISSING_FRAME_INDEX', `${spriteName}: missing frame index ${formatRanges(missing)}`);
  }
}

export class SpriteNotFoundError extends SpriteCodecError {
  constructor(readonly spriteName: string) {
    super('NOT_FOUND', `Sprite not found: ${spriteName}`);
  }
}
