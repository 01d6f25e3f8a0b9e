// Color codec
export { encode565, decode565, isTransparent, formatHex565 } from './color/color565.js';

// Frames
export { FrameBuffer, type FromRasterOptions } from './frame/frame-buffer.js';

// Spritesheets
export {
  extractRegion,
  sliceCells,
  splitSheet,
  composeSheet,
  scaleRaster,
  type SplitOptions,
} from './sheet/sprite-sheet.js';

// Errors
export {
  SpriteCodecError,
  InvalidColorComponentError,
  InvalidPixelValueError,
  DimensionMismatchError,
  EmptySheetError,
  FrameSizeMismatchError,
  MissingFrameIndexError,
  SpriteNotFoundError,
  type SpriteErrorCode,
  type IndexRange,
} from './errors.js';
