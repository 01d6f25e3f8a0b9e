// Header parsing
export {
  stripComments,
  extractArrays,
  parseFrameArrayName,
  groupByFrame,
  extractAnimationTable,
  type GroupOptions,
  type FrameGroup,
  type TableRow,
} from './header/text-array-parser.js';

// Header writing
export {
  frameArrayName,
  formatFrameArray,
  serializeSpriteHeader,
  serializeToText,
  type HeaderOptions,
} from './header/header-writer.js';

// Animation config
export {
  AnimConfigLineSchema,
  parseAnimConfig,
  resolveAnimConfig,
  type ParsedAnimConfig,
} from './config/anim-config.js';

// Catalog
export {
  AnimationCatalog,
  createEntry,
  type SpriteEntry,
  type SpriteSlot,
  type CatalogOptions,
  type SheetCatalogOptions,
  type TextCatalogOptions,
  type ProceduralSprite,
  type CatalogBuild,
} from './catalog/animation-catalog.js';
