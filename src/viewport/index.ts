export {
  DEFAULT_CHAR_WIDTH,
  DEFAULT_LINE_HEIGHT,
  DEFAULT_VIEWPORT_HEIGHT,
  DEFAULT_VIEWPORT_WIDTH,
  ViewportGeometry,
} from "./geometry.ts";
export {
  calculateContentHeight,
  calculatePartialLines,
  calculateScrollTop,
  calculateVisibleLines,
  clampScroll,
  lineToY,
  xToColumn,
  yToLine,
} from "./measurement.ts";
export type {
  Measurements,
  PartialLineView,
  ScrollOffset,
  ScrollStrategy,
  ViewportOptions,
  ViewportSize,
  VisibleLineRange,
} from "./types.ts";
