export type { CellStyle, Frame, FrameCell, HitMap, HitTarget } from './frame'
export { BLANK, FrameBuffer, cellAt, hitAt, rowText } from './frame'
export { arrowGlyph, clipSegment, lineGlyph, rasterizeLine } from './rasterizeLine'
export type { LabelPlacement } from './placeLabels'
export { ELLIPSIS, EMPTY_LABEL_GLYPH, byZOrder, placeLabels } from './placeLabels'
export type { MenuOverlay, ModalOverlay, Overlays, RubberBand } from './overlays'
export { NO_OVERLAYS, menuBox } from './overlays'
export type { Composition, RenderScene } from './composeFrame'
export { composeFrame } from './composeFrame'
export type { CellUpdate } from './diffFrames'
export { diffFrames } from './diffFrames'
export { RESET, encodeUpdates, moveTo, styleSequence } from './ansiEncoding'
export type { HudInfo } from './hud'
export { formatHud } from './hud'
