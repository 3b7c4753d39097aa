export {
  overlayField,
  addOverlayEffect,
  clearOverlayEffect,
  getOverlayRanges,
  hasOverlay,
  stripOverlayText,
  type OverlayRange,
} from './overlayField'
export { highlightField, getHighlightSpans } from './highlightField'
