export * from './types'
export * from './document'
export { showOverlay, removeOverlay, type OverlayHint, type OverlayRemoval } from './overlay'
