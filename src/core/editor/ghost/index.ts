export { GhostSuggestionController, AI_UNAVAILABLE_STATUS, type GhostControllerOptions } from './ghostController'
export { GhostMetrics, type GhostMetric } from './ghostMetrics'
export { classifyKey, isPrintableKey, type KeyClass, type KeyInput } from './keys'
export type {
  GhostEvent,
  GhostHost,
  GhostOutcome,
  GhostPhase,
  GhostSettings,
  GhostSnapshot,
  GhostSuggestion,
} from './types'
