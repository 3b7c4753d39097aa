import type { DocumentId, EditorDocument } from '@/core/editor/document'
import type { KeyInput } from './keys'

export type GhostPhase = 'idle' | 'debouncing' | 'awaitingResponse' | 'displaying'

/** How the last suggestion cycle ended */
export type GhostOutcome = 'accepted' | 'rejected' | 'superseded' | 'cancelled' | 'stale' | 'empty' | 'failed'

export interface GhostSuggestion {
  documentId: DocumentId
  /** Buffer offset where the overlay starts */
  anchor: number
  text: string
}

export type GhostEvent =
  | ({ type: 'keystroke' } & KeyInput)
  | { type: 'accept' }
  | { type: 'reject' }
  | { type: 'focusLost' }
  | { type: 'mouseClick' }
  | { type: 'tabSwitch' }
  | { type: 'save' }
  | { type: 'run' }
  | { type: 'bufferChanged'; documentId: DocumentId }
  | { type: 'manualTrigger' }
  | { type: 'debounceElapsed'; token: number }
  | { type: 'completionResolved'; requestId: number; text: string }
  | { type: 'completionFailed'; requestId: number; error: unknown }

/** Observable controller state for the UI */
export interface GhostSnapshot {
  phase: GhostPhase
  suggestion: GhostSuggestion | null
  lastOutcome: GhostOutcome | null
}

/**
 * What the controller needs from the editor around it. Documents are only
 * ever changed through `updateDocument`.
 */
export interface GhostHost {
  getActiveDocument(): EditorDocument | null
  getDocument(id: DocumentId): EditorDocument | null
  updateDocument(id: DocumentId, update: (doc: EditorDocument) => EditorDocument): EditorDocument | null
  reportStatus(message: string): void
}

export interface GhostSettings {
  aiEnabled: boolean
  aiAutoSuggest: boolean
  /** Debounce delay in ms */
  aiSuggestionDelay: number
}
