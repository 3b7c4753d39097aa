/**
 * Ghost-Suggestion Controller
 *
 * Owns the single inline AI suggestion of the application:
 *
 *   idle ──text key──▶ debouncing ──timer──▶ awaitingResponse ──valid──▶ displaying
 *     ▲                    │ text key restarts        │ stale/empty/error        │ accept/reject/
 *     └────────────────────┴──────────────────────────┴──────────────────────────┘ supersede
 *
 * Every input, including timer expiry and completion results, arrives as a
 * GhostEvent through `handle()`, so transitions are totally ordered on the
 * event loop. Completion requests are never cancelled; a result is applied only
 * if it still matches the current request, document, version and cursor.
 *
 * The displayed ghost lives in the buffer as overlay-tagged text inserted
 * outside undo history. Accepting swaps it for a normal, undoable insert.
 */

import { createStore } from 'zustand/vanilla'
import {
  getCursor,
  getDocumentLanguage,
  insertText,
  removeOverlay,
  showOverlay,
  type EditorDocument,
} from '@/core/editor/document'
import type { CompletionClient } from '@/core/services/completion'
import { Debouncer } from '@/core/lib/debounce'
import { getErrorMessage } from '@/core/lib/errors'
import { makeLogger } from '@/core/lib/logger'
import { classifyKey, type KeyClass } from './keys'
import { GhostMetrics } from './ghostMetrics'
import type {
  GhostEvent,
  GhostHost,
  GhostOutcome,
  GhostPhase,
  GhostSettings,
  GhostSnapshot,
  GhostSuggestion,
} from './types'

const logger = makeLogger('ghost')

export const AI_UNAVAILABLE_STATUS = 'AI assistant is not available'

interface PendingRequest {
  id: number
  documentId: string
  version: number
  anchor: number
  startedAt: number
}

type ControllerState =
  | { phase: 'idle' }
  | { phase: 'debouncing'; token: number }
  | { phase: 'awaitingResponse'; request: PendingRequest }
  | { phase: 'displaying'; suggestion: GhostSuggestion }

export interface GhostControllerOptions {
  host: GhostHost
  /** null when no client could be configured */
  client: CompletionClient | null
  settings: () => GhostSettings
}

export class GhostSuggestionController {
  /** Observable snapshot for the UI */
  readonly store = createStore<GhostSnapshot>()(() => ({
    phase: 'idle',
    suggestion: null,
    lastOutcome: null,
  }))
  readonly metrics = new GhostMetrics()

  private readonly host: GhostHost
  private readonly client: CompletionClient | null
  private readonly settings: () => GhostSettings
  private readonly debouncer: Debouncer

  private state: ControllerState = { phase: 'idle' }
  private requestSeq = 0
  private inflight: Promise<void> | null = null
  // Set while the controller edits a buffer itself (show, remove, promote) so
  // the bufferChanged it causes is not taken for user input
  private mutating = false
  private disposed = false

  constructor(options: GhostControllerOptions) {
    this.host = options.host
    this.client = options.client
    this.settings = options.settings
    this.debouncer = new Debouncer(options.settings().aiSuggestionDelay)
  }

  get phase(): GhostPhase {
    return this.state.phase
  }

  isDisplaying(): boolean {
    return this.state.phase === 'displaying'
  }

  getSuggestion(): GhostSuggestion | null {
    return this.state.phase === 'displaying' ? this.state.suggestion : null
  }

  /**
   * Feed one event into the state machine. Never throws: failures are logged,
   * reported as status text, and leave the controller idle.
   */
  handle(event: GhostEvent): void {
    if (this.disposed) return

    try {
      this.dispatch(event)
    } catch (error) {
      logger.error('Suggestion handling failed', event.type, error)
      this.recover()
      this.host.reportStatus(`AI suggestion failed: ${getErrorMessage(error)}`)
    }
  }

  /** Resolves once the most recent completion request has been handled */
  settled(): Promise<void> {
    return this.inflight ?? Promise.resolve()
  }

  dispose(): void {
    if (this.disposed) return
    this.handle({ type: 'reject' })
    this.debouncer.cancel()
    this.disposed = true
  }

  // ==========================================================================
  // DISPATCH
  // ==========================================================================

  private dispatch(event: GhostEvent): void {
    switch (event.type) {
      case 'keystroke':
        return this.onKeystroke(classifyKey(event))
      case 'accept':
        return this.accept()
      case 'reject':
      case 'focusLost':
      case 'mouseClick':
      case 'tabSwitch':
      case 'save':
      case 'run':
        return this.dismiss()
      case 'bufferChanged':
        return this.onBufferChanged(event.documentId)
      case 'manualTrigger':
        return this.onManualTrigger()
      case 'debounceElapsed':
        return this.onDebounceElapsed(event.token)
      case 'completionResolved':
        return this.onResolved(event.requestId, event.text)
      case 'completionFailed':
        return this.onFailed(event.requestId, event.error)
    }
  }

  private onKeystroke(kind: KeyClass) {
    if (kind === 'modifier') return
    // Only qualifying keys restart a pending debounce
    if (this.state.phase === 'debouncing' && kind !== 'text') return

    if (this.state.phase === 'displaying') {
      this.clearOverlay(kind === 'text' ? 'superseded' : 'rejected')
    } else if (this.state.phase === 'awaitingResponse') {
      this.abandonRequest()
    }

    if (kind === 'text') this.arm()
    else this.transition({ phase: 'idle' })
  }

  private dismiss() {
    switch (this.state.phase) {
      case 'displaying':
        return this.clearOverlay('rejected')
      case 'awaitingResponse':
        return this.abandonRequest()
      case 'debouncing':
        return this.transition({ phase: 'idle' }, 'cancelled')
      case 'idle':
        return
    }
  }

  private onBufferChanged(documentId: string) {
    if (this.mutating) return
    if (this.state.phase === 'displaying' && this.state.suggestion.documentId === documentId) {
      this.clearOverlay('rejected')
    }
  }

  private onManualTrigger() {
    if (!this.isClientReady()) {
      this.host.reportStatus(AI_UNAVAILABLE_STATUS)
      return
    }

    if (this.state.phase === 'displaying') this.clearOverlay('superseded')
    else if (this.state.phase === 'awaitingResponse') this.abandonRequest()
    this.request()
  }

  private onDebounceElapsed(token: number) {
    if (this.state.phase !== 'debouncing' || this.state.token !== token) return
    this.request()
  }

  // ==========================================================================
  // REQUEST / RESPONSE
  // ==========================================================================

  private isClientReady(): boolean {
    return this.settings().aiEnabled && this.client !== null && this.client.isAvailable()
  }

  private arm() {
    if (!this.isClientReady() || !this.settings().aiAutoSuggest) {
      this.transition({ phase: 'idle' })
      return
    }

    this.debouncer.setDelay(this.settings().aiSuggestionDelay)
    const token = this.debouncer.schedule((fired) => this.handle({ type: 'debounceElapsed', token: fired }))
    this.transition({ phase: 'debouncing', token })
  }

  private request() {
    const { client } = this
    const doc = this.host.getActiveDocument()
    if (!client || !doc) {
      this.transition({ phase: 'idle' })
      return
    }

    const anchor = getCursor(doc)
    const request: PendingRequest = {
      id: ++this.requestSeq,
      documentId: doc.id,
      version: doc.version,
      anchor,
      startedAt: Date.now(),
    }
    this.transition({ phase: 'awaitingResponse', request })
    this.metrics.record('trigger')
    logger.debug('Requesting completion', { id: request.id, documentId: doc.id, anchor })

    let pending: Promise<string>
    try {
      pending = client.completeAsync(
        doc.state.sliceDoc(0, anchor),
        doc.state.sliceDoc(anchor),
        doc.state.doc.lineAt(anchor).text,
        doc.title,
        getDocumentLanguage(doc)
      )
    } catch (error) {
      pending = Promise.reject(error)
    }

    this.inflight = pending.then(
      (text) => this.handle({ type: 'completionResolved', requestId: request.id, text }),
      (error: unknown) => this.handle({ type: 'completionFailed', requestId: request.id, error })
    )
  }

  private currentRequest(requestId: number): PendingRequest | null {
    if (this.state.phase !== 'awaitingResponse' || this.state.request.id !== requestId) return null
    return this.state.request
  }

  private onResolved(requestId: number, raw: string) {
    const request = this.currentRequest(requestId)
    if (!request) {
      this.metrics.record('stale_discard')
      logger.debug('Dropping superseded completion', requestId)
      return
    }

    const doc = this.host.getActiveDocument()
    if (!doc || !this.stillAnchored(doc, request)) {
      this.metrics.record('stale_discard')
      logger.debug('Dropping stale completion', requestId)
      this.transition({ phase: 'idle' }, 'stale')
      return
    }

    const text = raw.replace(/\r\n?/g, '\n')
    if (text.trim() === '') {
      this.metrics.record('empty')
      this.transition({ phase: 'idle' }, 'empty')
      return
    }

    const shown = this.mutate(() =>
      this.host.updateDocument(doc.id, (current) => showOverlay(current, request.anchor, text))
    )
    if (!shown) {
      this.transition({ phase: 'idle' }, 'stale')
      return
    }

    this.metrics.record('display', { latencyMs: Date.now() - request.startedAt })
    this.transition({
      phase: 'displaying',
      suggestion: { documentId: doc.id, anchor: request.anchor, text },
    })
  }

  private stillAnchored(doc: EditorDocument, request: PendingRequest): boolean {
    return doc.id === request.documentId && doc.version === request.version && getCursor(doc) === request.anchor
  }

  private onFailed(requestId: number, error: unknown) {
    if (!this.currentRequest(requestId)) {
      this.metrics.record('stale_discard')
      logger.debug('Ignoring failure of superseded request', requestId, error)
      return
    }

    this.metrics.record('error')
    logger.warn('Completion request failed', error)
    this.transition({ phase: 'idle' }, 'failed')
    this.host.reportStatus(`AI suggestion failed: ${getErrorMessage(error)}`)
  }

  private abandonRequest() {
    this.metrics.record('cancel')
    this.transition({ phase: 'idle' }, 'cancelled')
  }

  // ==========================================================================
  // OVERLAY
  // ==========================================================================

  private accept() {
    if (this.state.phase !== 'displaying') return
    const { suggestion } = this.state

    const doc = this.host.getDocument(suggestion.documentId)
    if (!doc) {
      this.transition({ phase: 'idle' }, 'rejected')
      return
    }

    const { doc: restored, removal } = removeOverlay(doc, { from: suggestion.anchor, text: suggestion.text })
    if (removal !== 'anchor') {
      // The overlay is no longer where it was shown; accepting could land text in the wrong place
      logger.warn('Overlay moved before accept, discarding it', suggestion.documentId)
      if (removal === 'fallback') this.mutate(() => this.host.updateDocument(doc.id, () => restored))
      this.metrics.record('reject')
      this.transition({ phase: 'idle' }, 'rejected')
      return
    }

    const accepted = insertText(restored, suggestion.anchor, suggestion.text)
    this.mutate(() => this.host.updateDocument(doc.id, () => accepted))
    this.metrics.record('accept')
    this.transition({ phase: 'idle' }, 'accepted')
  }

  private clearOverlay(outcome: 'rejected' | 'superseded') {
    if (this.state.phase !== 'displaying') return
    const { suggestion } = this.state

    const doc = this.host.getDocument(suggestion.documentId)
    if (doc) {
      const { doc: restored, removal } = removeOverlay(doc, { from: suggestion.anchor, text: suggestion.text })
      if (removal === 'fallback') {
        logger.warn('Overlay anchors were stale, stripped tagged ranges', suggestion.documentId)
      }
      if (removal !== 'none') this.mutate(() => this.host.updateDocument(doc.id, () => restored))
    }

    this.metrics.record(outcome === 'superseded' ? 'supersede' : 'reject')
    this.transition({ phase: 'idle' }, outcome)
  }

  private mutate<T>(apply: () => T): T {
    this.mutating = true
    try {
      return apply()
    } finally {
      this.mutating = false
    }
  }

  // ==========================================================================
  // STATE
  // ==========================================================================

  private transition(next: ControllerState, outcome?: GhostOutcome) {
    if (next.phase !== 'debouncing') this.debouncer.cancel()
    this.state = next

    this.store.setState({
      phase: next.phase,
      suggestion: next.phase === 'displaying' ? next.suggestion : null,
      ...(outcome ? { lastOutcome: outcome } : {}),
    })
  }

  /** Best-effort return to idle after an unexpected failure */
  private recover() {
    try {
      this.clearOverlay('rejected')
    } catch (error) {
      logger.error('Could not strip overlay during recovery', error)
    }
    this.transition({ phase: 'idle' })
  }
}
