import { Transaction, type ChangeSpec } from '@codemirror/state'
import {
  addOverlayEffect,
  clearOverlayEffect,
  getOverlayRanges,
} from '@/core/editor/codemirror/state'
import type { EditorDocument } from './types'

/**
 * Where the controller believes the overlay sits.
 */
export interface OverlayHint {
  from: number
  text: string
}

export type OverlayRemoval = 'none' | 'anchor' | 'fallback'

/**
 * Insert `text` at `anchor` as overlay: tagged, outside undo history, with the
 * cursor left at the anchor so the text reads as ahead of the cursor.
 * `version` and `modified` are untouched.
 */
export function showOverlay(doc: EditorDocument, anchor: number, text: string): EditorDocument {
  const insert = doc.state.toText(text)
  const tr = doc.state.update({
    changes: { from: anchor, insert },
    effects: addOverlayEffect.of({ from: anchor, to: anchor + insert.length }),
    selection: { anchor },
    annotations: Transaction.addToHistory.of(false),
  })
  return { ...doc, state: tr.state }
}

function matchesHint(doc: EditorDocument, hint: OverlayHint): boolean {
  const ranges = getOverlayRanges(doc.state)
  const to = hint.from + hint.text.length
  const only = ranges[0]

  return (
    ranges.length === 1 &&
    only !== undefined &&
    only.from === hint.from &&
    only.to === to &&
    doc.state.sliceDoc(hint.from, to) === hint.text
  )
}

/**
 * Strip overlay text from the buffer, restoring it to its pre-overlay content.
 *
 * Uses the hinted range when the buffer still holds exactly that overlay,
 * otherwise removes every overlay-tagged range found in the buffer.
 */
export function removeOverlay(
  doc: EditorDocument,
  hint?: OverlayHint
): { doc: EditorDocument; removal: OverlayRemoval } {
  const ranges = getOverlayRanges(doc.state)
  if (ranges.length === 0) return { doc, removal: 'none' }

  let changes: ChangeSpec[]
  let removal: OverlayRemoval
  if (hint && matchesHint(doc, hint)) {
    changes = [{ from: hint.from, to: hint.from + hint.text.length }]
    removal = 'anchor'
  } else {
    changes = ranges.map(({ from, to }) => ({ from, to }))
    removal = 'fallback'
  }

  const tr = doc.state.update({
    changes,
    effects: clearOverlayEffect.of(null),
    annotations: Transaction.addToHistory.of(false),
  })
  return { doc: { ...doc, state: tr.state }, removal }
}
