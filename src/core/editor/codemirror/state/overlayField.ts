/**
 * Overlay State Management
 *
 * The overlay is the ghost suggestion's text while it is displayed: real
 * characters inserted into the buffer, tagged by range in this field so they
 * can be told apart from the user's content and stripped again.
 *
 * Ranges are mapped through every change. Text typed at either edge of an
 * overlay stays outside it.
 */

import { RangeSet, RangeValue, StateEffect, StateField, type EditorState } from '@codemirror/state'

// ============================================================================
// TYPES
// ============================================================================

export interface OverlayRange {
  from: number
  to: number
}

class OverlayMark extends RangeValue {
  startSide = 1
  endSide = -1

  eq(other: RangeValue): boolean {
    return other instanceof OverlayMark
  }
}

const overlayMark = new OverlayMark()

// ============================================================================
// STATE EFFECTS
// ============================================================================

/** Tag a range (in post-change coordinates) as overlay */
export const addOverlayEffect = StateEffect.define<OverlayRange>({
  map: ({ from, to }, change) => ({ from: change.mapPos(from, 1), to: change.mapPos(to, -1) }),
})

/** Drop every overlay tag */
export const clearOverlayEffect = StateEffect.define<null>()

// ============================================================================
// STATE FIELD
// ============================================================================

export const overlayField = StateField.define<RangeSet<OverlayMark>>({
  create() {
    return RangeSet.empty
  },

  update(value, tr) {
    let ranges = value.map(tr.changes)

    for (const effect of tr.effects) {
      if (effect.is(clearOverlayEffect)) {
        ranges = RangeSet.empty
      } else if (effect.is(addOverlayEffect) && effect.value.to > effect.value.from) {
        ranges = ranges.update({
          add: [overlayMark.range(effect.value.from, effect.value.to)],
          sort: true,
        })
      }
    }

    return ranges
  },
})

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Overlay-tagged ranges in ascending order.
 */
export function getOverlayRanges(state: EditorState): OverlayRange[] {
  const ranges: OverlayRange[] = []
  for (let cursor = state.field(overlayField).iter(); cursor.value; cursor.next()) {
    ranges.push({ from: cursor.from, to: cursor.to })
  }
  return ranges
}

export function hasOverlay(state: EditorState): boolean {
  return state.field(overlayField).size > 0
}

/**
 * Buffer text with every overlay-tagged range removed.
 */
export function stripOverlayText(state: EditorState): string {
  const ranges = getOverlayRanges(state)
  if (ranges.length === 0) return state.doc.toString()

  let text = ''
  let pos = 0
  for (const { from, to } of ranges) {
    if (from > pos) text += state.sliceDoc(pos, from)
    pos = Math.max(pos, to)
  }
  return text + state.sliceDoc(pos)
}
