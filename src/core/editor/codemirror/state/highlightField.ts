import { StateField, type EditorState } from '@codemirror/state'
import { highlight, type HighlightSpan } from '@/core/editor/highlight/pythonHighlighter'
import { isHighlighted, languageFacet } from '@/core/editor/codemirror/compartments/language'

function compute(state: EditorState): readonly HighlightSpan[] {
  return isHighlighted(state) ? highlight(state.doc.toString()) : []
}

/**
 * Highlight spans for the whole buffer, recomputed from scratch whenever the
 * document or its language changes. Never merged across edits.
 */
export const highlightField = StateField.define<readonly HighlightSpan[]>({
  create(state) {
    return compute(state)
  },

  update(spans, tr) {
    const languageChanged = tr.startState.facet(languageFacet) !== tr.state.facet(languageFacet)
    return tr.docChanged || languageChanged ? compute(tr.state) : spans
  },
})

export function getHighlightSpans(state: EditorState): readonly HighlightSpan[] {
  return state.field(highlightField)
}
