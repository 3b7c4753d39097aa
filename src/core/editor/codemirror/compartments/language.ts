import path from 'node:path'
import { Compartment, Facet, type EditorState, type Extension, type TransactionSpec } from '@codemirror/state'
import { detectLanguage, isHighlightedLanguage, type LanguageId } from '@/core/editor/types/languageRegistry'

/**
 * Language of the document buffer. Later contributions win.
 */
export const languageFacet = Facet.define<LanguageId, LanguageId>({
  combine: (values) => values[values.length - 1] ?? 'python',
})

/**
 * Compartment for language mode.
 * Allows switching language when a document is saved under a new name.
 */
export const languageCompartment = new Compartment()

export function getLanguageExtension(language: LanguageId): Extension {
  return languageCompartment.of(languageFacet.of(language))
}

export function getLanguage(state: EditorState): LanguageId {
  return state.facet(languageFacet)
}

export function isHighlighted(state: EditorState): boolean {
  return isHighlightedLanguage(getLanguage(state))
}

/**
 * Transaction spec that switches the language at runtime.
 */
export function setLanguage(language: LanguageId): TransactionSpec {
  return { effects: languageCompartment.reconfigure(languageFacet.of(language)) }
}

/**
 * Language for a document: detected from its path, Python for untitled
 * buffers.
 */
export function languageForPath(filePath: string | null): LanguageId {
  return filePath ? detectLanguage(path.basename(filePath)).id : 'python'
}
