import { EditorState, type Extension } from '@codemirror/state'
import { history } from '@codemirror/commands'
import type { LanguageId } from '@/core/editor/types/languageRegistry'
import { getLanguageExtension } from './compartments/language'
import { highlightField, overlayField } from './state'

/**
 * Extensions every document buffer carries: undo history, language, overlay
 * tags and highlight spans.
 */
export function documentExtensions(language: LanguageId): Extension[] {
  return [history(), getLanguageExtension(language), overlayField, highlightField]
}

/**
 * Create an EditorState with the given content and the document extensions.
 * Line breaks are normalized to `\n`.
 */
export function createEditorState(content: string, language: LanguageId): EditorState {
  return EditorState.create({
    doc: content,
    extensions: documentExtensions(language),
  })
}
