import type { EditorState } from '@codemirror/state'

/** Opaque, process-unique document handle */
export type DocumentId = string

/**
 * One open file's buffer and save state.
 *
 * Immutable: every operation returns a new record. The buffer (`state.doc`)
 * may contain overlay-tagged ghost text; real content excludes it.
 */
export interface EditorDocument {
  readonly id: DocumentId
  /** Basename of `path`, or `Untitled-N` */
  readonly title: string
  /** Absolute path of the backing file, null for untitled buffers */
  readonly path: string | null
  /** Buffer, selection, undo history, overlay tags and highlight spans */
  readonly state: EditorState
  /** Real content as last loaded or saved */
  readonly savedText: string
  readonly modified: boolean
  /** Incremented on every real edit; overlay changes leave it alone */
  readonly version: number
}

export interface SaveResult {
  path: string
  text: string
}

export interface CursorPosition {
  /** 1-based */
  line: number
  /** 0-based */
  column: number
}
