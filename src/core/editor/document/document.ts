/**
 * Document operations.
 *
 * Pure functions over EditorDocument. Real edits go through CodeMirror
 * transactions so undo history is kept by @codemirror/commands; each edit is
 * isolated into its own undo entry.
 */

import { randomUUID } from 'node:crypto'
import path from 'node:path'
import { findClusterBreak, Transaction, type StateCommand, type TransactionSpec } from '@codemirror/state'
import { isolateHistory, redo, redoDepth, undo, undoDepth } from '@codemirror/commands'
import { createEditorState } from '@/core/editor/codemirror/setup'
import { getLanguage, languageForPath, setLanguage } from '@/core/editor/codemirror/compartments/language'
import { getHighlightSpans, stripOverlayText } from '@/core/editor/codemirror/state'
import type { HighlightSpan } from '@/core/editor/highlight/pythonHighlighter'
import type { LanguageId } from '@/core/editor/types/languageRegistry'
import type { FileService } from '@/core/services/fileService'
import { AppError, ErrorType } from '@/core/lib/errors'
import type { CursorPosition, EditorDocument, SaveResult } from './types'

// ============================================================================
// CREATION
// ============================================================================

export interface CreateDocumentOptions {
  title?: string
  path?: string | null
  content?: string
}

export function createDocument(options: CreateDocumentOptions = {}): EditorDocument {
  const filePath = options.path ? path.resolve(options.path) : null
  const state = createEditorState(options.content ?? '', languageForPath(filePath))

  return {
    id: `doc-${randomUUID()}`,
    title: filePath ? path.basename(filePath) : options.title ?? 'Untitled',
    path: filePath,
    state,
    savedText: state.doc.toString(),
    modified: false,
    version: 0,
  }
}

/**
 * Read a file fully into a new document.
 *
 * @throws AppError(IO) when the file is missing, unreadable or not UTF-8
 */
export async function loadDocument(filePath: string, files: FileService): Promise<EditorDocument> {
  const resolved = path.resolve(filePath)
  const content = await files.readText(resolved)
  return createDocument({ path: resolved, content })
}

// ============================================================================
// READING
// ============================================================================

/** Real content: the buffer without overlay-tagged text */
export function getText(doc: EditorDocument): string {
  return stripOverlayText(doc.state)
}

/** Everything in the buffer, displayed ghost text included */
export function getBufferText(doc: EditorDocument): string {
  return doc.state.doc.toString()
}

export function getCursor(doc: EditorDocument): number {
  return doc.state.selection.main.head
}

export function getSelectedText(doc: EditorDocument): string {
  const { from, to } = doc.state.selection.main
  return doc.state.sliceDoc(from, to)
}

export function cursorPosition(doc: EditorDocument): CursorPosition {
  const head = getCursor(doc)
  const line = doc.state.doc.lineAt(head)
  return { line: line.number, column: head - line.from }
}

/**
 * The derived line-number view: one number per buffer line.
 */
export function lineNumberGutter(doc: EditorDocument): string {
  return Array.from({ length: doc.state.doc.lines }, (_, i) => String(i + 1)).join('\n')
}

export function getHighlights(doc: EditorDocument): readonly HighlightSpan[] {
  return getHighlightSpans(doc.state)
}

export function getDocumentLanguage(doc: EditorDocument): LanguageId {
  return getLanguage(doc.state)
}

export function canUndo(doc: EditorDocument): boolean {
  return undoDepth(doc.state) > 0
}

export function canRedo(doc: EditorDocument): boolean {
  return redoDepth(doc.state) > 0
}

// ============================================================================
// EDITING
// ============================================================================

function clamp(doc: EditorDocument, offset: number): number {
  return Math.min(Math.max(0, Math.trunc(offset)), doc.state.doc.length)
}

function commit(doc: EditorDocument, tr: Transaction): EditorDocument {
  const text = stripOverlayText(tr.state)
  return {
    ...doc,
    state: tr.state,
    version: doc.version + 1,
    modified: text !== doc.savedText,
  }
}

function applyEdit(doc: EditorDocument, spec: TransactionSpec, userEvent: string): EditorDocument {
  const tr = doc.state.update(spec, {
    annotations: [isolateHistory.of('full'), Transaction.userEvent.of(userEvent)],
  })
  return commit(doc, tr)
}

/**
 * Insert `text` at `offset` and leave the cursor after it.
 */
export function insertText(doc: EditorDocument, offset: number, text: string): EditorDocument {
  if (text.length === 0) return doc

  const from = clamp(doc, offset)
  const insert = doc.state.toText(text)
  return applyEdit(
    doc,
    { changes: { from, insert }, selection: { anchor: from + insert.length } },
    'input'
  )
}

/**
 * Delete `[start, end)` (either order) and leave the cursor at the start.
 */
export function deleteRange(doc: EditorDocument, start: number, end: number): EditorDocument {
  const from = clamp(doc, Math.min(start, end))
  const to = clamp(doc, Math.max(start, end))
  if (from === to) return doc

  return applyEdit(doc, { changes: { from, to }, selection: { anchor: from } }, 'delete')
}

/**
 * Replace the main selection with `text` (plain typing when the selection is
 * empty).
 */
export function replaceSelection(doc: EditorDocument, text: string): EditorDocument {
  const { from, to } = doc.state.selection.main
  if (from === to && text.length === 0) return doc

  const insert = doc.state.toText(text)
  return applyEdit(
    doc,
    { changes: { from, to, insert }, selection: { anchor: from + insert.length } },
    'input'
  )
}

/** Offset of the character boundary next to `pos`; a line break counts as one */
function charBoundary(doc: EditorDocument, pos: number, forward: boolean): number {
  const line = doc.state.doc.lineAt(pos)
  if (forward ? pos === line.to : pos === line.from) return forward ? pos + 1 : pos - 1
  return line.from + findClusterBreak(line.text, pos - line.from, forward)
}

/** Backspace: delete the selection, else the character before the cursor */
export function deleteBackward(doc: EditorDocument): EditorDocument {
  const { from, to } = doc.state.selection.main
  return from === to ? deleteRange(doc, charBoundary(doc, from, false), from) : deleteRange(doc, from, to)
}

/** Delete: delete the selection, else the character after the cursor */
export function deleteForward(doc: EditorDocument): EditorDocument {
  const { from, to } = doc.state.selection.main
  return from === to ? deleteRange(doc, from, charBoundary(doc, from, true)) : deleteRange(doc, from, to)
}

function runHistoryCommand(doc: EditorDocument, command: StateCommand): EditorDocument {
  const dispatched: Transaction[] = []
  command({ state: doc.state, dispatch: (tr) => dispatched.push(tr) })

  const tr = dispatched.at(-1)
  return tr ? commit(doc, tr) : doc
}

/** No-op when there is nothing to undo */
export function undoEdit(doc: EditorDocument): EditorDocument {
  return runHistoryCommand(doc, undo)
}

/** No-op when there is nothing to redo */
export function redoEdit(doc: EditorDocument): EditorDocument {
  return runHistoryCommand(doc, redo)
}

// ============================================================================
// CURSOR
// ============================================================================

export function setCursor(doc: EditorDocument, offset: number): EditorDocument {
  const anchor = clamp(doc, offset)
  return { ...doc, state: doc.state.update({ selection: { anchor } }).state }
}

export function selectRange(doc: EditorDocument, anchor: number, head: number): EditorDocument {
  return {
    ...doc,
    state: doc.state.update({ selection: { anchor: clamp(doc, anchor), head: clamp(doc, head) } }).state,
  }
}

export type CursorMotion =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'lineStart'
  | 'lineEnd'
  | 'pageUp'
  | 'pageDown'
  | 'docStart'
  | 'docEnd'

const PAGE_LINES = 20

function moveVertically(doc: EditorDocument, head: number, lines: number): number {
  const text = doc.state.doc
  const current = text.lineAt(head)
  const targetNumber = Math.min(Math.max(1, current.number + lines), text.lines)
  if (targetNumber === current.number) return lines < 0 ? current.from : current.to

  const target = text.line(targetNumber)
  return Math.min(target.from + (head - current.from), target.to)
}

/**
 * Move the cursor the way an arrow/Home/End/Page key does. A selection
 * collapses to its head first.
 */
export function moveCursor(doc: EditorDocument, motion: CursorMotion): EditorDocument {
  const head = getCursor(doc)
  const line = doc.state.doc.lineAt(head)

  switch (motion) {
    case 'left':
      return setCursor(doc, head - 1)
    case 'right':
      return setCursor(doc, head + 1)
    case 'up':
      return setCursor(doc, moveVertically(doc, head, -1))
    case 'down':
      return setCursor(doc, moveVertically(doc, head, 1))
    case 'pageUp':
      return setCursor(doc, moveVertically(doc, head, -PAGE_LINES))
    case 'pageDown':
      return setCursor(doc, moveVertically(doc, head, PAGE_LINES))
    case 'lineStart':
      return setCursor(doc, line.from)
    case 'lineEnd':
      return setCursor(doc, line.to)
    case 'docStart':
      return setCursor(doc, 0)
    case 'docEnd':
      return setCursor(doc, doc.state.doc.length)
  }
}

// ============================================================================
// PATH & SAVE
// ============================================================================

/**
 * Point the document at a new path. Title and language follow the path.
 */
export function withPath(doc: EditorDocument, filePath: string): EditorDocument {
  const resolved = path.resolve(filePath)
  const language = languageForPath(resolved)
  const state =
    language === getLanguage(doc.state)
      ? doc.state
      : doc.state.update(setLanguage(language), {
          annotations: Transaction.addToHistory.of(false),
        }).state

  return { ...doc, state, path: resolved, title: path.basename(resolved) }
}

/**
 * Write the real content to `targetPath` (or the current path).
 *
 * Only performs I/O. Apply the result with `markSaved` to the document as it
 * is when the write completes, which may have been edited meanwhile.
 *
 * @throws AppError(NoPath) when neither path is available
 * @throws AppError(IO) when the write fails
 */
export async function saveDocument(
  doc: EditorDocument,
  files: FileService,
  targetPath?: string
): Promise<SaveResult> {
  const destination = targetPath ? path.resolve(targetPath) : doc.path
  if (!destination) {
    throw new AppError(ErrorType.NoPath, `"${doc.title}" has not been saved yet. Choose a location.`)
  }

  const text = getText(doc)
  await files.writeText(destination, text)
  return { path: destination, text }
}

/**
 * Record a completed save: adopt the path and clear `modified` unless the
 * content changed while the write was in flight.
 */
export function markSaved(doc: EditorDocument, result: SaveResult): EditorDocument {
  const moved = result.path === doc.path ? doc : withPath(doc, result.path)
  return {
    ...moved,
    savedText: result.text,
    modified: getText(moved) !== result.text,
  }
}
