import { describe, it, expect } from 'vitest'
import {
  canRedo,
  canUndo,
  createDocument,
  cursorPosition,
  deleteBackward,
  deleteForward,
  deleteRange,
  getBufferText,
  getCursor,
  getDocumentLanguage,
  getHighlights,
  getText,
  insertText,
  lineNumberGutter,
  markSaved,
  moveCursor,
  redoEdit,
  removeOverlay,
  replaceSelection,
  saveDocument,
  selectRange,
  setCursor,
  showOverlay,
  undoEdit,
  withPath,
  type EditorDocument,
} from '@/core/editor/document'
import { ErrorType } from '@/core/lib/errors'
import { MemoryFileService } from './helpers/fakes'

describe('Document editing', () => {
  it('creates an empty untitled document', () => {
    const doc = createDocument({ title: 'Untitled-1' })

    expect(doc.title).toBe('Untitled-1')
    expect(doc.path).toBeNull()
    expect(getText(doc)).toBe('')
    expect(doc.modified).toBe(false)
    expect(doc.version).toBe(0)
    expect(getDocumentLanguage(doc)).toBe('python')
  })

  it('takes title and language from the path', () => {
    const doc = createDocument({ path: '/work/app.js', content: 'x' })

    expect(doc.title).toBe('app.js')
    expect(doc.path).toBe('/work/app.js')
    expect(getDocumentLanguage(doc)).toBe('javascript')
  })

  it('inserts and deletes with clamped offsets and tracks modified exactly', () => {
    const doc = createDocument({ content: 'abc' })

    const inserted = insertText(doc, 1, 'XY')
    expect(getText(inserted)).toBe('aXYbc')
    expect(getCursor(inserted)).toBe(3)
    expect(inserted.modified).toBe(true)
    expect(inserted.version).toBe(1)

    const restored = deleteRange(inserted, 3, 1)
    expect(getText(restored)).toBe('abc')
    expect(getCursor(restored)).toBe(1)
    expect(restored.modified).toBe(false)
    expect(restored.version).toBe(2)

    expect(getText(insertText(doc, 99, '!'))).toBe('abc!')
    expect(getText(deleteRange(doc, -5, 1))).toBe('bc')
  })

  it('leaves the record untouched for empty edits', () => {
    const doc = createDocument({ content: 'abc' })

    expect(insertText(doc, 1, '')).toBe(doc)
    expect(deleteRange(doc, 2, 2)).toBe(doc)
  })

  it('restores content on undo and reapplies it on redo for every edit', () => {
    let doc: EditorDocument = createDocument({ content: 'def main():\n    pass\n' })
    const history: string[] = [getText(doc)]

    const edits: Array<(d: EditorDocument) => EditorDocument> = [
      (d) => insertText(d, 0, '# entry point\n'),
      (d) => deleteRange(d, 14, 18),
      (d) => insertText(d, getText(d).length, 'main()\n'),
      (d) => deleteRange(d, 0, 2),
      (d) => insertText(d, 3, 'é漢'),
    ]

    for (const edit of edits) {
      const before = getText(doc)
      const after = edit(doc)

      const undone = undoEdit(after)
      expect(getText(undone)).toBe(before)
      expect(getText(redoEdit(undone))).toBe(getText(after))

      doc = after
      history.push(getText(doc))
    }

    for (let i = history.length - 1; i > 0; i--) {
      expect(getText(doc)).toBe(history[i])
      doc = undoEdit(doc)
    }
    expect(getText(doc)).toBe(history[0])
    expect(doc.modified).toBe(false)
  })

  it('treats undo and redo on an empty stack as a no-op', () => {
    const doc = createDocument({ content: 'x' })

    expect(undoEdit(doc)).toBe(doc)
    expect(redoEdit(doc)).toBe(doc)
    expect(canUndo(doc)).toBe(false)
  })

  it('clears the redo stack on a new edit after undo', () => {
    const edited = insertText(createDocument(), 0, 'a')
    const undone = undoEdit(edited)
    expect(canRedo(undone)).toBe(true)

    const branched = insertText(undone, 0, 'b')
    expect(canRedo(branched)).toBe(false)
    expect(redoEdit(branched)).toBe(branched)
  })

  it('bumps version on undo and redo but not on cursor moves', () => {
    const edited = insertText(createDocument(), 0, 'abc')
    const moved = setCursor(edited, 1)

    expect(moved.version).toBe(1)
    expect(undoEdit(moved).version).toBe(2)
  })

  it('replaces the selection as one edit', () => {
    const doc = selectRange(createDocument({ content: 'hello world' }), 6, 11)
    const typed = replaceSelection(doc, 'there')

    expect(getText(typed)).toBe('hello there')
    expect(getCursor(typed)).toBe(11)
    expect(getText(undoEdit(typed))).toBe('hello world')
  })

  it('deletes around the cursor or the selection', () => {
    const doc = setCursor(createDocument({ content: 'abcd' }), 2)

    expect(getText(deleteBackward(doc))).toBe('acd')
    expect(getText(deleteForward(doc))).toBe('abd')
    expect(getText(deleteBackward(selectRange(doc, 1, 3)))).toBe('ad')

    const atStart = setCursor(doc, 0)
    expect(deleteBackward(atStart)).toBe(atStart)
  })

  it('deletes whole characters outside the basic plane', () => {
    const doc = createDocument({ content: 'a😀b' })

    const backward = deleteBackward(setCursor(doc, 3))
    expect(getText(backward)).toBe('ab')
    expect(getCursor(backward)).toBe(1)
    expect(getText(deleteForward(setCursor(doc, 1)))).toBe('ab')
  })

  it('joins lines when deleting across a line break', () => {
    const doc = createDocument({ content: 'a\nb' })

    expect(getText(deleteBackward(setCursor(doc, 2)))).toBe('ab')
    expect(getText(deleteForward(setCursor(doc, 1)))).toBe('ab')
  })

  it('normalizes CRLF line breaks', () => {
    expect(getText(createDocument({ content: 'a\r\nb' }))).toBe('a\nb')
  })
})

describe('Document cursor helpers', () => {
  it('reports 1-based line and 0-based column', () => {
    const doc = setCursor(createDocument({ content: 'ab\ncd' }), 4)
    expect(cursorPosition(doc)).toEqual({ line: 2, column: 1 })
  })

  it('derives one gutter number per line', () => {
    expect(lineNumberGutter(createDocument({ content: 'ab\ncd\n' }))).toBe('1\n2\n3')
  })

  it('moves vertically keeping the column where the line allows', () => {
    const doc = setCursor(createDocument({ content: 'abcd\nxy' }), 3)

    const down = moveCursor(doc, 'down')
    expect(getCursor(down)).toBe(7)
    expect(getCursor(moveCursor(down, 'up'))).toBe(2)
    expect(getCursor(moveCursor(doc, 'up'))).toBe(0)
    expect(getCursor(moveCursor(down, 'lineStart'))).toBe(5)
    expect(getCursor(moveCursor(doc, 'docEnd'))).toBe(7)
    expect(getCursor(moveCursor(doc, 'left'))).toBe(2)
  })
})

describe('Document highlighting', () => {
  it('keeps spans in sync with the buffer', () => {
    const doc = createDocument({ content: 'def f(): pass' })

    expect(getHighlights(doc)).toEqual([
      { category: 'keyword', from: 0, to: 3 },
      { category: 'keyword', from: 9, to: 13 },
      { category: 'function', from: 4, to: 5 },
    ])

    const commented = insertText(doc, 13, ' # 1')
    expect(getHighlights(commented)).toContainEqual({ category: 'comment', from: 14, to: 17 })
  })

  it('does not highlight languages other than python', () => {
    const doc = createDocument({ path: '/work/notes.txt', content: 'def f(): pass' })
    expect(getHighlights(doc)).toEqual([])
  })

  it('switches language when the path changes', () => {
    const doc = createDocument({ content: 'def f(): pass' })
    const renamed = withPath(doc, '/work/notes.txt')

    expect(renamed.title).toBe('notes.txt')
    expect(getDocumentLanguage(renamed)).toBe('text')
    expect(getHighlights(renamed)).toEqual([])
    expect(canUndo(renamed)).toBe(false)
  })
})

describe('Document overlay', () => {
  const base = () => setCursor(createDocument({ content: 'x = ' }), 4)

  it('shows overlay text ahead of the cursor without touching real content', () => {
    const doc = base()
    const shown = showOverlay(doc, 4, '42')

    expect(getBufferText(shown)).toBe('x = 42')
    expect(getText(shown)).toBe('x = ')
    expect(getCursor(shown)).toBe(4)
    expect(shown.version).toBe(doc.version)
    expect(shown.modified).toBe(false)
    expect(canUndo(shown)).toBe(false)
  })

  it('removes overlay at its anchor', () => {
    const shown = showOverlay(base(), 4, '42')
    const { doc, removal } = removeOverlay(shown, { from: 4, text: '42' })

    expect(removal).toBe('anchor')
    expect(getBufferText(doc)).toBe('x = ')
  })

  it('falls back to stripping tagged ranges when the hint is stale', () => {
    const shown = showOverlay(base(), 4, '42')
    const shifted = insertText(shown, 0, '# ')
    const { doc, removal } = removeOverlay(shifted, { from: 4, text: '42' })

    expect(removal).toBe('fallback')
    expect(getBufferText(doc)).toBe('# x = ')
  })

  it('reports nothing to remove on a clean buffer', () => {
    const doc = base()
    expect(removeOverlay(doc)).toEqual({ doc, removal: 'none' })
  })
})

describe('Document saving', () => {
  it('rejects saving an untitled document without a target', async () => {
    const files = new MemoryFileService()
    const doc = insertText(createDocument({ title: 'Untitled-1' }), 0, 'x = 1')

    await expect(saveDocument(doc, files)).rejects.toMatchObject({
      type: ErrorType.NoPath,
      message: '"Untitled-1" has not been saved yet. Choose a location.',
    })
    expect(files.writes).toEqual([])
  })

  it('writes real content and adopts the new path', async () => {
    const files = new MemoryFileService()
    const doc = insertText(createDocument({ title: 'Untitled-1' }), 0, 'x = 1')
    const withGhost = showOverlay(doc, 5, ' + 1')

    const result = await saveDocument(withGhost, files, '/tmp/x.py')
    const saved = markSaved(withGhost, result)

    expect(files.writes).toEqual([{ path: '/tmp/x.py', content: 'x = 1' }])
    expect(saved.path).toBe('/tmp/x.py')
    expect(saved.title).toBe('x.py')
    expect(saved.modified).toBe(false)
    expect(insertText(saved, 0, '#').modified).toBe(true)
  })

  it('stays modified when edited while the write was in flight', async () => {
    const files = new MemoryFileService()
    const doc = insertText(createDocument({ path: '/work/a.py' }), 0, 'a')

    const result = await saveDocument(doc, files)
    const later = insertText(doc, 1, 'b')

    expect(markSaved(later, result).modified).toBe(true)
    expect(markSaved(doc, result).modified).toBe(false)
  })

  it('surfaces write failures as IO errors', async () => {
    const files = new MemoryFileService()
    files.failWrites = true
    const doc = createDocument({ path: '/work/a.py' })

    await expect(saveDocument(doc, files)).rejects.toMatchObject({ type: ErrorType.IO })
  })
})
