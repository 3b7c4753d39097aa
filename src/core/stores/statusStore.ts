import { createStore } from 'zustand/vanilla'
import type { CursorPosition } from '@/core/editor/document'

interface StatusStore {
  message: string | null
  cursor: CursorPosition | null

  setMessage: (message: string) => void
  clearMessage: () => void
  setCursor: (cursor: CursorPosition | null) => void
}

/**
 * Status line state: the last status message and the cursor position of the
 * active document.
 */
export function createStatusStore() {
  return createStore<StatusStore>()((set) => ({
    message: null,
    cursor: null,

    setMessage: (message) => set({ message }),
    clearMessage: () => set({ message: null }),
    setCursor: (cursor) => set({ cursor }),
  }))
}

export type StatusStoreApi = ReturnType<typeof createStatusStore>

/** e.g. `Ln 3, Col 7` (column shown 1-based) */
export function formatCursor(cursor: CursorPosition | null): string {
  return cursor ? `Ln ${cursor.line}, Col ${cursor.column + 1}` : ''
}
