import { createStore } from 'zustand/vanilla'
import type { OutputLine } from '@/core/services/processRunner'

interface TerminalStore {
  lines: OutputLine[]
  running: boolean
  /** Exit code of the last run; null while running, never run, or spawn failed */
  exitCode: number | null

  start: (label: string) => void
  append: (line: OutputLine) => void
  finish: (exitCode: number | null) => void
  clear: () => void
}

export function createTerminalStore() {
  return createStore<TerminalStore>()((set) => ({
    lines: [],
    running: false,
    exitCode: null,

    start: (label) =>
      set({
        lines: [{ stream: 'system', text: `Running ${label}` }],
        running: true,
        exitCode: null,
      }),

    append: (line) => set((state) => ({ lines: [...state.lines, line] })),

    finish: (exitCode) =>
      set((state) => ({
        running: false,
        exitCode,
        lines: [
          ...state.lines,
          {
            stream: 'system',
            text: exitCode === null ? 'Process did not start' : `Process exited with code ${exitCode}`,
          },
        ],
      })),

    clear: () => set({ lines: [] }),
  }))
}

export type TerminalStoreApi = ReturnType<typeof createTerminalStore>
