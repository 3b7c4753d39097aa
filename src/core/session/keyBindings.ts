import type { CursorMotion } from '@/core/editor/document'
import { isPrintableKey, type KeyInput } from '@/core/editor/ghost'

export type ShortcutCommand = 'new' | 'save' | 'saveAs' | 'close' | 'undo' | 'redo' | 'run'

export type KeyAction =
  | { kind: 'acceptSuggestion' }
  | { kind: 'rejectSuggestion' }
  | { kind: 'triggerSuggestion' }
  | { kind: 'command'; command: ShortcutCommand }
  | { kind: 'insert'; text: string }
  | { kind: 'deleteBackward' }
  | { kind: 'deleteForward' }
  | { kind: 'move'; motion: CursorMotion }
  | { kind: 'none' }

export interface KeyContext {
  /** A ghost suggestion is on screen, so Tab accepts it */
  ghostDisplayed: boolean
  tabWidth: number
}

const MOTIONS: Record<string, CursorMotion> = {
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
  Home: 'lineStart',
  End: 'lineEnd',
  PageUp: 'pageUp',
  PageDown: 'pageDown',
}

export function resolveShortcutCommand(input: KeyInput): ShortcutCommand | null {
  if (input.key === 'F5' && !input.ctrlKey && !input.metaKey && !input.altKey) {
    return 'run'
  }

  const hasPrimaryModifier = input.metaKey || input.ctrlKey
  if (!hasPrimaryModifier || input.altKey) {
    return null
  }

  const pressedKey = input.key.toLowerCase()
  if (pressedKey === 'n') return 'new'
  if (pressedKey === 's' && input.shiftKey) return 'saveAs'
  if (pressedKey === 's') return 'save'
  if (pressedKey === 'w') return 'close'
  if (pressedKey === 'z' && input.shiftKey) return 'redo'
  if (pressedKey === 'z') return 'undo'
  if (pressedKey === 'y') return 'redo'

  return null
}

/**
 * Map a key press to what the editor should do with it.
 */
export function resolveKeyAction(input: KeyInput, context: KeyContext): KeyAction {
  const chord = input.ctrlKey || input.metaKey

  if (chord && input.key === ' ') return { kind: 'triggerSuggestion' }
  if (chord && input.key === 'Home') return { kind: 'move', motion: 'docStart' }
  if (chord && input.key === 'End') return { kind: 'move', motion: 'docEnd' }

  const command = resolveShortcutCommand(input)
  if (command) return { kind: 'command', command }
  if (chord || input.altKey) return { kind: 'none' }

  switch (input.key) {
    case 'Tab':
      if (context.ghostDisplayed && !input.shiftKey) return { kind: 'acceptSuggestion' }
      return { kind: 'insert', text: ' '.repeat(Math.max(1, context.tabWidth)) }
    case 'Escape':
      return { kind: 'rejectSuggestion' }
    case 'Enter':
      return { kind: 'insert', text: '\n' }
    case 'Backspace':
      return { kind: 'deleteBackward' }
    case 'Delete':
      return { kind: 'deleteForward' }
  }

  const motion = MOTIONS[input.key]
  if (motion) return { kind: 'move', motion }

  return isPrintableKey(input.key) ? { kind: 'insert', text: input.key } : { kind: 'none' }
}
