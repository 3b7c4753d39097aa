/**
 * Key classification for the suggestion state machine.
 *
 * - text: edits the buffer (printable characters, Backspace, Delete, Enter, Tab)
 * - navigation: moves the cursor only
 * - command: chords with Ctrl/Meta/Alt and non-editing function keys
 * - modifier: a bare modifier press, which has no effect
 */

export interface KeyInput {
  /** DOM-style key name: 'a', 'Enter', 'ArrowLeft', 'Shift', ... */
  key: string
  ctrlKey?: boolean
  altKey?: boolean
  metaKey?: boolean
  shiftKey?: boolean
}

export type KeyClass = 'text' | 'navigation' | 'command' | 'modifier'

const MODIFIER_KEYS = new Set(['Shift', 'Control', 'Alt', 'AltGraph', 'Meta', 'CapsLock', 'Fn'])

const NAVIGATION_KEYS = new Set([
  'ArrowLeft',
  'ArrowRight',
  'ArrowUp',
  'ArrowDown',
  'Home',
  'End',
  'PageUp',
  'PageDown',
])

const EDITING_KEYS = new Set(['Backspace', 'Delete', 'Enter', 'Tab'])

/** A single printable character (one code point) */
export function isPrintableKey(key: string): boolean {
  return [...key].length === 1 && key !== '\u007f' && key >= ' '
}

export function classifyKey(input: KeyInput): KeyClass {
  if (MODIFIER_KEYS.has(input.key)) return 'modifier'
  if (input.ctrlKey || input.metaKey || input.altKey) return 'command'
  if (NAVIGATION_KEYS.has(input.key)) return 'navigation'
  if (EDITING_KEYS.has(input.key) || isPrintableKey(input.key)) return 'text'
  return 'command'
}
