import { describe, it, expect } from 'vitest'
import { resolveKeyAction, resolveShortcutCommand } from '@/core/session'
import { classifyKey, isPrintableKey } from '@/core/editor/ghost'

const context = { ghostDisplayed: false, tabWidth: 4 }

describe('classifyKey', () => {
  it('classifies text, navigation, command and modifier keys', () => {
    expect(classifyKey({ key: 'a' })).toBe('text')
    expect(classifyKey({ key: ' ' })).toBe('text')
    expect(classifyKey({ key: 'Backspace' })).toBe('text')
    expect(classifyKey({ key: 'Enter' })).toBe('text')
    expect(classifyKey({ key: 'ArrowLeft' })).toBe('navigation')
    expect(classifyKey({ key: 'PageDown' })).toBe('navigation')
    expect(classifyKey({ key: 's', ctrlKey: true })).toBe('command')
    expect(classifyKey({ key: 'ArrowLeft', altKey: true })).toBe('command')
    expect(classifyKey({ key: 'F5' })).toBe('command')
    expect(classifyKey({ key: 'Escape' })).toBe('command')
    expect(classifyKey({ key: 'Shift', shiftKey: true })).toBe('modifier')
    expect(classifyKey({ key: 'Control', ctrlKey: true })).toBe('modifier')
  })

  it('treats single code points as printable', () => {
    expect(isPrintableKey('é')).toBe(true)
    expect(isPrintableKey('😀')).toBe(true)
    expect(isPrintableKey('ab')).toBe(false)
    expect(isPrintableKey('\t')).toBe(false)
  })
})

describe('resolveShortcutCommand', () => {
  it('maps editor shortcuts', () => {
    expect(resolveShortcutCommand({ key: 'n', ctrlKey: true })).toBe('new')
    expect(resolveShortcutCommand({ key: 's', ctrlKey: true })).toBe('save')
    expect(resolveShortcutCommand({ key: 'S', ctrlKey: true, shiftKey: true })).toBe('saveAs')
    expect(resolveShortcutCommand({ key: 'w', metaKey: true })).toBe('close')
    expect(resolveShortcutCommand({ key: 'z', ctrlKey: true })).toBe('undo')
    expect(resolveShortcutCommand({ key: 'z', ctrlKey: true, shiftKey: true })).toBe('redo')
    expect(resolveShortcutCommand({ key: 'y', ctrlKey: true })).toBe('redo')
    expect(resolveShortcutCommand({ key: 'F5' })).toBe('run')
  })

  it('ignores plain keys and Alt chords', () => {
    expect(resolveShortcutCommand({ key: 's' })).toBeNull()
    expect(resolveShortcutCommand({ key: 's', ctrlKey: true, altKey: true })).toBeNull()
    expect(resolveShortcutCommand({ key: 'F5', ctrlKey: true })).toBeNull()
  })
})

describe('resolveKeyAction', () => {
  it('accepts with Tab only while a suggestion is displayed', () => {
    expect(resolveKeyAction({ key: 'Tab' }, { ...context, ghostDisplayed: true })).toEqual({ kind: 'acceptSuggestion' })
    expect(resolveKeyAction({ key: 'Tab' }, context)).toEqual({ kind: 'insert', text: '    ' })
    expect(resolveKeyAction({ key: 'Tab', shiftKey: true }, { ...context, ghostDisplayed: true })).toEqual({
      kind: 'insert',
      text: '    ',
    })
  })

  it('maps suggestion keys', () => {
    expect(resolveKeyAction({ key: 'Escape' }, context)).toEqual({ kind: 'rejectSuggestion' })
    expect(resolveKeyAction({ key: ' ', ctrlKey: true }, context)).toEqual({ kind: 'triggerSuggestion' })
  })

  it('maps editing and motion keys', () => {
    expect(resolveKeyAction({ key: 'Enter' }, context)).toEqual({ kind: 'insert', text: '\n' })
    expect(resolveKeyAction({ key: 'Backspace' }, context)).toEqual({ kind: 'deleteBackward' })
    expect(resolveKeyAction({ key: 'Delete' }, context)).toEqual({ kind: 'deleteForward' })
    expect(resolveKeyAction({ key: 'Home' }, context)).toEqual({ kind: 'move', motion: 'lineStart' })
    expect(resolveKeyAction({ key: 'End', ctrlKey: true }, context)).toEqual({ kind: 'move', motion: 'docEnd' })
    expect(resolveKeyAction({ key: 'q' }, context)).toEqual({ kind: 'insert', text: 'q' })
  })

  it('routes shortcuts and drops unknown chords', () => {
    expect(resolveKeyAction({ key: 's', ctrlKey: true }, context)).toEqual({ kind: 'command', command: 'save' })
    expect(resolveKeyAction({ key: 'k', ctrlKey: true }, context)).toEqual({ kind: 'none' })
    expect(resolveKeyAction({ key: 'F2' }, context)).toEqual({ kind: 'none' })
  })
})
