export { EditorSession, type EditorPrompts, type EditorSessionOptions } from './editorSession'
export { resolveKeyAction, resolveShortcutCommand, type KeyAction, type KeyContext, type ShortcutCommand } from './keyBindings'
