export * from './core/editor/document'
export { highlight, styleAt, PYTHON_KEYWORDS, type HighlightCategory, type HighlightSpan } from './core/editor/highlight/pythonHighlighter'
export { detectLanguage, isHighlightedLanguage, type LanguageDefinition, type LanguageId } from './core/editor/types/languageRegistry'
export * from './core/editor/ghost'
export * from './core/services/completion'
export { NodeFileService, fileService, type FileService } from './core/services/fileService'
export {
  NodeProcessRunner,
  type OutputLine,
  type OutputStream,
  type ProcessRunner,
  type RunHandle,
} from './core/services/processRunner'
export { AutoSaveScheduler } from './core/services/autoSaveScheduler'
export {
  createSettingsStore,
  DEFAULT_SETTINGS,
  defaultSettingsPath,
  type EditorSettings,
  type SettingsStore,
} from './core/stores/settingsStore'
export { createTabStore, type CloseOutcome, type TabStoreApi, type UnsavedDecision } from './core/stores/tabStore'
export { createStatusStore, formatCursor, type StatusStoreApi } from './core/stores/statusStore'
export { createTerminalStore, type TerminalStoreApi } from './core/stores/terminalStore'
export * from './core/session'
export * from './features/assistant'
export { AppError, ErrorType, getErrorMessage, isAppError, isErrorOfType } from './core/lib/errors'
export { makeLogger, type Logger } from './core/lib/logger'
