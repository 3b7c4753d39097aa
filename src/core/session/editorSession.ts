/**
 * EditorSession
 *
 * Composition root of the editor core. A GUI shell forwards input here and
 * renders from the stores; dialogs are delegated back through EditorPrompts.
 *
 * Every user action that should dismiss the ghost suggestion (save, run, tab
 * switch, click, focus loss, keystroke) is reported to the controller before
 * the action touches a document.
 */

import path from 'node:path'
import {
  createDocument,
  cursorPosition,
  deleteBackward,
  deleteForward,
  getDocumentLanguage,
  getSelectedText,
  getText,
  insertText,
  markSaved,
  moveCursor,
  redoEdit,
  replaceSelection,
  saveDocument,
  selectRange,
  setCursor,
  undoEdit,
  type DocumentId,
  type EditorDocument,
} from '@/core/editor/document'
import { AI_UNAVAILABLE_STATUS, GhostSuggestionController, type KeyInput } from '@/core/editor/ghost'
import { detectLanguage, type LanguageId } from '@/core/editor/types/languageRegistry'
import {
  OpenRouterClient,
  extractCodeBlock,
  type CompletionClient,
  type ConnectionCheck,
} from '@/core/services/completion'
import { fileService as defaultFileService, type FileService } from '@/core/services/fileService'
import { NodeProcessRunner, type ProcessRunner, type RunHandle } from '@/core/services/processRunner'
import { AutoSaveScheduler } from '@/core/services/autoSaveScheduler'
import type { SettingsStore } from '@/core/stores/settingsStore'
import { createStatusStore, type StatusStoreApi } from '@/core/stores/statusStore'
import {
  createTabStore,
  type CloseOutcome,
  type TabStoreApi,
  type TabStoreState,
  type UnsavedDecision,
} from '@/core/stores/tabStore'
import { createTerminalStore, type TerminalStoreApi } from '@/core/stores/terminalStore'
import {
  createAssistantStore,
  createChatStore,
  type AssistantResult,
  type AssistantStoreApi,
  type AssistantTask,
  type ChatStoreApi,
} from '@/features/assistant'
import { AppError, ErrorType, getErrorMessage, isErrorOfType } from '@/core/lib/errors'
import { makeLogger } from '@/core/lib/logger'
import { resolveKeyAction, type ShortcutCommand } from './keyBindings'

const logger = makeLogger('session')

/**
 * Dialogs the GUI provides.
 */
export interface EditorPrompts {
  /** Three-way choice before closing a modified document */
  confirmClose(doc: EditorDocument): Promise<UnsavedDecision>
  /** Save-location dialog; null when cancelled */
  chooseSavePath(doc: EditorDocument): Promise<string | null>
  showError(message: string): void
}

export interface EditorSessionOptions {
  prompts: EditorPrompts
  settings: SettingsStore
  files?: FileService
  /** Defaults to an OpenRouter client configured from the environment; null disables AI */
  completionClient?: CompletionClient | null
  processRunner?: ProcessRunner
}

interface AssistantContext {
  /** Selected text, or the whole document when nothing is selected */
  code: string
  /** Whole real content */
  text: string
  fileName: string
  language: LanguageId
}

type ErrorReporting = 'dialog' | 'status'

const withCode = (text: string): AssistantResult => ({ text, code: extractCodeBlock(text) })

export class EditorSession {
  readonly tabs: TabStoreApi
  readonly status: StatusStoreApi
  readonly terminal: TerminalStoreApi
  readonly assistant: AssistantStoreApi
  readonly chat: ChatStoreApi
  readonly ghost: GhostSuggestionController
  readonly settings: SettingsStore

  private readonly prompts: EditorPrompts
  private readonly files: FileService
  private readonly client: CompletionClient | null
  private readonly runner: ProcessRunner
  private readonly autoSave: AutoSaveScheduler
  private readonly unsubscribers: Array<() => void> = []
  private currentRun: RunHandle | null = null
  private runStarting = false

  constructor(options: EditorSessionOptions) {
    this.prompts = options.prompts
    this.settings = options.settings
    this.files = options.files ?? defaultFileService
    this.client = options.completionClient === undefined ? new OpenRouterClient() : options.completionClient
    this.runner = options.processRunner ?? new NodeProcessRunner()

    this.tabs = createTabStore({ files: this.files })
    this.status = createStatusStore()
    this.terminal = createTerminalStore()
    this.assistant = createAssistantStore()
    this.chat = createChatStore()

    this.ghost = new GhostSuggestionController({
      host: {
        getActiveDocument: () => this.tabs.getState().getActive(),
        getDocument: (id) => this.tabs.getState().getDocument(id),
        updateDocument: (id, update) => this.tabs.getState().updateDocument(id, update),
        reportStatus: (message) => this.status.getState().setMessage(message),
      },
      client: this.client,
      settings: () => this.settings.getState(),
    })

    this.autoSave = new AutoSaveScheduler({
      saveAll: () => this.saveModified(),
      intervalMs: this.settings.getState().autoSaveInterval * 1000,
    })
    this.autoSave.start()

    this.unsubscribers.push(
      this.tabs.subscribe((state, prev) => this.onTabsChanged(state, prev)),
      this.settings.subscribe((state) => this.autoSave.reschedule(state.autoSaveInterval * 1000))
    )
  }

  getActiveDocument(): EditorDocument | null {
    return this.tabs.getState().getActive()
  }

  private activeId(): DocumentId | null {
    return this.tabs.getState().activeId
  }

  private onTabsChanged(state: TabStoreState, prev: TabStoreState) {
    if (state.activeId !== prev.activeId) {
      this.ghost.handle({ type: 'tabSwitch' })
    }

    for (const doc of state.documents) {
      const before = prev.documents.find((candidate) => candidate.id === doc.id)
      if (before && before.state.doc !== doc.state.doc) {
        this.ghost.handle({ type: 'bufferChanged', documentId: doc.id })
      }
    }

    const active = this.tabs.getState().getActive()
    this.status.getState().setCursor(active ? cursorPosition(active) : null)
  }

  private editActive(edit: (doc: EditorDocument) => EditorDocument): EditorDocument | null {
    const id = this.activeId()
    return id ? this.tabs.getState().updateDocument(id, edit) : null
  }

  private reportError(error: unknown, reporting: ErrorReporting = 'dialog') {
    const message = getErrorMessage(error)
    logger.warn(message, error)
    if (reporting === 'dialog') this.prompts.showError(message)
    else this.status.getState().setMessage(message)
  }

  // ==========================================================================
  // TABS & FILES
  // ==========================================================================

  newFile(): EditorDocument {
    return this.tabs.getState().createUntitled()
  }

  /** Open or focus `filePath`; read failures are reported and yield null */
  async openFile(filePath: string): Promise<EditorDocument | null> {
    try {
      return await this.tabs.getState().openOrFocus(filePath)
    } catch (error) {
      this.reportError(error)
      return null
    }
  }

  switchTab(id: DocumentId): void {
    this.ghost.handle({ type: 'tabSwitch' })
    this.tabs.getState().setActive(id)
  }

  async closeTab(id: DocumentId | null = this.activeId()): Promise<CloseOutcome> {
    if (!id) return 'missing'
    return this.tabs.getState().closeTab(id, {
      resolveUnsaved: (doc) => this.prompts.confirmClose(doc),
      save: (doc) => this.save(doc.id),
    })
  }

  /** A file or directory was renamed outside the editor */
  fileRenamed(oldPath: string, newPath: string): number {
    return this.tabs.getState().rename(oldPath, newPath)
  }

  /** A file or directory was deleted; its documents close without prompting */
  fileDeleted(filePath: string): DocumentId[] {
    return this.tabs.getState().remove(filePath)
  }

  /**
   * Save to the document's path, asking for one when it has none.
   * Resolves false when cancelled or failed.
   */
  async save(id: DocumentId | null = this.activeId()): Promise<boolean> {
    const doc = id ? this.tabs.getState().getDocument(id) : null
    if (!doc) return false

    this.ghost.handle({ type: 'save' })
    return doc.path ? this.write(doc.id) : this.saveAs(doc.id)
  }

  async saveAs(id: DocumentId | null = this.activeId(), targetPath?: string): Promise<boolean> {
    const doc = id ? this.tabs.getState().getDocument(id) : null
    if (!doc) return false

    this.ghost.handle({ type: 'save' })
    const chosen = targetPath ?? (await this.prompts.chooseSavePath(doc))
    if (!chosen) {
      this.status.getState().setMessage('Save cancelled')
      return false
    }

    const clash = this.tabs.getState().findByPath(chosen)
    if (clash && clash.id !== doc.id) {
      this.reportError(
        new AppError(ErrorType.Conflict, `${clash.path ?? chosen} is already open in another tab`)
      )
      return false
    }

    return this.write(doc.id, chosen)
  }

  private async write(id: DocumentId, targetPath?: string, reporting: ErrorReporting = 'dialog'): Promise<boolean> {
    const doc = this.tabs.getState().getDocument(id)
    if (!doc) return false

    try {
      const result = await saveDocument(doc, this.files, targetPath)
      this.tabs.getState().updateDocument(id, (current) => markSaved(current, result))
      this.status.getState().setMessage(`Saved ${path.basename(result.path)}`)
      return true
    } catch (error) {
      if (isErrorOfType(error, ErrorType.NoPath)) return this.saveAs(id)
      this.reportError(error, reporting)
      return false
    }
  }

  /** Auto-save: modified documents that already have a path */
  async saveModified(): Promise<void> {
    const pending = this.tabs.getState().documents.filter((doc) => doc.modified && doc.path !== null)
    if (pending.length === 0) return

    this.ghost.handle({ type: 'save' })
    for (const doc of pending) {
      await this.write(doc.id, undefined, 'status')
    }
    logger.debug('Auto-saved', pending.length)
  }

  // ==========================================================================
  // EDITING
  // ==========================================================================

  /**
   * Route one key press: Tab accepts a displayed suggestion, Escape rejects,
   * Ctrl+Space asks for one; everything else is reported as a keystroke and
   * then applied.
   */
  async pressKey(input: KeyInput): Promise<void> {
    const action = resolveKeyAction(input, {
      ghostDisplayed: this.ghost.isDisplaying(),
      tabWidth: this.settings.getState().tabWidth,
    })
    const keystroke = () => this.ghost.handle({ type: 'keystroke', ...input })

    switch (action.kind) {
      case 'acceptSuggestion':
        this.ghost.handle({ type: 'accept' })
        return
      case 'rejectSuggestion':
        this.ghost.handle({ type: 'reject' })
        return
      case 'triggerSuggestion':
        this.ghost.handle({ type: 'manualTrigger' })
        return
      case 'insert':
        keystroke()
        this.editActive((doc) => replaceSelection(doc, action.text))
        return
      case 'deleteBackward':
        keystroke()
        this.editActive(deleteBackward)
        return
      case 'deleteForward':
        keystroke()
        this.editActive(deleteForward)
        return
      case 'move':
        keystroke()
        this.editActive((doc) => moveCursor(doc, action.motion))
        return
      case 'command':
        keystroke()
        await this.runCommand(action.command)
        return
      case 'none':
        keystroke()
        return
    }
  }

  /** Type a run of printable text, one key at a time */
  async typeText(text: string): Promise<void> {
    for (const key of text) {
      await this.pressKey(key === '\n' ? { key: 'Enter' } : { key })
    }
  }

  /** Insert clipboard text as a single edit */
  paste(text: string): void {
    this.ghost.handle({ type: 'keystroke', key: 'v', ctrlKey: true })
    this.editActive((doc) => replaceSelection(doc, text))
  }

  /** Mouse click placing the cursor */
  click(offset: number): void {
    this.ghost.handle({ type: 'mouseClick' })
    this.editActive((doc) => setCursor(doc, offset))
  }

  /** Mouse drag selecting a range */
  select(anchor: number, head: number): void {
    this.ghost.handle({ type: 'mouseClick' })
    this.editActive((doc) => selectRange(doc, anchor, head))
  }

  focusLost(): void {
    this.ghost.handle({ type: 'focusLost' })
  }

  undo(): void {
    this.ghost.handle({ type: 'reject' })
    this.editActive(undoEdit)
  }

  redo(): void {
    this.ghost.handle({ type: 'reject' })
    this.editActive(redoEdit)
  }

  private async runCommand(command: ShortcutCommand): Promise<void> {
    switch (command) {
      case 'new':
        this.newFile()
        return
      case 'save':
        await this.save()
        return
      case 'saveAs':
        await this.saveAs()
        return
      case 'close':
        await this.closeTab()
        return
      case 'undo':
        return this.undo()
      case 'redo':
        return this.redo()
      case 'run':
        await this.run()
        return
    }
  }

  // ==========================================================================
  // RUN
  // ==========================================================================

  /**
   * Save, then run the document under the interpreter, streaming output into
   * the terminal store. Resolves with the exit code, or null when nothing ran.
   */
  async run(id: DocumentId | null = this.activeId()): Promise<number | null> {
    this.ghost.handle({ type: 'run' })
    if (this.currentRun || this.runStarting) {
      this.status.getState().setMessage('A program is already running')
      return null
    }

    const doc = id ? this.tabs.getState().getDocument(id) : null
    if (!doc) return null

    this.runStarting = true
    const handle = await this.startRun(doc).finally(() => {
      this.runStarting = false
    })
    if (!handle) return null

    const exitCode = await handle.exited
    this.currentRun = null
    this.terminal.getState().finish(exitCode)
    return exitCode
  }

  private async startRun(doc: EditorDocument): Promise<RunHandle | null> {
    if ((doc.modified || !doc.path) && !(await this.save(doc.id))) return null

    const filePath = this.tabs.getState().getDocument(doc.id)?.path
    if (!filePath) return null

    this.terminal.getState().start(path.basename(filePath))
    const handle = this.runner.run(filePath, (line) => this.terminal.getState().append(line))
    this.currentRun = handle
    return handle
  }

  stopRun(): boolean {
    if (!this.currentRun) return false
    this.currentRun.kill()
    return true
  }

  // ==========================================================================
  // ASSISTANT
  // ==========================================================================

  private readyClient(): CompletionClient | null {
    const { client } = this
    return client && this.settings.getState().aiEnabled && client.isAvailable() ? client : null
  }

  private async runAssistant(
    task: AssistantTask,
    call: (client: CompletionClient, context: AssistantContext) => Promise<AssistantResult>
  ): Promise<AssistantResult | null> {
    const client = this.readyClient()
    if (!client) {
      this.assistant.getState().fail(task, AI_UNAVAILABLE_STATUS)
      return null
    }

    const doc = this.getActiveDocument()
    if (!doc) {
      this.assistant.getState().fail(task, 'No document is open')
      return null
    }

    const text = getText(doc)
    const context: AssistantContext = {
      code: getSelectedText(doc) || text,
      text,
      fileName: doc.title,
      language: getDocumentLanguage(doc),
    }
    return this.assistant.getState().run(task, () => call(client, context))
  }

  explainCode(): Promise<AssistantResult | null> {
    return this.runAssistant('explain', async (client, { code, fileName, language }) =>
      withCode(await client.explain(code, fileName, language))
    )
  }

  suggestRefactoring(): Promise<AssistantResult | null> {
    return this.runAssistant('refactor', async (client, { code, fileName, language }) =>
      withCode(await client.suggestRefactoring(code, fileName, language))
    )
  }

  scanForBugs(errorMessage = ''): Promise<AssistantResult | null> {
    return this.runAssistant('bugs', async (client, { code, fileName, language }) =>
      withCode(await client.detectBugs(code, errorMessage, fileName, language))
    )
  }

  correctError(errorMessage: string): Promise<AssistantResult | null> {
    return this.runAssistant('correct', async (client, { code, fileName, language }) => {
      const { analysis, correctedCode } = await client.correctError(code, errorMessage, fileName, language)
      return { text: analysis, code: correctedCode }
    })
  }

  generateFromDescription(requirement: string): Promise<AssistantResult | null> {
    return this.runAssistant('generate', async (client, { text, fileName, language }) =>
      withCode(await client.generateFromDescription(requirement, text, fileName, language))
    )
  }

  generateDocumentation(): Promise<AssistantResult | null> {
    return this.runAssistant('document', async (client, { code, fileName, language }) =>
      withCode(await client.generateDocumentation(code, fileName, language))
    )
  }

  /**
   * Ask the model for a whole new file and open it as an unsaved tab.
   */
  async createFileFromDescription(fileName: string, requirements: string): Promise<EditorDocument | null> {
    const client = this.readyClient()
    if (!client) {
      this.assistant.getState().fail('createFile', AI_UNAVAILABLE_STATUS)
      return null
    }

    const result = await this.assistant.getState().run('createFile', async () => {
      const content = await client.createFile(fileName, requirements, detectLanguage(fileName).id)
      return { text: content, code: content }
    })
    if (!result) return null

    this.ghost.handle({ type: 'tabSwitch' })
    const doc = insertText(createDocument({ title: fileName }), 0, result.text)
    return this.tabs.getState().register(doc)
  }

  /**
   * Insert the code from the last assistant answer at the cursor as a normal
   * edit. False when there is nothing to insert.
   */
  insertAssistantCode(): boolean {
    const { status, result } = this.assistant.getState()
    const code = status === 'results' && result ? (result.code ?? result.text) : null
    if (!code) return false

    this.ghost.handle({ type: 'reject' })
    return this.editActive((doc) => replaceSelection(doc, code)) !== null
  }

  async sendChatMessage(message: string): Promise<string | null> {
    const client = this.readyClient()
    if (!client) {
      this.status.getState().setMessage(AI_UNAVAILABLE_STATUS)
      return null
    }

    const doc = this.getActiveDocument()
    const fileContext = doc ? getText(doc) : ''
    return this.chat.getState().send(message, (history, content) => client.chat(history, fileContext, content))
  }

  clearChat(): void {
    this.chat.getState().clearHistory()
  }

  requestSuggestion(): void {
    this.ghost.handle({ type: 'manualTrigger' })
  }

  async testAIConnection(): Promise<ConnectionCheck> {
    if (!this.client) {
      return { success: false, message: AI_UNAVAILABLE_STATUS, model: '' }
    }
    const check = await this.client.testConnection()
    this.status.getState().setMessage(check.message)
    return check
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  dispose(): void {
    this.autoSave.stop()
    this.ghost.dispose()
    this.currentRun?.kill()
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe()
  }
}
