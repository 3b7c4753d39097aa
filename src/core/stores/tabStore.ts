import path from 'node:path'
import { createStore } from 'zustand/vanilla'
import { loadDocument, createDocument, withPath } from '@/core/editor/document'
import type { DocumentId, EditorDocument } from '@/core/editor/document'
import type { FileService } from '@/core/services/fileService'
import { AppError, ErrorType } from '@/core/lib/errors'
import { makeLogger } from '@/core/lib/logger'

const logger = makeLogger('tab-store')

export type UnsavedDecision = 'save' | 'discard' | 'cancel'

export type CloseOutcome = 'closed' | 'cancelled' | 'missing'

/**
 * Callbacks the caller supplies when closing a tab that may hold unsaved work.
 * `save` resolves false when the save was cancelled or failed.
 */
export interface CloseTabHandlers {
  resolveUnsaved: (doc: EditorDocument) => Promise<UnsavedDecision>
  save: (doc: EditorDocument) => Promise<boolean>
}

interface TabStore {
  /** Open documents in tab order */
  documents: EditorDocument[]
  activeId: DocumentId | null
  /** Last number handed out to an untitled document; never reused */
  untitledCounter: number

  openOrFocus: (filePath: string) => Promise<EditorDocument>
  createUntitled: () => EditorDocument
  /** Add an already-built document and activate it */
  register: (doc: EditorDocument) => EditorDocument
  setActive: (id: DocumentId) => void
  getActive: () => EditorDocument | null
  getDocument: (id: DocumentId) => EditorDocument | null
  findByPath: (filePath: string) => EditorDocument | null
  /** Replace a document with `update(current)`; null when it is not open */
  updateDocument: (id: DocumentId, update: (doc: EditorDocument) => EditorDocument) => EditorDocument | null
  closeTab: (id: DocumentId, handlers?: CloseTabHandlers) => Promise<CloseOutcome>
  rename: (filePath: string, newPath: string) => number
  remove: (filePath: string) => DocumentId[]
  closeAllMatching: (filePath: string) => DocumentId[]
}

export interface TabStoreDeps {
  files: FileService
}

/** True when `candidate` is `base` or lies below it */
function isWithin(candidate: string, base: string): boolean {
  return candidate === base || candidate.startsWith(base.endsWith(path.sep) ? base : base + path.sep)
}

/**
 * Which document becomes active after `removed` leave the tab list: the one now
 * at the old active index, else the new last one, else none.
 */
function nextActiveId(
  documents: EditorDocument[],
  remaining: EditorDocument[],
  activeId: DocumentId | null,
  removed: ReadonlySet<DocumentId>
): DocumentId | null {
  if (activeId === null || !removed.has(activeId)) return activeId
  if (remaining.length === 0) return null

  const index = documents.findIndex((doc) => doc.id === activeId)
  const next = remaining[Math.min(index, remaining.length - 1)]
  return next ? next.id : null
}

/**
 * Tab Registry.
 *
 * Holds the ordered set of open documents and which one is active. Paths are
 * normalized on the way in so a file is never open twice; concurrent opens of
 * the same path share one in-flight load.
 */
export function createTabStore({ files }: TabStoreDeps) {
  const pendingOpens = new Map<string, Promise<EditorDocument>>()

  return createStore<TabStore>()((set, get) => {
    const removeTabs = (ids: ReadonlySet<DocumentId>) => {
      if (ids.size === 0) return
      set((state) => {
        const remaining = state.documents.filter((doc) => !ids.has(doc.id))
        return {
          documents: remaining,
          activeId: nextActiveId(state.documents, remaining, state.activeId, ids),
        }
      })
    }

    const append = (doc: EditorDocument) => {
      set((state) => ({ documents: [...state.documents, doc], activeId: doc.id }))
      return doc
    }

    return {
      documents: [],
      activeId: null,
      untitledCounter: 0,

      openOrFocus: (filePath) => {
        const resolved = path.resolve(filePath)

        const existing = get().findByPath(resolved)
        if (existing) {
          set({ activeId: existing.id })
          return Promise.resolve(existing)
        }

        const pending = pendingOpens.get(resolved)
        if (pending) {
          logger.debug('Joining in-flight open', resolved)
          return pending
        }

        const load = loadDocument(resolved, files)
          .then((doc) => {
            // Registered by someone else (e.g. save-as) while we were reading
            const raced = get().findByPath(resolved)
            if (raced) {
              set({ activeId: raced.id })
              return raced
            }
            logger.info('Opened', resolved)
            return append(doc)
          })
          .finally(() => {
            pendingOpens.delete(resolved)
          })

        pendingOpens.set(resolved, load)
        return load
      },

      createUntitled: () => {
        const counter = get().untitledCounter + 1
        set({ untitledCounter: counter })
        return append(createDocument({ title: `Untitled-${counter}` }))
      },

      register: (doc) => {
        if (doc.path) {
          const clash = get().findByPath(doc.path)
          if (clash && clash.id !== doc.id) {
            throw new AppError(ErrorType.Conflict, `${doc.path} is already open`)
          }
        }
        if (get().getDocument(doc.id)) {
          get().updateDocument(doc.id, () => doc)
          set({ activeId: doc.id })
          return doc
        }
        return append(doc)
      },

      setActive: (id) => {
        if (get().activeId === id || !get().getDocument(id)) return
        set({ activeId: id })
      },

      getActive: () => {
        const { activeId } = get()
        return activeId ? get().getDocument(activeId) : null
      },

      getDocument: (id) => get().documents.find((doc) => doc.id === id) ?? null,

      findByPath: (filePath) => {
        const resolved = path.resolve(filePath)
        return get().documents.find((doc) => doc.path === resolved) ?? null
      },

      updateDocument: (id, update) => {
        const current = get().getDocument(id)
        if (!current) return null

        const next = update(current)
        if (next === current) return current

        set((state) => ({
          documents: state.documents.map((doc) => (doc.id === id ? next : doc)),
        }))
        return next
      },

      closeTab: async (id, handlers) => {
        const doc = get().getDocument(id)
        if (!doc) return 'missing'

        if (doc.modified) {
          if (!handlers) return 'cancelled'

          const decision = await handlers.resolveUnsaved(doc)
          if (decision === 'cancel') return 'cancelled'
          if (decision === 'save') {
            const latest = get().getDocument(id) ?? doc
            const saved = await handlers.save(latest)
            if (!saved) return 'cancelled'
          }
        }

        if (!get().getDocument(id)) return 'missing'
        removeTabs(new Set([id]))
        logger.debug('Closed tab', id)
        return 'closed'
      },

      rename: (filePath, newPath) => {
        const from = path.resolve(filePath)
        const to = path.resolve(newPath)
        let count = 0

        // The destination was overwritten on disk; its open documents go.
        const overwritten = get()
          .documents.filter((doc) => doc.path !== null && isWithin(doc.path, to) && !isWithin(doc.path, from))
          .map((doc) => doc.id)
        if (overwritten.length > 0) {
          removeTabs(new Set(overwritten))
          logger.warn('Closed documents replaced by rename', to, overwritten)
        }

        set((state) => ({
          documents: state.documents.map((doc) => {
            if (!doc.path || !isWithin(doc.path, from)) return doc
            count++
            return withPath(doc, path.join(to, path.relative(from, doc.path)))
          }),
        }))

        if (count > 0) logger.info('Renamed', from, '->', to, { documents: count })
        return count
      },

      remove: (filePath) => {
        const target = path.resolve(filePath)
        const ids = get()
          .documents.filter((doc) => doc.path !== null && isWithin(doc.path, target))
          .map((doc) => doc.id)

        removeTabs(new Set(ids))
        return ids
      },

      closeAllMatching: (filePath) => get().remove(filePath),
    }
  })
}

export type TabStoreApi = ReturnType<typeof createTabStore>
export type TabStoreState = TabStore
