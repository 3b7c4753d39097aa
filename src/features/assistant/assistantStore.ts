import { createStore } from 'zustand/vanilla'
import { getErrorMessage } from '@/core/lib/errors'
import { makeLogger } from '@/core/lib/logger'

const logger = makeLogger('assistant')

export type AssistantTask = 'explain' | 'refactor' | 'bugs' | 'correct' | 'generate' | 'document' | 'createFile'

/**
 * Panel display state:
 * - 'idle': nothing requested yet
 * - 'loading': waiting for the model
 * - 'results': `result` holds the answer
 * - 'error': `error` holds a user-facing message
 */
export type PanelStatus = 'idle' | 'loading' | 'results' | 'error'

export interface AssistantResult {
  text: string
  /** Code that can be inserted into the editor, when the answer has some */
  code: string | null
}

interface AssistantStore {
  status: PanelStatus
  task: AssistantTask | null
  result: AssistantResult | null
  error: string | null
  /** Bumped per request; answers for an older id are dropped */
  requestId: number

  /** Resolves with the result, or null when it failed or was superseded */
  run: (task: AssistantTask, request: () => Promise<AssistantResult>) => Promise<AssistantResult | null>
  fail: (task: AssistantTask, message: string) => void
  reset: () => void
}

export function createAssistantStore() {
  return createStore<AssistantStore>()((set, get) => ({
    status: 'idle',
    task: null,
    result: null,
    error: null,
    requestId: 0,

    run: async (task, request) => {
      const requestId = get().requestId + 1
      set({ status: 'loading', task, result: null, error: null, requestId })

      try {
        const result = await request()
        if (get().requestId !== requestId) {
          logger.debug('Dropping superseded result', task)
          return null
        }
        set({ status: 'results', result })
        return result
      } catch (error) {
        if (get().requestId !== requestId) {
          logger.debug('Dropping superseded failure', task, error)
          return null
        }
        logger.warn('Assistant request failed', task, error)
        set({ status: 'error', error: getErrorMessage(error) })
        return null
      }
    },

    fail: (task, message) =>
      set((state) => ({ status: 'error', task, result: null, error: message, requestId: state.requestId + 1 })),

    reset: () =>
      set((state) => ({ status: 'idle', task: null, result: null, error: null, requestId: state.requestId + 1 })),
  }))
}

export type AssistantStoreApi = ReturnType<typeof createAssistantStore>
