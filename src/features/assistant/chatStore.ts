import { createStore } from 'zustand/vanilla'
import type { ChatMessage } from '@/core/services/completion'
import { getErrorMessage } from '@/core/lib/errors'

export type AskAssistant = (history: readonly ChatMessage[], message: string) => Promise<string>

interface ChatStore {
  /** Conversation so far, oldest first; sent with every new message */
  messages: ChatMessage[]
  pending: boolean
  error: string | null
  // Replies from before the last clearHistory() are dropped
  generation: number

  send: (message: string, ask: AskAssistant) => Promise<string | null>
  clearHistory: () => void
}

export function createChatStore() {
  return createStore<ChatStore>()((set, get) => ({
    messages: [],
    pending: false,
    error: null,
    generation: 0,

    send: async (message, ask) => {
      const content = message.trim()
      if (!content) return null

      const { generation, messages: history } = get()
      const turn: ChatMessage = { role: 'user', content }
      set({ messages: [...history, turn], pending: true, error: null })

      try {
        const reply = await ask(history, content)
        if (get().generation !== generation) return null
        set((state) => ({ messages: [...state.messages, { role: 'assistant', content: reply }], pending: false }))
        return reply
      } catch (error) {
        if (get().generation !== generation) return null
        // Unanswered turns stay out of the history sent next time
        set((state) => ({
          messages: state.messages.filter((msg) => msg !== turn),
          pending: false,
          error: getErrorMessage(error),
        }))
        return null
      }
    },

    clearHistory: () =>
      set((state) => ({ messages: [], pending: false, error: null, generation: state.generation + 1 })),
  }))
}

export type ChatStoreApi = ReturnType<typeof createChatStore>
