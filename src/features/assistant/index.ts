export {
  createAssistantStore,
  type AssistantResult,
  type AssistantStoreApi,
  type AssistantTask,
  type PanelStatus,
} from './assistantStore'
export { createChatStore, type AskAssistant, type ChatStoreApi } from './chatStore'
