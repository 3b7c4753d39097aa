export type {
  ChatMessage,
  ChatRole,
  CompletionClient,
  ConnectionCheck,
  ErrorCorrection,
  ModelInfo,
} from './types'
export { loadAIConfig, DEFAULT_AI_CONFIG, type AIConfig } from './config'
export { OpenRouterClient, type OpenRouterClientOptions } from './openRouterClient'
export { extractCodeBlock, stripCodeFence } from './responseParsing'
