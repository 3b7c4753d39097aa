import type { LanguageId } from '@/core/editor/types/languageRegistry'

export type ChatRole = 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  content: string
}

export interface ErrorCorrection {
  /** The full model answer */
  analysis: string
  /** Code from the last fenced block, or the input code when none was found */
  correctedCode: string
}

export interface ConnectionCheck {
  success: boolean
  message: string
  model: string
  response?: string
}

export interface ModelInfo {
  model: string
  temperature: number
  maxTokens: number
  enabled: boolean
}

/**
 * Hosted-LLM collaborator. Every call may reject with an AppError
 * (AIUnavailable, Network, Unauthorized, RateLimited, ServerError); callers
 * decide how to degrade.
 */
export interface CompletionClient {
  isAvailable(): boolean

  /** Inline completion at the cursor; may resolve to '' */
  completeAsync(
    codeBefore: string,
    codeAfter: string,
    currentLine: string,
    fileName: string,
    language: LanguageId
  ): Promise<string>

  explain(code: string, fileName: string, language: LanguageId): Promise<string>
  suggestRefactoring(code: string, fileName: string, language: LanguageId): Promise<string>
  detectBugs(code: string, errorMessage: string, fileName: string, language: LanguageId): Promise<string>
  generateFromDescription(
    requirement: string,
    context: string,
    fileName: string,
    language: LanguageId
  ): Promise<string>
  chat(history: readonly ChatMessage[], fileContext: string, userMessage: string): Promise<string>

  generateDocumentation(code: string, fileName: string, language: LanguageId): Promise<string>
  correctError(code: string, errorMessage: string, fileName: string, language: LanguageId): Promise<ErrorCorrection>
  /** Complete content for a new file, without a surrounding code fence */
  createFile(fileName: string, requirements: string, language: LanguageId): Promise<string>
  testConnection(): Promise<ConnectionCheck>
  getModelInfo(): ModelInfo
}
