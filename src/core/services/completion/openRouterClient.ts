import type { LanguageId } from '@/core/editor/types/languageRegistry'
import {
  AppError,
  ErrorType,
  getErrorMessage,
  httpErrorToAppError,
  isAbortError,
  isTimeoutError,
} from '@/core/lib/errors'
import { isRecord } from '@/core/lib/guards'
import { makeLogger } from '@/core/lib/logger'
import { loadAIConfig, type AIConfig } from './config'
import { prompts, type ProviderMessage } from './prompts'
import { extractCodeBlock, stripCodeFence } from './responseParsing'
import type { ChatMessage, CompletionClient, ConnectionCheck, ErrorCorrection, ModelInfo } from './types'

const logger = makeLogger('openrouter')

const APP_HEADERS = {
  'HTTP-Referer': 'http://localhost',
  'X-Title': 'Codepad AI',
}

export interface OpenRouterClientOptions {
  config?: AIConfig
  fetch?: typeof fetch
}

function readProviderError(body: unknown): string | null {
  if (!isRecord(body)) return null
  const { error } = body
  if (typeof error === 'string') return error
  if (isRecord(error) && typeof error.message === 'string') return error.message
  return null
}

function readMessageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null
  const first: unknown = body.choices[0]
  if (!isRecord(first) || !isRecord(first.message)) return null
  const { content } = first.message
  return typeof content === 'string' ? content : null
}

/**
 * Completion client for OpenRouter's OpenAI-compatible chat endpoint.
 */
export class OpenRouterClient implements CompletionClient {
  private readonly config: AIConfig
  private readonly fetchImpl: typeof fetch

  constructor(options: OpenRouterClientOptions = {}) {
    this.config = options.config ?? loadAIConfig()
    this.fetchImpl = options.fetch ?? fetch
    if (!this.config.apiKey) {
      logger.info('OPENROUTER_API_KEY not set; AI features disabled')
    }
  }

  isAvailable(): boolean {
    return this.config.enabled && this.config.apiKey !== null
  }

  getModelInfo(): ModelInfo {
    return {
      model: this.config.model,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      enabled: this.config.enabled,
    }
  }

  async completeAsync(
    codeBefore: string,
    codeAfter: string,
    currentLine: string,
    fileName: string,
    language: LanguageId
  ): Promise<string> {
    const content = await this.send(prompts.completion(codeBefore, codeAfter, currentLine, fileName, language))
    return content.trim()
  }

  explain(code: string, fileName: string, language: LanguageId): Promise<string> {
    return this.send(prompts.explain(code, fileName, language))
  }

  suggestRefactoring(code: string, fileName: string, language: LanguageId): Promise<string> {
    return this.send(prompts.refactor(code, fileName, language))
  }

  detectBugs(code: string, errorMessage: string, fileName: string, language: LanguageId): Promise<string> {
    return this.send(prompts.bugs(code, errorMessage, fileName, language))
  }

  generateFromDescription(
    requirement: string,
    context: string,
    fileName: string,
    language: LanguageId
  ): Promise<string> {
    return this.send(prompts.generate(requirement, context, fileName, language))
  }

  chat(history: readonly ChatMessage[], fileContext: string, userMessage: string): Promise<string> {
    return this.send(prompts.chat(history, fileContext, userMessage))
  }

  generateDocumentation(code: string, fileName: string, language: LanguageId): Promise<string> {
    return this.send(prompts.documentation(code, fileName, language))
  }

  async correctError(
    code: string,
    errorMessage: string,
    fileName: string,
    language: LanguageId
  ): Promise<ErrorCorrection> {
    const analysis = await this.send(prompts.correctError(code, errorMessage, fileName, language))
    return { analysis, correctedCode: extractCodeBlock(analysis) ?? code }
  }

  async createFile(fileName: string, requirements: string, language: LanguageId): Promise<string> {
    return stripCodeFence(await this.send(prompts.createFile(fileName, requirements, language)))
  }

  async testConnection(): Promise<ConnectionCheck> {
    const { model } = this.config
    try {
      const response = await this.send(prompts.ping())
      return { success: true, message: 'AI service is working correctly', model, response }
    } catch (error) {
      return { success: false, message: `Connection test failed: ${getErrorMessage(error)}`, model }
    }
  }

  // ==========================================================================
  // TRANSPORT
  // ==========================================================================

  private async send(messages: ProviderMessage[]): Promise<string> {
    const { apiKey } = this.config
    if (!this.config.enabled || !apiKey) {
      throw new AppError(ErrorType.AIUnavailable, 'AI assistant is not available')
    }

    let response: Response
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
          ...APP_HEADERS,
        },
        body: JSON.stringify({
          model: this.config.model,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          messages,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new AppError(ErrorType.Network, `AI request timed out after ${this.config.timeoutMs}ms`, error)
      }
      if (isAbortError(error)) throw error
      logger.warn('AI request failed before a response', error)
      throw new AppError(
        ErrorType.Network,
        'Network error: unable to reach the AI provider',
        error instanceof Error ? error : undefined
      )
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      if (!response.ok) throw httpErrorToAppError(response.status, response.statusText || undefined)
      throw new AppError(
        ErrorType.ServerError,
        'AI provider returned an invalid response',
        error instanceof Error ? error : undefined
      )
    }

    if (!response.ok) {
      const message = readProviderError(body) ?? (response.statusText || undefined)
      logger.warn('AI provider error', response.status, message)
      throw httpErrorToAppError(response.status, message)
    }

    const providerError = readProviderError(body)
    if (providerError) throw new AppError(ErrorType.ServerError, providerError)

    const content = readMessageContent(body)
    if (content === null) {
      throw new AppError(ErrorType.ServerError, 'AI provider returned no message content')
    }
    logger.debug('AI response', { model: this.config.model, length: content.length })
    return content
  }
}
