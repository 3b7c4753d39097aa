export interface AIConfig {
  apiKey: string | null
  model: string
  temperature: number
  maxTokens: number
  enabled: boolean
  baseUrl: string
  timeoutMs: number
}

export const DEFAULT_AI_CONFIG: AIConfig = {
  apiKey: null,
  model: 'mistralai/devstral-2512:free',
  temperature: 0.7,
  maxTokens: 2048,
  enabled: true,
  baseUrl: 'https://openrouter.ai/api/v1',
  timeoutMs: 30_000,
}

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase())
}

/**
 * Build the AI client configuration from environment variables.
 */
export function loadAIConfig(env: NodeJS.ProcessEnv = process.env): AIConfig {
  const apiKey = env.OPENROUTER_API_KEY?.trim()
  return {
    apiKey: apiKey ? apiKey : null,
    model: env.AI_MODEL?.trim() || DEFAULT_AI_CONFIG.model,
    temperature: readNumber(env.AI_TEMPERATURE, DEFAULT_AI_CONFIG.temperature),
    maxTokens: readNumber(env.AI_MAX_TOKENS, DEFAULT_AI_CONFIG.maxTokens),
    enabled: readBoolean(env.AI_ENABLED, DEFAULT_AI_CONFIG.enabled),
    baseUrl: (env.AI_BASE_URL?.trim() || DEFAULT_AI_CONFIG.baseUrl).replace(/\/+$/, ''),
    timeoutMs: readNumber(env.AI_TIMEOUT_MS, DEFAULT_AI_CONFIG.timeoutMs),
  }
}
