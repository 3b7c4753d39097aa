import { describe, it, expect } from 'vitest'
import {
  DEFAULT_AI_CONFIG,
  OpenRouterClient,
  loadAIConfig,
  type AIConfig,
} from '@/core/services/completion'
import { ErrorType } from '@/core/lib/errors'

interface RecordedRequest {
  url: string
  headers: Headers
  body: unknown
}

const reply = (content: string) => ({ choices: [{ message: { role: 'assistant', content } }] })

function fakeFetch(status: number, body: unknown) {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    const payload: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : null
    requests.push({ url: String(input), headers: new Headers(init?.headers), body: payload })
    return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })
  }
  return { fetchImpl, requests }
}

function failingFetch(error: Error): typeof fetch {
  return async () => {
    throw error
  }
}

function makeClient(fetchImpl: typeof fetch, overrides: Partial<AIConfig> = {}) {
  return new OpenRouterClient({
    config: { ...DEFAULT_AI_CONFIG, apiKey: 'test-secret', ...overrides },
    fetch: fetchImpl,
  })
}

describe('OpenRouterClient', () => {
  it('posts a chat completion and trims inline completions', async () => {
    const { fetchImpl, requests } = fakeFetch(200, reply('  return a + b\n'))
    const client = makeClient(fetchImpl)

    await expect(client.completeAsync('def add(a, b):\n    ', '', '    ', 'add.py', 'python')).resolves.toBe(
      'return a + b'
    )

    const [request] = requests
    expect(request?.url).toBe('https://openrouter.ai/api/v1/chat/completions')
    expect(request?.headers.get('Authorization')).toBe('Bearer test-secret')
    expect(request?.headers.get('X-Title')).toBe('Codepad AI')
    expect(request?.body).toMatchObject({
      model: DEFAULT_AI_CONFIG.model,
      temperature: 0.7,
      max_tokens: 2048,
      messages: [{ role: 'system' }, { role: 'user' }],
    })
  })

  it('sends only the last 1000 characters before the cursor', async () => {
    const { fetchImpl, requests } = fakeFetch(200, reply('pass'))
    const client = makeClient(fetchImpl)

    await client.completeAsync(`${'a'.repeat(5)}${'b'.repeat(1000)}`, '', '', 'big.py', 'python')

    const prompt = JSON.stringify(requests[0]?.body)
    expect(prompt).toContain(`Code before cursor:\\n${'b'.repeat(1000)}\\n`)
    expect(prompt).not.toContain('aaaaa')
  })

  it('sends chat history between the system prompt and the new message', async () => {
    const { fetchImpl, requests } = fakeFetch(200, reply('Sure.'))
    const client = makeClient(fetchImpl)

    await client.chat(
      [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ],
      'x = 1',
      'and now?'
    )

    expect(requests[0]?.body).toMatchObject({
      messages: [
        { role: 'system' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'Current file:\nx = 1\n\nand now?' },
      ],
    })
  })

  it('extracts the corrected code from the answer', async () => {
    const answer = 'The name is undefined.\n```python\nprint(x)\n```'
    const client = makeClient(fakeFetch(200, reply(answer)).fetchImpl)

    await expect(client.correctError('print(y)', 'NameError', 'a.py', 'python')).resolves.toEqual({
      analysis: answer,
      correctedCode: 'print(x)',
    })
  })

  it('keeps the original code when the answer has no code block', async () => {
    const client = makeClient(fakeFetch(200, reply('Looks fine to me.')).fetchImpl)

    const result = await client.correctError('print(y)', 'NameError', 'a.py', 'python')
    expect(result.correctedCode).toBe('print(y)')
  })

  it('strips a fence wrapping a generated file', async () => {
    const client = makeClient(fakeFetch(200, reply('```python\nimport os\n```')).fetchImpl)

    await expect(client.createFile('tool.py', 'list files', 'python')).resolves.toBe('import os')
  })

  describe('errors', () => {
    it('refuses to call out without an API key', async () => {
      const { fetchImpl, requests } = fakeFetch(200, reply('x'))
      const client = makeClient(fetchImpl, { apiKey: null })

      expect(client.isAvailable()).toBe(false)
      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.AIUnavailable,
        message: 'AI assistant is not available',
      })
      expect(requests).toEqual([])
    })

    it('is unavailable when disabled', () => {
      const client = makeClient(fakeFetch(200, reply('x')).fetchImpl, { enabled: false })
      expect(client.isAvailable()).toBe(false)
    })

    it('maps a rejected key to Unauthorized with the provider message', async () => {
      const client = makeClient(fakeFetch(401, { error: { message: 'Invalid key' } }).fetchImpl)

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.Unauthorized,
        message: 'Invalid key',
      })
    })

    it('maps rate limiting without a JSON body', async () => {
      const client = makeClient(fakeFetch(429, 'slow down').fetchImpl)

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.RateLimited,
        message: 'Rate limit reached. Please wait before trying again.',
      })
    })

    it('maps provider failures to ServerError', async () => {
      const client = makeClient(fakeFetch(500, { error: 'boom' }).fetchImpl)

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.ServerError,
        message: 'boom',
      })
    })

    it('treats an error payload on a 200 as a failure', async () => {
      const client = makeClient(fakeFetch(200, { error: { message: 'model overloaded' } }).fetchImpl)

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.ServerError,
        message: 'model overloaded',
      })
    })

    it('rejects answers without message content', async () => {
      const client = makeClient(fakeFetch(200, { choices: [] }).fetchImpl)

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        message: 'AI provider returned no message content',
      })
    })

    it('reports unreachable providers as network errors', async () => {
      const client = makeClient(failingFetch(new TypeError('fetch failed')))

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.Network,
        message: 'Network error: unable to reach the AI provider',
      })
    })

    it('reports timeouts with the configured limit', async () => {
      const timeout = new Error('The operation was aborted due to timeout')
      timeout.name = 'TimeoutError'
      const client = makeClient(failingFetch(timeout), { timeoutMs: 5000 })

      await expect(client.explain('x', 'a.py', 'python')).rejects.toMatchObject({
        type: ErrorType.Network,
        message: 'AI request timed out after 5000ms',
      })
    })

    it('turns connection test failures into a result', async () => {
      const client = makeClient(fakeFetch(401, { error: 'Invalid key' }).fetchImpl)

      await expect(client.testConnection()).resolves.toEqual({
        success: false,
        message: 'Connection test failed: Invalid key',
        model: DEFAULT_AI_CONFIG.model,
      })
    })
  })
})

describe('loadAIConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadAIConfig({})).toEqual(DEFAULT_AI_CONFIG)
  })

  it('reads overrides and ignores malformed numbers', () => {
    const config = loadAIConfig({
      OPENROUTER_API_KEY: ' test-secret ',
      AI_MODEL: 'test/model',
      AI_TEMPERATURE: '0.2',
      AI_MAX_TOKENS: 'lots',
      AI_ENABLED: 'off',
      AI_BASE_URL: 'http://localhost:8080/v1//',
      AI_TIMEOUT_MS: '1000',
    })

    expect(config).toEqual({
      apiKey: 'test-secret',
      model: 'test/model',
      temperature: 0.2,
      maxTokens: 2048,
      enabled: false,
      baseUrl: 'http://localhost:8080/v1',
      timeoutMs: 1000,
    })
  })
})
