import type { ChatMessage } from './types'

export interface ProviderMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

// Context windows sent to the provider
export const CONTEXT_LIMITS = {
  codeBefore: 1000,
  codeAfter: 500,
  chatFileContext: 2000,
  generationContext: 1500,
} as const

export const lastChars = (text: string, count: number) => (text.length > count ? text.slice(-count) : text)
export const firstChars = (text: string, count: number) => text.slice(0, count)

const CODE_ASSISTANT = 'You are an expert programming assistant embedded in a code editor.'

function exchange(system: string, user: string): ProviderMessage[] {
  return [
    { role: 'system', content: `${CODE_ASSISTANT} ${system}` },
    { role: 'user', content: user },
  ]
}

function fenced(code: string, language: string): string {
  return `\`\`\`${language}\n${code}\n\`\`\``
}

export const prompts = {
  completion: (codeBefore: string, codeAfter: string, currentLine: string, fileName: string, language: string) =>
    exchange(
      'Continue the code at the cursor. Reply with only the text to insert, no explanation and no code fences.',
      [
        `File: ${fileName} (${language})`,
        `Code before cursor:\n${lastChars(codeBefore, CONTEXT_LIMITS.codeBefore)}`,
        `Code after cursor:\n${firstChars(codeAfter, CONTEXT_LIMITS.codeAfter)}`,
        `Current line: ${currentLine}`,
      ].join('\n\n')
    ),

  explain: (code: string, fileName: string, language: string) =>
    exchange('Explain what the code does, step by step.', `File: ${fileName}\n\n${fenced(code, language)}`),

  refactor: (code: string, fileName: string, language: string) =>
    exchange(
      'Suggest refactorings that improve readability and structure. Show the improved code.',
      `File: ${fileName}\n\n${fenced(code, language)}`
    ),

  bugs: (code: string, errorMessage: string, fileName: string, language: string) =>
    exchange(
      'Find bugs in the code and show how to fix them.',
      `File: ${fileName}\nError: ${errorMessage || 'none reported'}\n\n${fenced(code, language)}`
    ),

  generate: (requirement: string, context: string, fileName: string, language: string) =>
    exchange(
      `Write ${language} code that meets the requirement. Put the code in a single fenced block.`,
      [
        `File: ${fileName}`,
        `Requirement: ${requirement}`,
        `Existing code:\n${lastChars(context, CONTEXT_LIMITS.generationContext) || 'none'}`,
      ].join('\n\n')
    ),

  documentation: (code: string, fileName: string, language: string) =>
    exchange('Write documentation comments for the code.', `File: ${fileName}\n\n${fenced(code, language)}`),

  correctError: (code: string, errorMessage: string, fileName: string, language: string) =>
    exchange(
      'Analyse the error, then give the corrected code in a fenced block.',
      `File: ${fileName}\nError: ${errorMessage}\n\n${fenced(code, language)}`
    ),

  createFile: (fileName: string, requirements: string, language: string) =>
    exchange(
      `Write the complete content of ${fileName} in ${language}. Reply with the file content only.`,
      requirements
    ),

  chat: (history: readonly ChatMessage[], fileContext: string, userMessage: string): ProviderMessage[] => [
    { role: 'system', content: `${CODE_ASSISTANT} Answer questions about the user's code.` },
    ...history.map((message): ProviderMessage => ({ role: message.role, content: message.content })),
    {
      role: 'user',
      content: `Current file:\n${lastChars(fileContext, CONTEXT_LIMITS.chatFileContext) || 'none'}\n\n${userMessage}`,
    },
  ],

  ping: (): ProviderMessage[] => [
    { role: 'system', content: 'You are a helpful assistant.' },
    { role: 'user', content: "Say 'Hello' if you can hear me." },
  ],
}
