/**
 * Language Registry
 *
 * Maps file names to the language id sent with AI requests and used to pick a
 * highlighter. Only Python has a highlighter; other languages are plain text
 * for highlighting purposes.
 */

// ============================================================================
// LANGUAGE TYPES
// ============================================================================

export type LanguageId =
  | 'python'
  | 'javascript'
  | 'typescript'
  | 'java'
  | 'c'
  | 'cpp'
  | 'go'
  | 'rust'
  | 'shell'
  | 'text'

export interface LanguageDefinition {
  id: LanguageId
  /** Human-readable label */
  label: string
  /** File extensions this language handles (e.g., ['.py']) */
  extensions: string[]
  /** Whether the lexical highlighter understands this language */
  highlighted: boolean
}

// ============================================================================
// REGISTRY
// ============================================================================

const languageRegistry: readonly LanguageDefinition[] = [
  { id: 'python', label: 'Python', extensions: ['.py', '.pyw'], highlighted: true },
  { id: 'javascript', label: 'JavaScript', extensions: ['.js', '.mjs', '.cjs', '.jsx'], highlighted: false },
  { id: 'typescript', label: 'TypeScript', extensions: ['.ts', '.mts', '.cts', '.tsx'], highlighted: false },
  { id: 'java', label: 'Java', extensions: ['.java'], highlighted: false },
  { id: 'c', label: 'C', extensions: ['.c', '.h'], highlighted: false },
  { id: 'cpp', label: 'C++', extensions: ['.cpp', '.cc', '.cxx', '.hpp'], highlighted: false },
  { id: 'go', label: 'Go', extensions: ['.go'], highlighted: false },
  { id: 'rust', label: 'Rust', extensions: ['.rs'], highlighted: false },
  { id: 'shell', label: 'Shell', extensions: ['.sh', '.bash'], highlighted: false },
]

const PLAIN_TEXT: LanguageDefinition = {
  id: 'text',
  label: 'Plain Text',
  extensions: ['.txt'],
  highlighted: false,
}

// ============================================================================
// UTILITIES
// ============================================================================

/**
 * Detect language from filename extension.
 *
 * @returns the matching definition, plain text if unknown
 *
 * @example
 * detectLanguage('fib.py').id // 'python'
 * detectLanguage('Untitled-3').id // 'text'
 */
export function detectLanguage(filename: string): LanguageDefinition {
  const dot = filename.lastIndexOf('.')
  if (dot <= 0) return PLAIN_TEXT

  const ext = filename.slice(dot).toLowerCase()
  return languageRegistry.find((language) => language.extensions.includes(ext)) ?? PLAIN_TEXT
}

/**
 * Whether the lexical highlighter should run for `id`.
 */
export function isHighlightedLanguage(id: LanguageId): boolean {
  return languageRegistry.some((language) => language.id === id && language.highlighted)
}
