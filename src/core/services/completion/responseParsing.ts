const FENCE = '```'

const FENCE_LANGUAGES = new Set(['python', 'py', 'javascript', 'js', 'typescript', 'ts', 'java', 'c', 'cpp', 'go', 'rust', 'sh', 'bash'])

/**
 * Code of the last fenced block in `content`, without its language tag.
 * Null when the answer has no complete fence.
 */
export function extractCodeBlock(content: string): string | null {
  const parts = content.split(FENCE)
  let code: string | null = null

  // Odd segments sit between an opening and a closing fence
  for (let i = 1; i < parts.length - 1; i += 2) {
    const block = (parts[i] ?? '').trim()
    const [first = '', ...rest] = block.split('\n')
    code = FENCE_LANGUAGES.has(first.trim().toLowerCase()) ? rest.join('\n') : block
  }
  return code
}

/**
 * Drop a code fence wrapping the whole answer.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim()
  if (!trimmed.startsWith(FENCE)) return trimmed

  const lines = trimmed.split('\n').slice(1)
  if (lines.length > 0 && lines[lines.length - 1]?.trim() === FENCE) lines.pop()
  return lines.join('\n')
}

