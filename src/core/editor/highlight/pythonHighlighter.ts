/**
 * Regex-based lexical highlighter for Python source.
 *
 * Each category is matched independently over the whole text and the groups
 * are emitted in application order: comments, strings, keywords, numbers,
 * function names. Overlaps between categories are kept (a keyword inside a
 * comment gets both spans); the renderer applies spans in order, so the last
 * category covering a character wins.
 */

// ============================================================================
// TYPES
// ============================================================================

export type HighlightCategory = 'comment' | 'string' | 'keyword' | 'number' | 'function'

export interface HighlightSpan {
  category: HighlightCategory
  /** Inclusive start offset */
  from: number
  /** Exclusive end offset */
  to: number
}

// ============================================================================
// PATTERNS
// ============================================================================

export const PYTHON_KEYWORDS: readonly string[] = [
  'def', 'class', 'if', 'elif', 'else', 'for', 'while', 'return',
  'import', 'from', 'as', 'try', 'except', 'finally', 'with', 'lambda',
  'yield', 'pass', 'break', 'continue', 'and', 'or', 'not', 'in', 'is',
  'None', 'True', 'False',
]

interface CategoryRule {
  category: HighlightCategory
  pattern: RegExp
  /** Capture group holding the highlighted text; 0 = whole match */
  group: number
}

const RULES: readonly CategoryRule[] = [
  { category: 'comment', pattern: /#[^\n]*/g, group: 0 },
  { category: 'string', pattern: /"(?:[^"\\\n]|\\.)*?"|'(?:[^'\\\n]|\\.)*?'/g, group: 0 },
  { category: 'keyword', pattern: new RegExp(`\\b(?:${PYTHON_KEYWORDS.join('|')})\\b`, 'g'), group: 0 },
  { category: 'number', pattern: /\b\d+(?:\.\d+)?\b/g, group: 0 },
  { category: 'function', pattern: /\bdef\s+([A-Za-z_]\w*)/g, group: 1 },
]

// ============================================================================
// HIGHLIGHTING
// ============================================================================

function collect(text: string, rule: CategoryRule): HighlightSpan[] {
  const spans: HighlightSpan[] = []
  // Fresh RegExp per scan: global regexes carry lastIndex between calls
  const pattern = new RegExp(rule.pattern.source, rule.pattern.flags)

  for (const match of text.matchAll(pattern)) {
    const captured = match[rule.group]
    if (captured === undefined || captured.length === 0) continue

    const index = match.index ?? 0
    const matchEnd = index + match[0].length
    const from = rule.group === 0 ? index : matchEnd - captured.length
    spans.push({ category: rule.category, from, to: from + captured.length })
  }

  return spans
}

/**
 * Tokenize the full text. Pure function of `text`.
 */
export function highlight(text: string): HighlightSpan[] {
  return RULES.flatMap((rule) => collect(text, rule))
}

/**
 * The category that visually wins at `offset` (last applied span covering it).
 */
export function styleAt(spans: readonly HighlightSpan[], offset: number): HighlightCategory | null {
  let winner: HighlightCategory | null = null
  for (const span of spans) {
    if (span.from <= offset && offset < span.to) winner = span.category
  }
  return winner
}
