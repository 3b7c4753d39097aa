type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

function parseLevel(value: string | undefined): LogLevel | null {
  const normalized = (value || '').toLowerCase()
  return LEVELS.find((level) => level === normalized) ?? null
}

function levelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug':
      return 10
    case 'info':
      return 20
    case 'warn':
      return 30
    case 'error':
      return 40
    case 'silent':
      return 50
    default:
      return 20
  }
}

const NODE_ENV = process.env.NODE_ENV || 'development'

// Default: debug in development, quiet under test, info otherwise
const DEFAULT_LEVEL: LogLevel =
  NODE_ENV === 'development' ? 'debug' : NODE_ENV === 'test' ? 'silent' : 'info'
const ACTIVE_LEVEL: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? DEFAULT_LEVEL

function shouldLog(level: LogLevel): boolean {
  return levelOrder(level) >= levelOrder(ACTIVE_LEVEL) && ACTIVE_LEVEL !== 'silent'
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export function makeLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`
  return {
    debug: (...args: unknown[]) => {
      if (shouldLog('debug')) console.debug(prefix, ...args)
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info')) console.info(prefix, ...args)
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn')) console.warn(prefix, ...args)
    },
    error: (...args: unknown[]) => {
      if (shouldLog('error')) console.error(prefix, ...args)
    },
  }
}
