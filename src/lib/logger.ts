export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogMeta = Record<string, unknown>

export type Logger = {
  debug(scope: string, message: string, meta?: LogMeta): void
  info(scope: string, message: string, meta?: LogMeta): void
  warn(scope: string, message: string, meta?: LogMeta): void
  error(scope: string, message: string, meta?: LogMeta): void
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(ORDER, value)
}

function levelFromEnv(): LogLevel {
  const v = (process.env.WORKPACK_LOG_LEVEL || '').trim().toLowerCase()
  return isLogLevel(v) ? v : 'info'
}

export function createLogger(level: LogLevel = levelFromEnv()): Logger {
  const min = ORDER[level]
  function emit(at: Exclude<LogLevel, 'silent'>, scope: string, message: string, meta?: LogMeta) {
    if (ORDER[at] < min) return
    const line = `[${at}] [${scope}] ${message}`
    const sink = at === 'error' ? console.error : at === 'warn' ? console.warn : at === 'debug' ? console.debug : console.info
    if (meta) sink(line, meta)
    else sink(line)
  }
  return {
    debug: (scope, message, meta) => emit('debug', scope, message, meta),
    info: (scope, message, meta) => emit('info', scope, message, meta),
    warn: (scope, message, meta) => emit('warn', scope, message, meta),
    error: (scope, message, meta) => emit('error', scope, message, meta),
  }
}

export const logger = createLogger()

export const silentLogger = createLogger('silent')
