/**
 * Logger
 *
 * Timestamped, scope-tagged console logging gated by a verbosity level.
 * `quiet` keeps warnings and errors, `normal` adds info, `debug` adds debug.
 */

export type Verbosity = 'quiet' | 'normal' | 'debug'

export const VERBOSITIES: readonly Verbosity[] = ['quiet', 'normal', 'debug']

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export type LogSink = (level: LogLevel, line: string, fields?: LogFields) => void

export type Logger = {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  child(scope: string): Logger
  isDebug(): boolean
}

export type LoggerOptions = {
  verbosity?: Verbosity
  scope?: string
  sink?: LogSink
  now?: () => Date
}

const consoleSink: LogSink = (level, line, fields) => {
  const args: unknown[] = fields ? [line, fields] : [line]
  switch (level) {
    case 'debug':
      console.debug(...args)
      break
    case 'info':
      console.log(...args)
      break
    case 'warn':
      console.warn(...args)
      break
    case 'error':
      console.error(...args)
      break
  }
}

function enabled(verbosity: Verbosity, level: LogLevel): boolean {
  if (level === 'warn' || level === 'error') return true
  if (level === 'info') return verbosity !== 'quiet'
  return verbosity === 'debug'
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbosity = options.verbosity ?? 'normal'
  const sink = options.sink ?? consoleSink
  const now = options.now ?? (() => new Date())
  const scope = options.scope

  function write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!enabled(verbosity, level)) return
    const tag = scope ? ` [${scope}]` : ''
    sink(level, `[${level}] ${now().toISOString()}${tag} ${message}`, fields)
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: childScope => createLogger({
      verbosity,
      sink,
      now,
      scope: scope ? `${scope}:${childScope}` : childScope,
    }),
    isDebug: () => verbosity === 'debug',
  }
}

/** Discards everything; the default for components constructed without a logger. */
export const silentLogger: Logger = createLogger({ verbosity: 'quiet', sink: () => undefined })
