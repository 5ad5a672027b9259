export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) {
    return fallback
  }
  const normalized = value.trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : fallback
}

/**
 * Writes `[scope] message` lines to stderr so that stdout stays free for
 * command output. `write` replaces the stderr sink.
 */
export function createConsoleLogger(
  scope: string,
  level: LogLevel = 'warn',
  write: (line: string) => void = line => console.error(line)
): Logger {
  const threshold = LEVEL_PRIORITY[level]
  const emit = (messageLevel: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_PRIORITY[messageLevel] > threshold) {
      return
    }
    write(`[${scope}] ${messageLevel === 'info' ? '' : `${messageLevel}: `}${message}`)
  }
  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  }
}

export const silentLogger: Logger = createConsoleLogger('slotpak', 'silent')
