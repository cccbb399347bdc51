/**
 * Console logger with a bracketed component prefix
 */

export type LogLevel = 'info' | 'silent'

export type Logger = {
  info: (...args: Array<unknown>) => void
  warn: (...args: Array<unknown>) => void
  error: (...args: Array<unknown>) => void
}

const noop = () => {}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  if (level === 'silent') {
    return { info: noop, warn: noop, error: noop }
  }

  const prefix = `[${scope}]`
  return {
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  }
}
