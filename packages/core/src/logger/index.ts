import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * @description Until `init()` is called, messages fall back to the console.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['LOG_LEVEL'] || 'info',
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'debug', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  get level() {
    return this.pino.level
  }

  set level(level: string) {
    this.pino.level = level
  }

  init() {
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.pino.isLevelEnabled(level)) {
        return
      }
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
