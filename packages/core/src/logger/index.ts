import pino from 'pino'
import type { LogLevel } from '../env'

type LogMethod = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description !IMPORTANT! Before using the logger, it must be initialized with `init()` at the top of the entry point file.
 * Until then messages go to the console with a timestamp prefix.
 * The level starts at `info`; `init()` applies the validated `LOG_LEVEL`.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: 'info',
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'debug', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  init(level?: LogLevel) {
    if (level) {
      this.pino.level = level
    }
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
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

  /**
   * Safe logging method that handles uninitialized logger gracefully
   */
  private _safeLog(level: LogMethod, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      this._consoleLog(level, message, args)
      return
    }

    try {
      if (level === 'error') {
        this.pino.error({ err: args[0], args: args.slice(1) }, message)
      } else if (args.length > 0) {
        this.pino[level]({ args }, message)
      } else {
        this.pino[level](message)
      }
    } catch (error) {
      this._consoleLog('error', 'pino failed to write log record', [error])
      this._consoleLog(level, message, args)
    }
  }

  private _consoleLog(level: LogMethod, message: string, args: unknown[]) {
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
  }
}

export const logger = new LoggerProvider()
