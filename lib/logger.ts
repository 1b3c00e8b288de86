/**
 * Tagged console logging for handlers and the CLI.
 *
 * Output keeps the `[Tag] message` shape used across the codebase; the level
 * only decides which lines are printed. The pure core never logs.
 */

import { LOG_LEVELS, type LogLevel } from './config.js'

type MessageLevel = Exclude<LogLevel, 'silent'>

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

const envLevel = process.env.LOG_LEVEL
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function enabled(level: MessageLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel)
}

/**
 * @example
 * const log = createLogger('DirectoryProcessor')
 * log.info('Found 12 markdown files') // [DirectoryProcessor] Found 12 markdown files
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  return {
    debug(message) {
      if (enabled('debug')) console.log(`${prefix} ${message}`)
    },
    info(message) {
      if (enabled('info')) console.log(`${prefix} ${message}`)
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`)
    },
    error(message, error) {
      if (!enabled('error')) return
      if (error === undefined) {
        console.error(`${prefix} ${message}`)
      } else {
        console.error(`${prefix} ${message}`, error)
      }
    },
  }
}
