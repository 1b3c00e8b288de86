/**
 * Environment configuration.
 *
 * Loads `.env` from the working directory once and validates the settings the
 * CLI and batch handlers fall back on when a flag is not given.
 */

import { config as loadEnv } from 'dotenv'
import { z } from 'zod'
import { InvalidOptionsError } from './errors.js'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const
export type LogLevel = typeof LOG_LEVELS[number]

const EnvSchema = z.object({
  GAZETTE_THREADS: z.coerce.number().int().min(0).default(0),
  GAZETTE_SCRIPTS: z.string().default('latin,greek'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export interface AppConfig {
  threads: number
  scripts: string[]
  logLevel: LogLevel
}

let envLoaded = false

/**
 * Splits a comma-separated script list, dropping blanks and duplicates.
 *
 * @example
 * parseScriptList(' latin, greek,,latin ') // ['latin', 'greek']
 */
export function parseScriptList(value: string): string[] {
  const keys = value.split(',').map(key => key.trim()).filter(key => key.length > 0)
  return Array.from(new Set(keys))
}

/**
 * Reads configuration from `env` (defaults to process.env after loading .env).
 *
 * @throws InvalidOptionsError when a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env && !envLoaded) {
    loadEnv()
    envLoaded = true
  }

  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  return {
    threads: parsed.data.GAZETTE_THREADS,
    scripts: parseScriptList(parsed.data.GAZETTE_SCRIPTS),
    logLevel: parsed.data.LOG_LEVEL,
  }
}
