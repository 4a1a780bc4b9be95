/**
 * Client configuration.
 *
 * Values come from explicit overrides first, then the environment (with a
 * `.env` file loaded through dotenv), then the defaults below.
 *
 * | Variable                        | Default               |
 * |---------------------------------|-----------------------|
 * | ANKI_CONNECT_URL                | http://127.0.0.1:8765 |
 * | ANKI_CONNECT_VERSION            | 6                     |
 * | ANKI_CONNECT_TIMEOUT            | 30000                 |
 * | ANKI_CONNECT_MEDIA_CONCURRENCY  | 4                     |
 */

import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { ValidationFailedError } from './errors.js'

export const DEFAULT_ENDPOINT = 'http://127.0.0.1:8765'
export const DEFAULT_VERSION = 6

const ENV_KEYS = {
  endpoint: 'ANKI_CONNECT_URL',
  version: 'ANKI_CONNECT_VERSION',
  timeoutMs: 'ANKI_CONNECT_TIMEOUT',
  mediaConcurrency: 'ANKI_CONNECT_MEDIA_CONCURRENCY'
} as const

const ConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  version: z.coerce.number().int().positive().default(DEFAULT_VERSION),
  timeoutMs: z.coerce.number().int().positive().default(30000),
  mediaConcurrency: z.coerce.number().int().positive().default(4),
  quiet: z.boolean().default(false)
})

export type AnkiConnectConfig = Readonly<z.output<typeof ConfigSchema>>

export type ConfigOverrides = Partial<z.input<typeof ConfigSchema>>

let dotenvLoaded = false

/**
 * Loads `.env` from the working directory once per process.
 * Variables already set in the environment are not overwritten.
 */
export function loadEnvFile(): void {
  if (dotenvLoaded) return
  loadDotenv()
  dotenvLoaded = true
}

/**
 * Builds the client configuration.
 *
 * @param overrides - Explicit values; win over the environment
 * @param env - Environment to read (default: process.env after loading .env)
 * @throws {ValidationFailedError} naming the offending setting
 *
 * @example
 * loadConfig({ version: 6 }, { ANKI_CONNECT_URL: 'http://localhost:8765' })
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = defaultEnv()
): AnkiConnectConfig {
  const fromEnv: ConfigOverrides = {}
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]
    if (value !== undefined && value.trim() !== '') {
      Object.assign(fromEnv, { [key]: value.trim() })
    }
  }

  const merged: ConfigOverrides = { ...fromEnv }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }

  const parsed = ConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = String(issue.path[0] ?? 'config')
    const name = isEnvKey(key) ? ENV_KEYS[key] : key
    throw new ValidationFailedError(name, issue.message)
  }

  return Object.freeze(parsed.data)
}

function defaultEnv(): NodeJS.ProcessEnv {
  loadEnvFile()
  return process.env
}

function isEnvKey(key: string): key is keyof typeof ENV_KEYS {
  return key in ENV_KEYS
}
