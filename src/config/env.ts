/**
 * Environment configuration
 *
 * The token comes from DISCORD_TOKEN, or from the file named by
 * DISCORD_TOKEN_FILE. Call loadDotenv() first to pick up a local .env.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { config as dotenvConfig } from 'dotenv'
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../discord/rest-client.js'
import { ConfigError } from '../types.js'

export interface EnvConfig {
  token: string
  channelId: string
  requestTimeoutMs: number
}

type Env = Record<string, string | undefined>

/** Load `.env` from `cwd` into process.env (existing variables win) */
export function loadDotenv(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') })
}

function readToken(env: Env, cwd: string): string {
  const direct = env.DISCORD_TOKEN?.trim()
  if (direct) return direct

  const tokenFile = env.DISCORD_TOKEN_FILE?.trim()
  if (tokenFile) {
    const path = resolve(cwd, tokenFile)
    let token: string
    try {
      token = readFileSync(path, 'utf-8').trim()
    } catch (error) {
      throw new ConfigError(`Could not read token file: ${path} (${String(error)})`)
    }
    if (!token) {
      throw new ConfigError(`Token file is empty: ${path}`)
    }
    return token
  }

  throw new ConfigError('DISCORD_TOKEN not found in environment or .env file')
}

function readTimeout(env: Env): number {
  const raw = env.REQUEST_TIMEOUT_MS?.trim()
  if (!raw) return DEFAULT_REQUEST_TIMEOUT_MS
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`REQUEST_TIMEOUT_MS must be a positive integer, got '${raw}'`)
  }
  return Number(raw)
}

export function loadEnvConfig(env: Env = process.env, cwd: string = process.cwd()): EnvConfig {
  const token = readToken(env, cwd)

  const channelId = env.CHANNEL_ID?.trim()
  if (!channelId) {
    throw new ConfigError('CHANNEL_ID not found in environment or .env file')
  }

  return { token, channelId, requestTimeoutMs: readTimeout(env) }
}
