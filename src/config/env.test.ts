import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadEnvConfig } from './env.js'
import { ConfigError } from '../types.js'

describe('loadEnvConfig', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'channel-export-env-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('reads token and channel from the environment', () => {
    expect(loadEnvConfig({ DISCORD_TOKEN: ' test-token ', CHANNEL_ID: '123' }, dir)).toEqual({
      token: 'test-token',
      channelId: '123',
      requestTimeoutMs: 30_000,
    })
  })

  it('reads the token from DISCORD_TOKEN_FILE relative to cwd', () => {
    writeFileSync(join(dir, 'discord_token'), 'file-token\n')

    const config = loadEnvConfig({ DISCORD_TOKEN_FILE: 'discord_token', CHANNEL_ID: '123' }, dir)

    expect(config.token).toBe('file-token')
  })

  it('prefers DISCORD_TOKEN over the token file', () => {
    writeFileSync(join(dir, 'discord_token'), 'file-token')

    const config = loadEnvConfig(
      { DISCORD_TOKEN: 'env-token', DISCORD_TOKEN_FILE: 'discord_token', CHANNEL_ID: '123' },
      dir,
    )

    expect(config.token).toBe('env-token')
  })

  it('rejects an empty token file', () => {
    writeFileSync(join(dir, 'discord_token'), '  \n')

    expect(() => loadEnvConfig({ DISCORD_TOKEN_FILE: 'discord_token', CHANNEL_ID: '123' }, dir)).toThrow(
      ConfigError,
    )
  })

  it('rejects a missing token file', () => {
    expect(() => loadEnvConfig({ DISCORD_TOKEN_FILE: 'nope', CHANNEL_ID: '123' }, dir)).toThrow(ConfigError)
  })

  it('names the missing variable', () => {
    expect(() => loadEnvConfig({ CHANNEL_ID: '123' }, dir)).toThrow(
      'DISCORD_TOKEN not found in environment or .env file',
    )
    expect(() => loadEnvConfig({ DISCORD_TOKEN: 'test-token' }, dir)).toThrow(
      'CHANNEL_ID not found in environment or .env file',
    )
  })

  it('reads REQUEST_TIMEOUT_MS', () => {
    const config = loadEnvConfig(
      { DISCORD_TOKEN: 'test-token', CHANNEL_ID: '123', REQUEST_TIMEOUT_MS: '5000' },
      dir,
    )

    expect(config.requestTimeoutMs).toBe(5000)
  })

  it('rejects a non-numeric timeout', () => {
    expect(() =>
      loadEnvConfig({ DISCORD_TOKEN: 'test-token', CHANNEL_ID: '123', REQUEST_TIMEOUT_MS: 'soon' }, dir),
    ).toThrow(ConfigError)
  })
})
