/**
 * Command-line arguments
 */

import { parseArgs } from 'util'
import { ConfigError, UNBOUNDED, boundedLimit } from '../types.js'
import type { MessageLimit } from '../types.js'

export interface CliArgs {
  limit: MessageLimit
  output: string
  extractLinks: boolean
  linksOutput: string
  help: boolean
}

export const USAGE = `Usage: discord-channel-export [options]

Fetch messages from a Discord channel and save them to a text file.
Reads DISCORD_TOKEN and CHANNEL_ID from the environment or a .env file.

Options:
  -l, --limit <n|all>       Number of messages to fetch (default: 100, "all" for every message)
  -o, --output <file>       Output file name (default: messages.txt)
      --extract-links       Extract all links and save them to the links file
      --links-output <file> Links file name (default: links.txt)
  -h, --help                Show this help`

/** `all` (any case) or a positive integer */
export function parseLimit(value: string): MessageLimit {
  const trimmed = value.trim()
  if (trimmed.toLowerCase() === 'all') {
    return UNBOUNDED
  }
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid limit value '${value}'. Use a number or 'all'`)
  }
  const count = Number(trimmed)
  if (count <= 0) {
    throw new ConfigError('Number of messages must be greater than 0')
  }
  return boundedLimit(count)
}

export function ensureTxtExtension(file: string): string {
  return file.endsWith('.txt') ? file : `${file}.txt`
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        limit: { type: 'string', short: 'l', default: '100' },
        output: { type: 'string', short: 'o', default: 'messages.txt' },
        'extract-links': { type: 'boolean', default: false },
        'links-output': { type: 'string', default: 'links.txt' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (error) {
    // Unknown flags and missing option values
    throw new ConfigError(error instanceof Error ? error.message : String(error))
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readArgs(argv)

  return {
    limit: parseLimit(values.limit ?? '100'),
    output: ensureTxtExtension(values.output ?? 'messages.txt'),
    extractLinks: values['extract-links'] ?? false,
    linksOutput: ensureTxtExtension(values['links-output'] ?? 'links.txt'),
    help: values.help ?? false,
  }
}
