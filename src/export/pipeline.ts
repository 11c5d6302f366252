/**
 * One export run: fetch, write messages, optionally extract and write links.
 */

import { fetchChannelMessages, type FetchDeps } from '../discord/message-fetch.js'
import type { MessageLimit } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { extractLinks } from './links.js'
import { saveLinks, saveMessages } from './writer.js'

const logger = createLogger({ module: 'pipeline' })

export interface ExportOptions {
  channelId: string
  limit: MessageLimit
  output: string
  extractLinks: boolean
  linksOutput: string
}

export interface ExportDeps {
  api: FetchDeps
  signal?: AbortSignal
  onProgress?: (fetched: number) => void
  now?: () => Date
}

export type ExportOutcome =
  | { status: 'cancelled'; fetched: number }
  | { status: 'empty' }
  | { status: 'complete'; messageCount: number; linkCount: number; files: string[] }

/**
 * Run an export. Nothing is written if the fetch fails, is cancelled or
 * comes back empty.
 */
export async function runExport(options: ExportOptions, deps: ExportDeps): Promise<ExportOutcome> {
  const result = await fetchChannelMessages(options.channelId, options.limit, deps.api, {
    signal: deps.signal,
    onProgress: deps.onProgress,
  })

  if (result.status === 'cancelled' || deps.signal?.aborted) {
    return { status: 'cancelled', fetched: result.messages.length }
  }

  const { messages } = result
  if (messages.length === 0) {
    logger.info({ channelId: options.channelId }, 'No messages were fetched')
    return { status: 'empty' }
  }

  const now = deps.now ?? (() => new Date())
  const files: string[] = []

  await saveMessages(messages, options.output, now())
  files.push(options.output)

  let linkCount = 0
  if (options.extractLinks) {
    logger.info('Extracting links')
    const links = extractLinks(messages)
    linkCount = links.length
    if (links.length > 0) {
      await saveLinks(links, options.linksOutput, now())
      files.push(options.linksOutput)
    } else {
      logger.info('No links found in messages')
    }
  }

  return { status: 'complete', messageCount: messages.length, linkCount, files }
}
