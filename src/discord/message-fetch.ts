/**
 * Channel message pagination: walks a channel backward page by page.
 *
 * Pages come from the API newest-first, so the collected list is newest-first
 * too. Reversing to chronological order is the writer's job.
 */

import type { ExportMessage, MessageLimit } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'message-fetch' })

/** Discord rejects `limit` above 100 on the messages endpoint */
export const MAX_PAGE_SIZE = 100

// ────────────────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────────────────

export interface PageRequest {
  before?: string
  limit: number
}

/** Dependency injection interface — faked in tests, backed by the REST client in production. */
export interface FetchDeps {
  /** Fetch one page older than `before` (newest-first, matching Discord API order). */
  fetchPage(channelId: string, request: PageRequest): Promise<ExportMessage[]>
}

export interface FetchOptions {
  /** Checked before each page request; an in-flight request is left to finish. */
  signal?: AbortSignal
  /** Called with the running total after every page */
  onProgress?: (fetched: number) => void
}

export type FetchResult =
  | { status: 'complete'; messages: ExportMessage[] }
  | { status: 'cancelled'; messages: ExportMessage[] }

// ────────────────────────────────────────────────────────────────────────────
// Pagination
// ────────────────────────────────────────────────────────────────────────────

/**
 * Fetch up to `limit` messages from a channel, newest first.
 *
 * Stops on an empty page, on a short page (end of channel) or once a bounded
 * limit is reached. Errors from `deps` propagate untouched and nothing
 * collected so far is returned.
 */
export async function fetchChannelMessages(
  channelId: string,
  limit: MessageLimit,
  deps: FetchDeps,
  options: FetchOptions = {},
): Promise<FetchResult> {
  const collected: ExportMessage[] = []
  let cursor: string | undefined

  logger.info({ channelId, limit }, 'Fetching messages from channel')

  while (true) {
    const remaining = limit.kind === 'bounded' ? limit.count - collected.length : MAX_PAGE_SIZE
    if (remaining <= 0) break

    if (options.signal?.aborted) {
      logger.info({ channelId, fetched: collected.length }, 'Fetch cancelled before next page')
      return { status: 'cancelled', messages: collected }
    }

    const pageLimit = Math.min(remaining, MAX_PAGE_SIZE)
    const page = cursor !== undefined
      ? await deps.fetchPage(channelId, { before: cursor, limit: pageLimit })
      : await deps.fetchPage(channelId, { limit: pageLimit })

    if (page.length === 0) {
      logger.debug({ channelId }, 'No more messages to fetch')
      break
    }

    // Never hand back more than was asked for, even if the server overshoots
    const accepted = page.length > pageLimit ? page.slice(0, pageLimit) : page
    collected.push(...accepted)
    options.onProgress?.(collected.length)
    logger.info({ channelId, fetched: collected.length }, 'Fetched messages so far')

    // Cursor moves to the oldest message in the page
    const oldest = accepted[accepted.length - 1]
    if (!oldest) break
    cursor = oldest.id

    // Short page means the channel is exhausted
    if (page.length < pageLimit) break
  }

  return { status: 'complete', messages: collected }
}
