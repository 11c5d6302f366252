/**
 * Discord REST access for message export.
 *
 * Talks to the v10 messages endpoint directly with fetch: the token may be a
 * user token, which goes into the Authorization header as-is (no `Bot ` prefix).
 */

import { RouteBases, Routes } from 'discord.js'
import type { ExportAttachment, ExportEmbed, ExportMessage } from '../types.js'
import {
  AuthenticationError,
  AuthorizationError,
  HttpError,
  NetworkError,
  NotFoundError,
  ResponseFormatError,
} from '../types.js'
import { createLogger } from '../utils/logger.js'
import type { FetchDeps, PageRequest } from './message-fetch.js'

const logger = createLogger({ module: 'rest-client' })

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

export interface RestClientOptions {
  token: string
  timeoutMs?: number
  /** Override for tests */
  fetch?: typeof fetch
  apiBase?: string
}

/**
 * Build FetchDeps backed by the Discord REST API.
 */
export function createRestFetchDeps(options: RestClientOptions): FetchDeps {
  const doFetch = options.fetch ?? fetch
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
  const apiBase = options.apiBase ?? RouteBases.api

  return {
    async fetchPage(channelId: string, request: PageRequest): Promise<ExportMessage[]> {
      const params = new URLSearchParams({ limit: String(request.limit) })
      if (request.before !== undefined) {
        params.set('before', request.before)
      }
      const url = `${apiBase}${Routes.channelMessages(channelId)}?${params.toString()}`

      const controller = new AbortController()
      const timer = setTimeout(() => controller.abort(), timeoutMs)

      let response: Response
      try {
        response = await doFetch(url, {
          headers: {
            Authorization: options.token,
            'Content-Type': 'application/json',
          },
          signal: controller.signal,
        })
      } catch (error) {
        if (controller.signal.aborted) {
          throw new NetworkError(`Request timed out after ${timeoutMs}ms`, error)
        }
        const reason = error instanceof Error ? error.message : String(error)
        throw new NetworkError(`Network error: ${reason}`, error)
      } finally {
        clearTimeout(timer)
      }

      if (!response.ok) {
        logger.debug({ channelId, status: response.status }, 'Messages request failed')
        switch (response.status) {
          case 401:
            throw new AuthenticationError()
          case 403:
            throw new AuthorizationError(channelId)
          case 404:
            throw new NotFoundError(channelId)
          default:
            throw new HttpError(response.status, await readBody(response))
        }
      }

      // A dropped connection mid-body is a network failure, not a bad payload
      let text: string
      try {
        text = await response.text()
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        throw new NetworkError(`Network error while reading response: ${reason}`, error)
      }

      let data: unknown
      try {
        data = JSON.parse(text)
      } catch (error) {
        throw new ResponseFormatError(`Messages response is not valid JSON: ${String(error)}`, error)
      }

      if (!Array.isArray(data)) {
        throw new ResponseFormatError('Messages response is not an array')
      }
      return data.map(parseApiMessage)
    },
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text()
  } catch (error) {
    logger.warn({ error }, 'Failed to read error response body')
    return '<unreadable>'
  }
}

// ────────────────────────────────────────────────────────────────────────────
// Payload validation
// ────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

/** `{ url }` sub-objects on embeds (image, thumbnail, video) */
function nestedUrl(value: unknown): string | undefined {
  return isRecord(value) ? optionalString(value.url) : undefined
}

function parseAttachment(raw: unknown): ExportAttachment {
  if (!isRecord(raw)) {
    return { url: '' }
  }
  const filename = optionalString(raw.filename)
  const url = typeof raw.url === 'string' ? raw.url : ''
  return filename === undefined ? { url } : { filename, url }
}

function parseEmbed(raw: unknown): ExportEmbed {
  if (!isRecord(raw)) {
    return {}
  }
  const embed: {
    url?: string
    imageUrl?: string
    thumbnailUrl?: string
    videoUrl?: string
  } = {}
  const url = optionalString(raw.url)
  const imageUrl = nestedUrl(raw.image)
  const thumbnailUrl = nestedUrl(raw.thumbnail)
  const videoUrl = nestedUrl(raw.video)
  if (url !== undefined) embed.url = url
  if (imageUrl !== undefined) embed.imageUrl = imageUrl
  if (thumbnailUrl !== undefined) embed.thumbnailUrl = thumbnailUrl
  if (videoUrl !== undefined) embed.videoUrl = videoUrl
  return embed
}

/**
 * Reduce a raw API message object to an ExportMessage.
 * Only `id` is mandatory; everything else falls back to an empty value.
 */
export function parseApiMessage(raw: unknown): ExportMessage {
  if (!isRecord(raw) || typeof raw.id !== 'string' || raw.id === '') {
    throw new ResponseFormatError('Message payload is missing a string id')
  }

  const author = isRecord(raw.author) ? optionalString(raw.author.username) : undefined

  return {
    id: raw.id,
    author: author ?? 'Unknown',
    timestamp: typeof raw.timestamp === 'string' ? raw.timestamp : '',
    content: typeof raw.content === 'string' ? raw.content : '',
    attachments: Array.isArray(raw.attachments) ? raw.attachments.map(parseAttachment) : [],
    embeds: Array.isArray(raw.embeds) ? raw.embeds.map(parseEmbed) : [],
  }
}
