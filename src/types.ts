/**
 * Shared types and errors for the channel exporter
 */

// ============================================================================
// Message records
// ============================================================================

export interface ExportAttachment {
  readonly filename?: string
  readonly url: string
}

export interface ExportEmbed {
  readonly url?: string
  readonly imageUrl?: string
  readonly thumbnailUrl?: string
  readonly videoUrl?: string
}

/** A channel message reduced to the fields the exports need. */
export interface ExportMessage {
  /** Snowflake, only ever used as a pagination cursor */
  readonly id: string
  readonly author: string
  /** ISO-8601 as sent by the API */
  readonly timestamp: string
  readonly content: string
  readonly attachments: readonly ExportAttachment[]
  readonly embeds: readonly ExportEmbed[]
}

// ============================================================================
// Fetch limit
// ============================================================================

export type MessageLimit =
  | { readonly kind: 'bounded'; readonly count: number }
  | { readonly kind: 'unbounded' }

export const UNBOUNDED: MessageLimit = { kind: 'unbounded' }

export function boundedLimit(count: number): MessageLimit {
  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigError(`Message limit must be a positive integer, got ${count}`)
  }
  return { kind: 'bounded', count }
}

export function describeLimit(limit: MessageLimit): string {
  return limit.kind === 'unbounded' ? 'All available messages' : String(limit.count)
}

// ============================================================================
// Errors
// ============================================================================

export class ExportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'ExportError'
  }
}

/** 401: the token was rejected */
export class AuthenticationError extends ExportError {
  constructor() {
    super('Invalid Discord token')
    this.name = 'AuthenticationError'
  }
}

/** 403: the token has no access to the channel */
export class AuthorizationError extends ExportError {
  constructor(public readonly channelId: string) {
    super(`Access forbidden - no permission to read channel ${channelId}`)
    this.name = 'AuthorizationError'
  }
}

/** 404: unknown channel id */
export class NotFoundError extends ExportError {
  constructor(public readonly channelId: string) {
    super(`Channel ${channelId} not found`)
    this.name = 'NotFoundError'
  }
}

export class HttpError extends ExportError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP ${status}`)
    this.name = 'HttpError'
  }
}

export class NetworkError extends ExportError {
  constructor(message: string, cause: unknown) {
    super(message, cause)
    this.name = 'NetworkError'
  }
}

export class ResponseFormatError extends ExportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'ResponseFormatError'
  }
}

export class FileWriteError extends ExportError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write ${path}`, cause)
    this.name = 'FileWriteError'
  }
}

export class ConfigError extends ExportError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
