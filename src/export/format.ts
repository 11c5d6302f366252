/**
 * Message formatting for the text export
 */

import type { ExportMessage } from '../types.js'

// Date, optionally followed by a time and an offset
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/** Offset in minutes east of UTC, or null when malformed */
function parseOffset(offset: string | undefined): number | null {
  if (offset === undefined || offset === 'Z') return 0
  const match = offset.match(/^([+-])(\d{2}):?(\d{2})$/)
  if (!match) return null
  const hours = Number(match[2])
  const minutes = Number(match[3])
  if (hours > 23 || minutes > 59) return null
  const total = hours * 60 + minutes
  return match[1] === '-' ? -total : total
}

/**
 * Render an ISO-8601 timestamp as `YYYY-MM-DD HH:MM:SS UTC`.
 * Anything that does not parse comes back verbatim.
 */
export function formatTimestamp(timestamp: string): string {
  const match = timestamp.match(ISO_TIMESTAMP)
  if (!match) return timestamp

  const [, y, mo, d, h, mi, s, offset] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = h === undefined ? 0 : Number(h)
  const minute = mi === undefined ? 0 : Number(mi)
  const second = s === undefined ? 0 : Number(s)
  const offsetMinutes = parseOffset(offset)
  if (offsetMinutes === null) return timestamp

  // Date.UTC rolls over out-of-range fields, so check them against the result
  const local = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month - 1 ||
    local.getUTCDate() !== day ||
    local.getUTCHours() !== hour ||
    local.getUTCMinutes() !== minute ||
    local.getUTCSeconds() !== second
  ) {
    return timestamp
  }

  const utc = new Date(local.getTime() - offsetMinutes * 60_000)
  return (
    `${pad(utc.getUTCFullYear(), 4)}-${pad(utc.getUTCMonth() + 1)}-${pad(utc.getUTCDate())} ` +
    `${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())} UTC`
  )
}

/**
 * Render one message as a text block:
 *
 * ```
 * [2024-01-15 10:30:00 UTC] alice: hello
 *   Attachments:
 *     - cat.png: https://cdn.example/cat.png
 *   Embeds: 1 embed(s)
 * ```
 */
export function renderMessage(message: ExportMessage): string {
  const lines = [`[${formatTimestamp(message.timestamp)}] ${message.author}: ${message.content}`]

  if (message.attachments.length > 0) {
    lines.push('  Attachments:')
    for (const attachment of message.attachments) {
      lines.push(`    - ${attachment.filename ?? 'file'}: ${attachment.url}`)
    }
  }

  if (message.embeds.length > 0) {
    lines.push(`  Embeds: ${message.embeds.length} embed(s)`)
  }

  return lines.join('\n')
}
