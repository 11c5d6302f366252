/**
 * Text file exports
 *
 * Both files open with the same four-line header (title, total, export time,
 * separator) and a blank line.
 */

import { writeFile } from 'fs/promises'
import { FileWriteError } from '../types.js'
import type { ExportMessage } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { renderMessage } from './format.js'

const logger = createLogger({ module: 'writer' })

export const SEPARATOR = '='.repeat(80)

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS` */
export function formatExportTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

function header(title: string, total: string, exportedAt: Date): string {
  return `${title}\n${total}\nExported on: ${formatExportTime(exportedAt)}\n${SEPARATOR}\n\n`
}

/**
 * Messages export body. `messages` is in fetch order (newest-first) and is
 * written oldest-first.
 */
export function renderMessagesExport(messages: readonly ExportMessage[], exportedAt: Date): string {
  let text = header('Discord Messages Export', `Total messages: ${messages.length}`, exportedAt)
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i]
    if (message) {
      text += renderMessage(message) + '\n\n'
    }
  }
  return text
}

export function renderLinksExport(links: readonly string[], exportedAt: Date): string {
  let text = header('Extracted Links', `Total links: ${links.length}`, exportedAt)
  for (const link of links) {
    text += link + '\n'
  }
  return text
}

async function writeExport(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8')
  } catch (error) {
    logger.error({ error, path }, 'Failed to write export file')
    throw new FileWriteError(path, error)
  }
}

export async function saveMessages(
  messages: readonly ExportMessage[],
  path: string,
  exportedAt: Date = new Date(),
): Promise<void> {
  await writeExport(path, renderMessagesExport(messages, exportedAt))
  logger.info({ count: messages.length, path }, 'Saved messages')
}

export async function saveLinks(
  links: readonly string[],
  path: string,
  exportedAt: Date = new Date(),
): Promise<void> {
  await writeExport(path, renderLinksExport(links, exportedAt))
  logger.info({ count: links.length, path }, 'Saved links')
}
