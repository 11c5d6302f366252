import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  SEPARATOR,
  formatExportTime,
  renderLinksExport,
  renderMessagesExport,
  saveLinks,
  saveMessages,
} from './writer.js'
import { FileWriteError, type ExportMessage } from '../types.js'

const EXPORTED_AT = new Date(2024, 0, 15, 9, 5, 3)

function msg(id: string, content: string): ExportMessage {
  return {
    id,
    author: 'alice',
    timestamp: `2024-01-15T10:0${id}:00+00:00`,
    content,
    attachments: [],
    embeds: [],
  }
}

describe('formatExportTime', () => {
  it('pads local date and time fields', () => {
    expect(formatExportTime(EXPORTED_AT)).toBe('2024-01-15 09:05:03')
  })
})

describe('renderMessagesExport', () => {
  it('writes only the header for an empty list', () => {
    expect(renderMessagesExport([], EXPORTED_AT)).toBe(
      'Discord Messages Export\n' +
      'Total messages: 0\n' +
      'Exported on: 2024-01-15 09:05:03\n' +
      `${SEPARATOR}\n` +
      '\n',
    )
  })

  it('writes blocks oldest-first from newest-first input', () => {
    const text = renderMessagesExport([msg('3', 'third'), msg('2', 'second'), msg('1', 'first')], EXPORTED_AT)
    const lines = text.split('\n')

    expect(lines.slice(0, 5)).toEqual([
      'Discord Messages Export',
      'Total messages: 3',
      'Exported on: 2024-01-15 09:05:03',
      '='.repeat(80),
      '',
    ])
    expect(lines.slice(5)).toEqual([
      '[2024-01-15 10:01:00 UTC] alice: first',
      '',
      '[2024-01-15 10:02:00 UTC] alice: second',
      '',
      '[2024-01-15 10:03:00 UTC] alice: third',
      '',
      '',
    ])
  })

  it('separates multi-line blocks with one blank line', () => {
    const withAttachment: ExportMessage = {
      ...msg('1', 'pic'),
      attachments: [{ filename: 'cat.png', url: 'https://cdn.example/cat.png' }],
    }
    const text = renderMessagesExport([msg('2', 'after'), withAttachment], EXPORTED_AT)
    const body = text.split(`${SEPARATOR}\n\n`)[1]

    expect(body).toBe(
      '[2024-01-15 10:01:00 UTC] alice: pic\n' +
      '  Attachments:\n' +
      '    - cat.png: https://cdn.example/cat.png\n' +
      '\n' +
      '[2024-01-15 10:02:00 UTC] alice: after\n' +
      '\n',
    )
  })
})

describe('renderLinksExport', () => {
  it('lists one link per line after the header', () => {
    expect(renderLinksExport(['https://a.example', 'https://b.example'], EXPORTED_AT)).toBe(
      'Extracted Links\n' +
      'Total links: 2\n' +
      'Exported on: 2024-01-15 09:05:03\n' +
      `${SEPARATOR}\n` +
      '\n' +
      'https://a.example\n' +
      'https://b.example\n',
    )
  })
})

describe('saveMessages / saveLinks', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'channel-export-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes the rendered messages export', async () => {
    const path = join(dir, 'messages.txt')
    const messages = [msg('2', 'b'), msg('1', 'a')]

    await saveMessages(messages, path, EXPORTED_AT)

    expect(await readFile(path, 'utf-8')).toBe(renderMessagesExport(messages, EXPORTED_AT))
  })

  it('writes the rendered links export', async () => {
    const path = join(dir, 'links.txt')

    await saveLinks(['https://a.example'], path, EXPORTED_AT)

    expect(await readFile(path, 'utf-8')).toBe(renderLinksExport(['https://a.example'], EXPORTED_AT))
  })

  it('raises FileWriteError when the target cannot be written', async () => {
    const path = join(dir, 'missing', 'messages.txt')

    const error = await saveMessages([msg('1', 'a')], path, EXPORTED_AT).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(FileWriteError)
    expect(error).toHaveProperty('path', path)
  })
})
