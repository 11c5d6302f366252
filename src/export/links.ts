/**
 * Link extraction from message content, attachments and embeds
 */

import type { ExportMessage } from '../types.js'

/**
 * URLs in message content. `[$-_@.&+]` is a range from `$` to `_`, so path
 * and query characters match along with trailing commas; `#` does not.
 */
export const URL_PATTERN =
  /http[s]?:\/\/(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*\(\),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g

/** All URL matches in a piece of text, in order */
export function findUrls(text: string): string[] {
  return Array.from(text.matchAll(URL_PATTERN), match => match[0])
}

/**
 * Collect every link referenced by the messages, deduplicated.
 *
 * Messages are walked in the order given (fetch order, newest-first). Within a
 * message: content links, then attachment URLs, then each embed's url, image,
 * thumbnail and video. The first occurrence of a URL fixes its position.
 */
export function extractLinks(messages: readonly ExportMessage[]): string[] {
  const seen = new Set<string>()
  const links: string[] = []

  const add = (url: string | undefined) => {
    if (!url || seen.has(url)) return
    seen.add(url)
    links.push(url)
  }

  for (const message of messages) {
    for (const url of findUrls(message.content)) {
      add(url)
    }

    for (const attachment of message.attachments) {
      add(attachment.url)
    }

    for (const embed of message.embeds) {
      add(embed.url)
      add(embed.imageUrl)
      add(embed.thumbnailUrl)
      add(embed.videoUrl)
    }
  }

  return links
}
