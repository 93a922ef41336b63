/**
 * Snippet formatting
 * Renders a chat message as one bounded line tagged with its author
 */

import type { ChatMessage, ChatUser, HistoryLine } from '../types.js'
import { ELLIPSIS, truncateChars } from '../utils/text.js'

export const DEFAULT_MAX_SNIPPET_LEN = 160
export const TRUNCATION_MARKER = ELLIPSIS

export interface SnippetOptions {
  maxLen: number
  botDisplayName: string
}

/**
 * Text used for a message: body, then caption, then a content-kind placeholder.
 * Attachments are never fetched.
 */
export function snippetSource(message: Pick<ChatMessage, 'text' | 'caption' | 'contentKind'>): string {
  return message.text || message.caption || `[${message.contentKind} message]`
}

/**
 * "Alice Jones (@alice)", or just the name without a public handle
 */
export function formatUser(user: ChatUser): string {
  const name = [user.givenName, user.familyName].filter(Boolean).join(' ')
  return user.handle ? `${name} (@${user.handle})` : name
}

export function formatLine(
  author: ChatUser,
  rawText: string,
  isBotAuthored: boolean,
  options: SnippetOptions
): HistoryLine {
  const { maxLen, botDisplayName } = options

  // maxLen counts code points
  const text = truncateChars(rawText.replace(/\r\n|\r|\n/g, ' '), maxLen)

  const label = isBotAuthored ? `${botDisplayName} (you)` : formatUser(author)
  return Object.freeze({ isBotAuthored, text: `> ${label}: ${text}` })
}

export function formatMessage(
  message: Omit<ChatMessage, 'replyTo'>,
  isBotAuthored: boolean,
  options: SnippetOptions
): HistoryLine {
  return formatLine(message.author, snippetSource(message), isBotAuthored, options)
}
