/**
 * Pure helpers for turning Discord messages into chat messages and back
 */

export const DISCORD_MESSAGE_LIMIT = 2000

export interface MentionTargets {
  users: ReadonlyMap<string, string>  // user id -> plain-text handle
  roles: ReadonlyMap<string, string>  // role id -> plain-text handle
}

/**
 * Rewrite `<@id>`, `<@!id>` and `<@&roleId>` into plain-text handles, so the
 * substring mention detector and the history lines see names, not ids.
 * Unknown ids are left as they are.
 */
export function normalizeMentions(content: string, targets: MentionTargets): string {
  return content
    .replace(/<@!?(\d+)>/g, (raw, id: string) => targets.users.get(id) ?? raw)
    .replace(/<@&(\d+)>/g, (raw, id: string) => targets.roles.get(id) ?? raw)
}

export interface ContentShape {
  attachmentTypes: (string | null)[]  // MIME types, null when Discord doesn't report one
  stickerCount: number
  embedCount: number
}

/**
 * Short tag for what a message carries besides text, used for
 * "[<kind> message]" placeholders
 */
export function contentKindOf(shape: ContentShape): string {
  const [first] = shape.attachmentTypes
  if (first !== undefined) {
    if (first?.startsWith('image/')) return 'photo'
    if (first?.startsWith('video/')) return 'video'
    if (first?.startsWith('audio/')) return 'audio'
    return 'document'
  }
  if (shape.stickerCount > 0) return 'sticker'
  if (shape.embedCount > 0) return 'embed'
  return 'text'
}

/**
 * Pack lines into chunks of at most `maxLength` code points, cutting lines
 * that are longer than that. Blank chunks are dropped; Discord rejects them.
 */
export function splitMessage(content: string, maxLength: number = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = []
  let current: string[] = []

  const flush = () => {
    const chunk = current.join('')
    if (chunk.trim()) {
      chunks.push(chunk)
    }
    current = []
  }

  for (const line of content.split('\n')) {
    let chars = Array.from(line)
    if (current.length > 0 && current.length + 1 + chars.length <= maxLength) {
      current.push('\n', ...chars)
      continue
    }

    flush()
    while (chars.length > maxLength) {
      current = chars.slice(0, maxLength)
      flush()
      chars = chars.slice(maxLength)
    }
    current = chars
  }
  flush()

  return chunks
}
