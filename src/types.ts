/**
 * Shared types for the relay
 */

// ============================================================================
// Chat Types
// ============================================================================

/** Stable identifier of a group conversation (Discord channel id) */
export type ConversationId = string | number

export interface ChatUser {
  id: string
  givenName?: string
  familyName?: string
  handle?: string  // Public handle without the leading @
}

/**
 * Transport-neutral inbound message.
 * `replyTo` is resolved one level deep only.
 */
export interface ChatMessage {
  id: string
  conversationId: ConversationId
  author: ChatUser
  text?: string
  caption?: string
  contentKind: string  // 'text', 'photo', 'sticker', ...
  replyTo?: Omit<ChatMessage, 'replyTo'>
}

/** One rendered line of channel history */
export interface HistoryLine {
  readonly isBotAuthored: boolean
  readonly text: string
}

export interface BotIdentity {
  mentionHandle: string  // Lowercased, @-prefixed
  displayName: string
  id: string
}

// ============================================================================
// Completion Types
// ============================================================================

export interface CompletionRequest {
  systemInstruction: string
  contextBlocks: string[]
}

export type CompletionErrorKind = 'MissingCredential' | 'TransportFailure' | 'MalformedResponse'

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; kind: CompletionErrorKind; detail: string }

// ============================================================================
// Error Types
// ============================================================================

export class RelayError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'RelayError'
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'ConfigError'
  }
}

export class DiscordError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'DiscordError'
  }
}
