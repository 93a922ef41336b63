/**
 * Conversation Handler
 * Runs one inbound message through history, mention gating, context
 * assembly and the completion call, then posts and records the answer
 */

import { assembleContext } from '../context/builder.js'
import { formatLine, formatMessage, type SnippetOptions } from '../context/snippet.js'
import type { HistoryStore } from '../history/store.js'
import { displayResult } from '../llm/providers/chat-completions.js'
import type { BotIdentity, ChatMessage, CompletionRequest, CompletionResult, ConversationId } from '../types.js'
import { logger, withMessageLogging } from '../utils/logger.js'
import type { BotIdentityResolver } from './identity.js'
import { detectMention } from './mention.js'

export const EMPTY_ANSWER_PLACEHOLDER = '<Completion returned an empty answer>'

/** Outbound side of the chat transport */
export interface ChatTransport {
  /**
   * Post text to a conversation, optionally as a reply.
   * Resolves to the text that was actually sent.
   */
  send(conversationId: ConversationId, text: string, replyToMessageId?: string): Promise<string>
  startTyping(conversationId: ConversationId): Promise<void>
}

export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<CompletionResult>
}

export interface ConversationHandlerOptions {
  identity: BotIdentityResolver
  history: HistoryStore
  completions: CompletionProvider
  transport: ChatTransport
  maxSnippetLen: number
}

export type HandleOutcome = 'ignored' | 'usage_hint' | 'answered' | 'send_failed'

export function usageHint(identity: BotIdentity): string {
  return `Add a prompt after mentioning me, e.g. ${identity.mentionHandle} what's up?`
}

export class ConversationHandler {
  constructor(private options: ConversationHandlerOptions) {}

  async handle(message: ChatMessage): Promise<HandleOutcome> {
    return withMessageLogging(message.conversationId, message.id, () => this.process(message))
  }

  private async process(message: ChatMessage): Promise<HandleOutcome> {
    const { history, completions, transport } = this.options
    const identity = await this.options.identity.resolve()
    const snippet: SnippetOptions = {
      maxLen: this.options.maxSnippetLen,
      botDisplayName: identity.displayName,
    }
    const conversationId = message.conversationId

    // Context is what came before this message; the message itself becomes the prompt block
    const priorHistory = history.snapshot(conversationId)

    const isBotAuthored = message.author.id === identity.id
    history.append(conversationId, formatMessage(message, isBotAuthored, snippet))

    const mention = detectMention(message.text, identity.mentionHandle)
    if (mention.kind === 'not_addressed') {
      return 'ignored'
    }

    if (mention.kind === 'empty_prompt') {
      logger.debug('Mentioned without a prompt, sending usage hint')
      const sent = await this.trySend(conversationId, usageHint(identity), message.id)
      return sent === undefined ? 'send_failed' : 'usage_hint'
    }

    const replyLine = message.replyTo
      ? formatMessage(message.replyTo, message.replyTo.author.id === identity.id, snippet)
      : undefined

    try {
      await transport.startTyping(conversationId)
    } catch (error) {
      logger.warn({ err: error }, 'Failed to show typing indicator')
    }

    const request = assembleContext(priorHistory, replyLine, mention.prompt)
    logger.info({ promptLength: mention.prompt.length, blocks: request.contextBlocks.length, hasReply: !!replyLine }, 'Requesting completion')

    const result = await completions.complete(request)
    if (!result.ok) {
      logger.warn({ kind: result.kind, detail: result.detail }, 'Completion failed, replying with placeholder')
    }

    const answer = displayResult(result)
    // Discord rejects blank content
    const sent = await this.trySend(conversationId, answer.trim() ? answer : EMPTY_ANSWER_PLACEHOLDER, message.id)
    if (sent === undefined) {
      return 'send_failed'
    }

    history.append(conversationId, formatLine({ id: identity.id }, sent, true, snippet))
    return 'answered'
  }

  private async trySend(conversationId: ConversationId, text: string, replyTo: string): Promise<string | undefined> {
    try {
      return await this.options.transport.send(conversationId, text, replyTo)
    } catch (error) {
      logger.error({ err: error }, 'Failed to send reply')
      return undefined
    }
  }
}
