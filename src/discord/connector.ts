/**
 * Discord Connector
 * Handles all Discord API interactions
 */

import { Client, Events, GatewayIntentBits, type ClientUser, type Message } from 'discord.js'
import type { ChatTransport } from '../agent/handler.js'
import type { RawIdentity } from '../agent/identity.js'
import { DiscordError, type ChatMessage, type ConversationId } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { retryDiscord } from '../utils/retry.js'
import { contentKindOf, normalizeMentions, splitMessage, type MentionTargets } from './convert.js'

const log = createLogger({ component: 'discord' })

const TYPING_REFRESH_MS = 8000

export interface ConnectorOptions {
  token: string
  maxBackoffMs: number
}

export type MessageListener = (message: ChatMessage) => Promise<unknown>

export class DiscordConnector implements ChatTransport {
  private client: Client
  private typingIntervals = new Map<string, NodeJS.Timeout>()
  private ready: Promise<ClientUser>
  private listener?: MessageListener

  constructor(private options: ConnectorOptions) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    })

    this.ready = new Promise(resolve => {
      this.client.once(Events.ClientReady, readyClient => {
        log.info({ user: readyClient.user.tag }, 'Discord client ready')
        resolve(readyClient.user)
      })
    })

    this.setupEventHandlers()
  }

  /**
   * Start the Discord client and deliver guild messages to `listener`
   */
  async start(listener: MessageListener): Promise<void> {
    this.listener = listener
    try {
      await this.client.login(this.options.token)
      log.info('Discord connector started')
    } catch (error) {
      log.error({ err: error }, 'Failed to start Discord connector')
      throw new DiscordError('Failed to connect to Discord', error)
    }
  }

  /**
   * Bot's own account, available once the gateway reports ready
   */
  async getIdentity(): Promise<RawIdentity> {
    const user = await this.ready
    return {
      id: user.id,
      username: user.username,
      displayName: user.globalName ?? user.username,
    }
  }

  async startTyping(conversationId: ConversationId): Promise<void> {
    const channelId = String(conversationId)
    const channel = await this.client.channels.fetch(channelId)
    if (!channel || !channel.isSendable()) {
      return
    }

    await channel.sendTyping()

    this.stopTyping(channelId)
    const interval = setInterval(() => {
      channel.sendTyping().catch((error: unknown) => {
        log.warn({ err: error, channelId }, 'Failed to refresh typing')
      })
    }, TYPING_REFRESH_MS)
    this.typingIntervals.set(channelId, interval)
  }

  stopTyping(conversationId: ConversationId): void {
    const channelId = String(conversationId)
    const interval = this.typingIntervals.get(channelId)
    if (interval) {
      clearInterval(interval)
      this.typingIntervals.delete(channelId)
    }
  }

  /**
   * Send text, split at Discord's length limit; only the first chunk is a reply
   */
  async send(conversationId: ConversationId, text: string, replyToMessageId?: string): Promise<string> {
    const channelId = String(conversationId)
    this.stopTyping(channelId)

    const chunks = splitMessage(text)
    if (chunks.length === 0) {
      throw new DiscordError('Refusing to send a blank message')
    }
    for (let i = 0; i < chunks.length; i++) {
      const content = chunks[i] ?? ''
      const reply = i === 0 && replyToMessageId
        ? { messageReference: replyToMessageId, failIfNotExists: false }
        : undefined

      await retryDiscord(async () => {
        const channel = await this.client.channels.fetch(channelId)
        if (!channel || !channel.isSendable()) {
          throw new DiscordError(`Channel ${channelId} not found or not sendable`)
        }
        await channel.send({ content, reply })
      }, { maxDelayMs: this.options.maxBackoffMs })
    }

    log.debug({ channelId, chunks: chunks.length, replyTo: replyToMessageId }, 'Sent message')
    return text
  }

  async close(): Promise<void> {
    for (const interval of this.typingIntervals.values()) {
      clearInterval(interval)
    }
    this.typingIntervals.clear()
    await this.client.destroy()
    log.info('Discord connector closed')
  }

  private setupEventHandlers(): void {
    this.client.on(Events.MessageCreate, message => {
      // Group channels only; the bot's own sends are recorded by the handler
      if (!message.inGuild() || message.author.id === this.client.user?.id) {
        return
      }
      const listener = this.listener
      if (!listener) {
        return
      }

      log.debug(
        {
          messageId: message.id,
          channelId: message.channelId,
          author: message.author.username,
          content: message.content.substring(0, 50),
        },
        'Received messageCreate event'
      )

      this.toChatMessage(message)
        .then(listener)
        .catch((error: unknown) => {
          log.error({ err: error, messageId: message.id, channelId: message.channelId }, 'Message handling failed')
        })
    })

    this.client.on(Events.Error, error => {
      log.error({ err: error }, 'Discord client error')
    })
  }

  private async toChatMessage(message: Message): Promise<ChatMessage> {
    const converted = this.convertMessage(message)
    if (!message.reference?.messageId) {
      return converted
    }

    try {
      const referenced = await message.fetchReference()
      return { ...converted, replyTo: this.convertMessage(referenced) }
    } catch (error) {
      log.debug({ err: error, messageId: message.id }, 'Reply target could not be fetched')
      return converted
    }
  }

  /**
   * Handles for the users and roles a message mentions. The bot itself and
   * its managed role both map to the bot's mention handle.
   */
  private mentionTargets(msg: Message): MentionTargets {
    const users = new Map<string, string>(msg.mentions.users.map(user => [user.id, `@${user.username}`] as const))
    const roles = new Map<string, string>(msg.mentions.roles.map(role => [role.id, `@${role.name}`] as const))

    const botUser = this.client.user
    if (botUser) {
      const botHandle = `@${botUser.username.toLowerCase()}`
      users.set(botUser.id, botHandle)
      const botRole = msg.guild?.members.me?.roles.botRole
      if (botRole) {
        roles.set(botRole.id, botHandle)
      }
    }
    return { users, roles }
  }

  /**
   * Convert a discord.js Message into a ChatMessage (without its reply target)
   */
  convertMessage(msg: Message): Omit<ChatMessage, 'replyTo'> {
    const content = normalizeMentions(msg.content, this.mentionTargets(msg))

    return {
      id: msg.id,
      conversationId: msg.channelId,
      author: {
        id: msg.author.id,
        givenName: msg.member?.displayName ?? msg.author.displayName,
        handle: msg.author.username,
      },
      text: content || undefined,
      contentKind: contentKindOf({
        attachmentTypes: msg.attachments.map(attachment => attachment.contentType),
        stickerCount: msg.stickers.size,
        embedCount: msg.embeds.length,
      }),
    }
  }
}
