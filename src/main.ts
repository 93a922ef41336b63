/**
 * Mention relay - Discord group-chat bot
 * Main entry point
 */

// Must stay first: later modules read process.env while loading
import 'dotenv/config'
import { ConversationHandler } from './agent/handler.js'
import { BotIdentityResolver } from './agent/identity.js'
import { loadConfig } from './config/env.js'
import { DiscordConnector } from './discord/connector.js'
import { HistoryStore } from './history/store.js'
import { ChatCompletionsClient } from './llm/providers/chat-completions.js'
import { logger } from './utils/logger.js'

async function main() {
  try {
    logger.info('Starting mention relay')

    const config = loadConfig()
    logger.info({
      model: config.completion.model,
      baseUrl: config.completion.baseUrl,
      maxSnippetLen: config.maxSnippetLen,
      historyCapacity: config.historyCapacity,
    }, 'Configuration loaded')

    const connector = new DiscordConnector({
      token: config.discordToken,
      maxBackoffMs: 32000,
    })
    const identity = new BotIdentityResolver(() => connector.getIdentity())
    const handler = new ConversationHandler({
      identity,
      history: new HistoryStore(config.historyCapacity),
      completions: new ChatCompletionsClient(config.completion),
      transport: connector,
      maxSnippetLen: config.maxSnippetLen,
    })

    await connector.start(async message => {
      const outcome = await handler.handle(message)
      if (outcome !== 'ignored') {
        logger.info({ conversationId: message.conversationId, messageId: message.id, outcome }, 'Handled message')
      }
    })

    // Resolve before serving so the first mention doesn't pay for the lookup
    const bot = await identity.resolve()
    logger.info({ botId: bot.id, mentionHandle: bot.mentionHandle, displayName: bot.displayName }, 'Bot identity established')

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down')
      connector.close()
        .catch((error: unknown) => logger.error({ err: error }, 'Error while closing Discord connector'))
        .finally(() => process.exit(0))
    }

    process.on('SIGINT', () => shutdown('SIGINT'))
    process.on('SIGTERM', () => shutdown('SIGTERM'))
  } catch (error) {
    logger.fatal({ err: error }, 'Fatal error')
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
