/**
 * Structured logging with pino
 * Per-message child loggers are tracked through async context, so any
 * `logger` call made while handling a message carries its ids.
 */

import { pino, type Logger } from 'pino'
import { AsyncLocalStorage } from 'async_hooks'

const environment = process.env.NODE_ENV ?? 'development'
const isDevelopment = environment !== 'production' && environment !== 'test'

function defaultLevel(): string {
  if (environment === 'test') return 'silent'
  return isDevelopment ? 'debug' : 'info'
}

// Base logger for console output
const baseLogger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

interface MessageLogContext {
  logger: Logger
}

const messageContext = new AsyncLocalStorage<MessageLogContext>()

function routeToMessage(fallback: Logger, bindings?: Record<string, unknown>): Logger {
  return new Proxy(fallback, {
    get(target, prop) {
      const scoped = messageContext.getStore()?.logger
      const active = scoped ? (bindings ? scoped.child(bindings) : scoped) : target
      const value: unknown = Reflect.get(active, prop, active)
      return typeof value === 'function' ? value.bind(active) : value
    },
  })
}

/**
 * Main logger - routes to the current message's child logger when inside
 * withMessageLogging, otherwise to the base logger
 */
export const logger: Logger = routeToMessage(baseLogger)

/**
 * Run a function with message-scoped logging context
 */
export async function withMessageLogging<T>(
  conversationId: string | number,
  messageId: string,
  fn: () => Promise<T>
): Promise<T> {
  const child = baseLogger.child({ conversationId: String(conversationId), messageId })
  return messageContext.run({ logger: child }, fn)
}

/**
 * Create a component logger; inside withMessageLogging it also carries
 * the message's ids
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return routeToMessage(baseLogger.child(context), context)
}
