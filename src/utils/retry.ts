/**
 * Retry for Discord API calls, exponential backoff with a cap.
 * Client errors other than rate limits fail at once: resending the same
 * payload can't succeed.
 */

import { logger } from './logger.js'

export interface DiscordRetryOptions {
  maxAttempts?: number
  initialDelayMs?: number
  maxDelayMs?: number
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

function httpStatusOf(error: unknown): number | undefined {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined
}

export function isRetryableDiscordError(error: unknown): boolean {
  const status = httpStatusOf(error)
  return status === undefined || status === 429 || status >= 500
}

export async function retryDiscord<T>(fn: () => Promise<T>, options: DiscordRetryOptions = {}): Promise<T> {
  const { maxAttempts = 5, initialDelayMs = 1000, maxDelayMs = 32000 } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryableDiscordError(error)) {
        throw toError(error)
      }

      const delayMs = Math.min(initialDelayMs * 2 ** (attempt - 1), maxDelayMs)
      logger.warn(
        { error: toError(error).message, status: httpStatusOf(error), attempt, maxAttempts, delayMs },
        'Retrying Discord call after error'
      )
      await new Promise(resolve => setTimeout(resolve, delayMs))
    }
  }
}
