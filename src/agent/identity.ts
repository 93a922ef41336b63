/**
 * Bot identity, looked up once and shared for the life of the process
 */

import type { BotIdentity } from '../types.js'
import { logger } from '../utils/logger.js'

export interface RawIdentity {
  id: string
  username: string
  displayName?: string | null
}

export function toBotIdentity(raw: RawIdentity): BotIdentity {
  return {
    mentionHandle: `@${raw.username.toLowerCase()}`,
    displayName: raw.displayName || 'Bot',
    id: raw.id,
  }
}

export class BotIdentityResolver {
  private pending?: Promise<BotIdentity>

  constructor(private fetchIdentity: () => Promise<RawIdentity>) {}

  /**
   * Concurrent first callers share one lookup. A failed lookup is not
   * cached, so the next call tries again.
   */
  resolve(): Promise<BotIdentity> {
    if (!this.pending) {
      this.pending = this.fetchIdentity().then(
        raw => {
          const identity = Object.freeze(toBotIdentity(raw))
          logger.debug({ botId: identity.id, mentionHandle: identity.mentionHandle }, 'Bot identity resolved')
          return identity
        },
        (error: unknown) => {
          this.pending = undefined
          throw error
        }
      )
    }
    return this.pending
  }
}
