/**
 * History Store
 *
 * Rolling, in-memory window of recent lines per conversation.
 * Nothing is persisted; a restart starts every channel empty.
 */

import type { ConversationId, HistoryLine } from '../types.js'
import { logger } from '../utils/logger.js'

export const DEFAULT_HISTORY_CAPACITY = 30

export class HistoryStore {
  // Grows by one entry per distinct conversation; whole conversations are never evicted
  private buffers = new Map<string, HistoryLine[]>()

  constructor(private readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`)
    }
  }

  /**
   * Append a line, evicting the oldest one when the buffer is full
   */
  append(conversationId: ConversationId, line: HistoryLine): void {
    const buffer = this.getOrCreate(conversationId)
    if (buffer.length >= this.capacity) {
      buffer.shift()
    }
    buffer.push(line)
  }

  /**
   * Frozen copy of the buffer at call time, oldest first
   */
  snapshot(conversationId: ConversationId): readonly HistoryLine[] {
    const buffer = this.buffers.get(String(conversationId))
    return Object.freeze(buffer ? [...buffer] : [])
  }

  size(conversationId: ConversationId): number {
    return this.buffers.get(String(conversationId))?.length ?? 0
  }

  conversationCount(): number {
    return this.buffers.size
  }

  private getOrCreate(conversationId: ConversationId): HistoryLine[] {
    const key = String(conversationId)
    let buffer = this.buffers.get(key)
    if (!buffer) {
      buffer = []
      this.buffers.set(key, buffer)
      logger.debug({ conversationId: key, capacity: this.capacity }, 'Created history buffer')
    }
    return buffer
  }
}
