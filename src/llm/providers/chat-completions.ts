/**
 * Chat Completions Provider
 *
 * Speaks the OpenAI-compatible chat completions API (xAI by default).
 * One system turn carries the instruction, one user turn carries the
 * assembled context. Failures come back as CompletionResult values with
 * text that is safe to post into the chat.
 */

import { z } from 'zod'
import { renderUserContent } from '../../context/builder.js'
import type { CompletionRequest, CompletionResult } from '../../types.js'
import { createLogger } from '../../utils/logger.js'
import { truncateChars } from '../../utils/text.js'

const log = createLogger({ component: 'chat-completions' })

export const DEFAULT_BASE_URL = 'https://api.x.ai/v1'
export const DEFAULT_MODEL = 'grok-4'
export const DEFAULT_TIMEOUT_MS = 60_000

const MAX_ERROR_BODY_CHARS = 200

export interface ChatCompletionsProviderConfig {
  apiKey?: string
  baseUrl?: string
  model?: string
  timeoutMs?: number
  fetch?: typeof fetch
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
})

function errorName(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined
}

export class ChatCompletionsClient {
  private apiKey: string | undefined
  private baseUrl: string
  private model: string
  private timeoutMs: number
  private fetchImpl: typeof fetch

  constructor(config: ChatCompletionsProviderConfig = {}) {
    this.apiKey = config.apiKey?.trim() || undefined
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.model = config.model || DEFAULT_MODEL
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = config.fetch ?? fetch
  }

  /**
   * Send one request; never rejects and never retries
   */
  async complete(request: CompletionRequest): Promise<CompletionResult> {
    if (!this.apiKey) {
      log.warn('No completion API key configured, skipping call')
      return { ok: false, kind: 'MissingCredential', detail: 'API key missing' }
    }

    const body = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemInstruction },
        { role: 'user', content: renderUserContent(request) },
      ],
    }

    const startTime = Date.now()
    let raw: string

    try {
      log.debug({ model: this.model, baseUrl: this.baseUrl, blocks: request.contextBlocks.length }, 'Calling chat completions API')

      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      })

      raw = await response.text()

      if (!response.ok) {
        // Error bodies can echo the credential, so they go to the log only
        log.error({ status: response.status, errorText: truncateChars(raw, MAX_ERROR_BODY_CHARS), model: this.model }, 'Chat completions API returned error')
        const detail = [`HTTP ${response.status}`, response.statusText].filter(Boolean).join(' ')
        return { ok: false, kind: 'TransportFailure', detail }
      }
    } catch (error: unknown) {
      const name = errorName(error)
      const detail = name === 'TimeoutError' || name === 'AbortError'
        ? `request timed out after ${this.timeoutMs} ms`
        : error instanceof Error ? error.message : String(error)
      log.error({ err: error, durationMs: Date.now() - startTime }, 'Chat completions request failed')
      return { ok: false, kind: 'TransportFailure', detail }
    }

    return this.parseResponse(raw, Date.now() - startTime)
  }

  private parseResponse(raw: string, durationMs: number): CompletionResult {
    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch {
      log.error({ durationMs, bodyLength: raw.length }, 'Chat completions response was not JSON')
      return { ok: false, kind: 'MalformedResponse', detail: 'expected JSON' }
    }

    const parsed = ChatCompletionResponseSchema.safeParse(data)
    if (!parsed.success) {
      log.error({ durationMs, issues: parsed.error.issues }, 'Chat completions response did not match schema')
      return { ok: false, kind: 'MalformedResponse', detail: 'missing choices[0].message.content' }
    }

    const text = parsed.data.choices[0]?.message.content ?? ''
    log.debug({ durationMs, textLength: text.length }, 'Received chat completions response')
    return { ok: true, text }
  }
}

/**
 * Text to post for a result: the answer itself, or a bracketed placeholder
 */
export function displayResult(result: CompletionResult): string {
  if (result.ok) {
    return result.text
  }
  switch (result.kind) {
    case 'MissingCredential':
      return '<Completion API key missing>'
    case 'TransportFailure':
      return `<Completion API error: ${result.detail}>`
    case 'MalformedResponse':
      return `<Completion response malformed: ${result.detail}>`
  }
}
