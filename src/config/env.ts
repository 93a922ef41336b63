/**
 * Process configuration, read once from the environment at startup
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { DEFAULT_MAX_SNIPPET_LEN } from '../context/snippet.js'
import { DEFAULT_HISTORY_CAPACITY } from '../history/store.js'
import { DEFAULT_BASE_URL, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from '../llm/providers/chat-completions.js'
import { ConfigError } from '../types.js'

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback))

const EnvSchema = z.object({
  DISCORD_TOKEN: z.preprocess(blankToUndefined, z.string().trim().optional()),
  DISCORD_TOKEN_FILE: z.preprocess(blankToUndefined, z.string().optional()),
  COMPLETION_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  XAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  COMPLETION_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  COMPLETION_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_MODEL)),
  COMPLETION_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUT_MS),
  MAX_SNIPPET_LEN: positiveInt(DEFAULT_MAX_SNIPPET_LEN),
  MESSAGE_LIMIT: positiveInt(DEFAULT_HISTORY_CAPACITY),
})

export interface RelayConfig {
  discordToken: string
  completion: {
    apiKey: string
    baseUrl: string
    model: string
    timeoutMs: number
  }
  maxSnippetLen: number
  historyCapacity: number
}

function readTokenFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8').trim()
  } catch (error) {
    throw new ConfigError(`Could not read token file: ${path}`, error)
  }
}

/**
 * Validate the environment. Missing credentials are fatal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${problems}`, parsed.error)
  }
  const vars = parsed.data

  let discordToken = vars.DISCORD_TOKEN
  if (!discordToken && vars.DISCORD_TOKEN_FILE) {
    discordToken = readTokenFile(vars.DISCORD_TOKEN_FILE)
  }
  if (!discordToken) {
    throw new ConfigError('DISCORD_TOKEN missing (set it, or point DISCORD_TOKEN_FILE at a token file)')
  }

  const apiKey = vars.COMPLETION_API_KEY ?? vars.XAI_API_KEY
  if (!apiKey) {
    throw new ConfigError('COMPLETION_API_KEY missing (XAI_API_KEY is also accepted)')
  }

  return {
    discordToken,
    completion: {
      apiKey,
      baseUrl: vars.COMPLETION_BASE_URL,
      model: vars.COMPLETION_MODEL,
      timeoutMs: vars.COMPLETION_TIMEOUT_MS,
    },
    maxSnippetLen: vars.MAX_SNIPPET_LEN,
    historyCapacity: vars.MESSAGE_LIMIT,
  }
}
