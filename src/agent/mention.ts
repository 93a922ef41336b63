/**
 * Mention detection
 *
 * A message addresses the bot when it contains the bot's handle anywhere,
 * case-insensitively. There is no word-boundary check, so "@relaybotx"
 * also counts as a mention of "@relaybot".
 *
 * The prompt is the message with every occurrence of the handle removed.
 * A bare salutation in front of the first mention is dropped
 * ("hey @bot do X" -> "do X") unless it is all there is ("hey @bot" -> "hey").
 */

export type MentionResult =
  | { kind: 'not_addressed' }
  | { kind: 'empty_prompt' }
  | { kind: 'prompt'; prompt: string }

const SALUTATION = /^(?:hey|hi|hello|yo|ok|okay)[\s,.!:;]*$/i

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export function detectMention(text: string | undefined, mentionHandle: string): MentionResult {
  const body = text ?? ''
  const first = mentionHandle ? new RegExp(escapeRegExp(mentionHandle), 'i').exec(body) : null

  if (!first) {
    return { kind: 'not_addressed' }
  }

  const pattern = new RegExp(escapeRegExp(mentionHandle), 'gi')
  const strip = (part: string) => part.replace(pattern, '').trim()

  const before = strip(body.slice(0, first.index))
  const after = strip(body.slice(first.index + first[0].length))
  const lead = SALUTATION.test(before) ? '' : before
  const prompt = [lead, after].filter(Boolean).join(' ') || before
  return prompt ? { kind: 'prompt', prompt } : { kind: 'empty_prompt' }
}
