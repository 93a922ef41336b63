/**
 * Context Builder
 * Turns channel history, an optional replied-to line and the user's prompt
 * into a completion request
 */

import type { CompletionRequest, HistoryLine } from '../types.js'

export const SYSTEM_INSTRUCTION =
  'You are an assistant integrated into a group chat. ' +
  'Respond concisely and helpfully using the context.'

export const BLOCK_SEPARATOR = '\n\n'

export function assembleContext(
  history: readonly HistoryLine[],
  replyLine: HistoryLine | undefined,
  prompt: string
): CompletionRequest {
  const historyTexts = history.map(line => line.text)
  const contextBlocks: string[] = []

  if (historyTexts.length > 0) {
    contextBlocks.push('Chat history:\n' + historyTexts.join('\n'))
  }

  // Usually the replied-to message is still in the window; don't repeat it
  if (replyLine && !historyTexts.includes(replyLine.text)) {
    contextBlocks.push('Replied message:\n' + replyLine.text)
  }

  contextBlocks.push('User prompt:\n' + prompt)

  return {
    systemInstruction: SYSTEM_INSTRUCTION,
    contextBlocks,
  }
}

/**
 * Content of the single user turn sent to the model
 */
export function renderUserContent(request: CompletionRequest): string {
  return request.contextBlocks.join(BLOCK_SEPARATOR)
}
