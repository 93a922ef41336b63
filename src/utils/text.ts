/**
 * Length and slicing by Unicode code point, so a surrogate pair is never split
 */

export const ELLIPSIS = '…'

/**
 * Keep at most `max` code points; longer text keeps `max - 1` and ends in `…`
 */
export function truncateChars(text: string, max: number): string {
  const chars = Array.from(text)
  if (chars.length <= max) {
    return text
  }
  return chars.slice(0, Math.max(max - 1, 0)).join('') + ELLIPSIS
}
