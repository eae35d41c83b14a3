export const FENCE_MARKER = "```"

/**
 * Returns the text from the first marker through the end of the last one, or null when
 * the text holds fewer than two non-overlapping markers.
 */
export const extractFencedBlock = (text: string, marker: string = FENCE_MARKER): string | null => {
  if (!marker) return null
  const start = text.indexOf(marker)
  if (start === -1) return null
  const last = text.lastIndexOf(marker)
  if (last < start + marker.length) return null
  return text.slice(start, last + marker.length)
}
