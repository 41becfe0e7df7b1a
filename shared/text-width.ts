import stringWidth from 'string-width'

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

export function cellWidth(text: string): number {
  return stringWidth(text)
}

/**
 * Keeps the longest leading run of graphemes that fits in `maxCells` terminal
 * cells. A wide grapheme that would straddle the limit is dropped whole.
 */
export function truncateRight(text: string, maxCells: number): string {
  if (maxCells <= 0) return ''
  if (cellWidth(text) <= maxCells) return text

  let used = 0
  let out = ''
  for (const { segment } of segmenter.segment(text)) {
    const width = stringWidth(segment)
    if (used + width > maxCells) break
    used += width
    out += segment
  }
  return out
}
