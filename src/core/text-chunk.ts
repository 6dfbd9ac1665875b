/**
 * Splits text into chunks not exceeding `maxLen`.
 * Whole lines are packed together and keep their line breaks; a line that
 * is too long on its own is broken on spaces, and a single word longer
 * than `maxLen` is hard-split.
 */
export function chunkText(text: string, maxLen: number): string[] {
  if (maxLen <= 0) throw new Error('maxLen must be greater than zero')
  const trimmed = text.trim()
  if (trimmed.length <= maxLen) return [trimmed]

  const chunks: string[] = []
  let current = ''

  for (const line of trimmed.split(/\r?\n/).map((l) => l.trimEnd())) {
    if (line.length > maxLen) {
      if (current) chunks.push(current)
      const pieces = chunkWords(line, maxLen)
      current = pieces.pop() ?? ''
      chunks.push(...pieces)
      continue
    }

    const candidate = current ? `${current}\n${line}` : line
    if (candidate.length <= maxLen) {
      current = candidate
    } else {
      chunks.push(current)
      current = line
    }
  }

  if (current) chunks.push(current)
  return chunks
}

function chunkWords(line: string, maxLen: number): string[] {
  const chunks: string[] = []
  let current = ''

  for (const word of line.trim().split(/\s+/)) {
    if (word.length > maxLen) {
      if (current) chunks.push(current)
      current = ''
      for (let i = 0; i < word.length; i += maxLen) {
        const piece = word.slice(i, i + maxLen)
        if (piece.length === maxLen) chunks.push(piece)
        else current = piece
      }
      continue
    }

    const candidate = current ? `${current} ${word}` : word
    if (candidate.length <= maxLen) {
      current = candidate
    } else {
      chunks.push(current)
      current = word
    }
  }

  if (current) chunks.push(current)
  return chunks
}

/** Cuts text to `maxLen` characters, marking the cut with `...`. */
export function truncateText(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text
  if (maxLen <= 3) return text.slice(0, maxLen)
  return `${text.slice(0, maxLen - 3)}...`
}
