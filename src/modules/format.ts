/** `5000` -> `5,000` */
export function formatAmount(amount: number): string {
  return amount.toLocaleString('en-US')
}

/**
 * Parses a whole number typed in chat. Returns `null` for anything else
 * (`1.5`, `10k`, empty text).
 */
export function parseWholeNumber(text: string): number | null {
  if (!/^-?\d+$/.test(text)) return null
  const value = Number(text)
  return Number.isSafeInteger(value) ? value : null
}

/** `@Alice` -> `alice` */
export function targetName(text: string): string {
  return text.replace(/^@+/, '').toLowerCase()
}

/** Strips a leading command prefix from a typed name: `!fish` -> `fish`. */
export function bareCommandName(text: string, prefix: string): string {
  const lower = text.toLowerCase()
  return prefix && lower.startsWith(prefix) ? lower.slice(prefix.length) : lower
}

/** Inclusive integer range. */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}
