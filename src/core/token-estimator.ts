const TOKENS_PER_WORD = 1.3

/** Vendor-agnostic estimate: whitespace-separated words × 1.3, rounded. */
export function estimateTokens(text: string): number {
  if (!text) return 0
  const words = text.split(/\s+/u).filter((word) => word.length > 0)
  return Math.round(words.length * TOKENS_PER_WORD)
}
