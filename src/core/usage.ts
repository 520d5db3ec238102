import type {Usage} from '../providers/types.js'

/** Pairwise sum; a missing side contributes nothing and two missing sides stay missing. */
export function combineUsage(a: Usage | undefined, b: Usage | undefined): Usage | undefined {
  if (!a) return b
  if (!b) return a
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    cacheReadTokens: a.cacheReadTokens + b.cacheReadTokens,
    cacheCreationTokens: a.cacheCreationTokens + b.cacheCreationTokens
  }
}

export function formatTokenCount(count: number): string {
  if (count < 1000) return String(count)
  if (count < 1_000_000) {
    const k = count / 1000
    return k < 10 ? `${k.toFixed(1)}k` : `${k.toFixed(0)}k`
  }
  const m = count / 1_000_000
  return m < 10 ? `${m.toFixed(1)}M` : `${m.toFixed(0)}M`
}

export function formatUsage(usage: Usage | undefined): string {
  if (!usage || usage.totalTokens === 0) return ''
  const parts: string[] = []
  if (usage.inputTokens > 0) parts.push(`↑ ${formatTokenCount(usage.inputTokens)}`)
  if (usage.outputTokens > 0) parts.push(`↓ ${formatTokenCount(usage.outputTokens)}`)
  if (usage.cacheReadTokens > 0) parts.push(`cache: ${formatTokenCount(usage.cacheReadTokens)}`)
  return parts.join(' · ')
}
