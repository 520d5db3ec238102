import type {Message} from '../providers/types.js'
import {estimateTokens} from './token-estimator.js'

export type HistoryLimits = {
  /** 0 = unlimited */
  maxMessages: number
  /** 0 = unlimited */
  maxTokens: number
}

export const UNLIMITED_HISTORY: HistoryLimits = {maxMessages: 0, maxTokens: 0}

/** A provider's oldest turns replaced by one summary. */
export type CompactedPrefix = {
  summary: string
  /** Number of the provider's turns, oldest first, that the summary replaces. */
  compactedCount: number
}

/**
 * Conversation turns that belong to `provider`. System messages are replayed
 * separately and never count as turns; an untagged message matches no provider.
 */
export function filterByProvider(conversation: Message[], provider: string): Message[] {
  return conversation.filter((message) => message.role !== 'system' && message.provider === provider)
}

function messagePruneIndex(messages: Message[], maxMessages: number): number {
  if (maxMessages <= 0 || messages.length <= maxMessages) return 0
  return messages.length - maxMessages
}

function tokenPruneIndex(messages: Message[], maxTokens: number): number {
  if (maxTokens <= 0) return 0
  let total = 0
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    const tokens = estimateTokens(messages[i]?.content ?? '')
    if (total + tokens > maxTokens) return i + 1
    total += tokens
  }
  return 0
}

/** Longest suffix of `messages` that satisfies both limits. */
export function windowHistory(messages: Message[], limits: HistoryLimits): Message[] {
  const pruneIndex = Math.max(
    messagePruneIndex(messages, limits.maxMessages),
    tokenPruneIndex(messages, limits.maxTokens)
  )
  return pruneIndex > 0 ? messages.slice(pruneIndex) : [...messages]
}

export function buildHistory(
  conversation: Message[],
  activeProvider: string,
  newUserText: string,
  limits: HistoryLimits = UNLIMITED_HISTORY,
  compacted?: CompactedPrefix
): Message[] {
  const turns = filterByProvider(conversation, activeProvider).slice(compacted?.compactedCount ?? 0)
  const summary: Message[] = compacted ? [{role: 'system', content: compacted.summary}] : []
  return [...summary, ...windowHistory(turns, limits), {role: 'user', content: newUserText}]
}
