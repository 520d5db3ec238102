import {randomUUID} from 'node:crypto'
import type {Message, ProviderClient} from '../providers/types.js'
import {estimateTokens} from './token-estimator.js'

export type CompactionConfig = {
  enabled: boolean
  /** Fraction of `maxMessages` at which older turns get folded into a summary. */
  triggerThreshold: number
  /** Fraction of the turns to fold once triggered. */
  compactRatio: number
  /** Newest turns that are never folded. */
  preserveRecent: number
  /** Ask the active provider for the summary; the plain-text digest is the fallback. */
  useModelSummary: boolean
}

export const DEFAULT_COMPACTION: CompactionConfig = {
  enabled: false,
  triggerThreshold: 0.75,
  compactRatio: 0.4,
  preserveRecent: 10,
  useModelSummary: true
}

export type CompactionPlan = {
  total: number
  toCompact: Message[]
  toKeep: Message[]
  reason: string
}

export type CompactionSummary = {
  id: string
  content: string
  /** Number of turns folded into `content`. */
  messageCount: number
  tokenCount: number
  usedModel: boolean
  /** Why the model summary was not used, when one was requested. */
  fallbackReason?: string
}

export type CompactOptions = {
  client?: ProviderClient
  useModelSummary?: boolean
  signal?: AbortSignal
}

export const SUMMARY_HEADER = 'SUMMARY OF EARLIER CONVERSATION'

const DIGEST_LINE_LIMIT = 200

/**
 * Oldest turns to fold into a summary, or `undefined` while the history is
 * comfortably below `maxMessages`. Unlimited history (0) is never compacted.
 */
export function planCompaction(
  messages: Message[],
  maxMessages: number,
  config: CompactionConfig
): CompactionPlan | undefined {
  if (!config.enabled || maxMessages <= 0 || messages.length === 0) return undefined

  const trigger = maxMessages * config.triggerThreshold
  if (messages.length < trigger) return undefined

  const count = Math.min(Math.floor(messages.length * config.compactRatio), messages.length - config.preserveRecent)
  if (count <= 0) return undefined

  return {
    total: messages.length,
    toCompact: messages.slice(0, count),
    toKeep: messages.slice(count),
    reason: `${messages.length} messages reached ${Math.round(config.triggerThreshold * 100)}% of the ${maxMessages}-message limit`
  }
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > max ? `${flat.slice(0, max)}...` : flat
}

/** Digest built without a model call: one truncated line per turn. */
export function simpleSummary(messages: Message[]): string {
  return [
    `${SUMMARY_HEADER}:`,
    '',
    ...messages.map((message) => `[${message.role}]: ${truncate(message.content, DIGEST_LINE_LIMIT)}`),
    '',
    `(Summarized ${messages.length} messages)`
  ].join('\n')
}

const SPEAKER: Record<Message['role'], string> = {
  system: 'System',
  user: 'User',
  assistant: 'Assistant'
}

export function buildSummaryPrompt(messages: Message[]): string {
  const transcript = messages.map((message, index) => `[Message ${index + 1}] ${SPEAKER[message.role]}: ${message.content}`)

  return [
    'You are summarizing an earlier part of a conversation about infrastructure management.',
    'The summary replaces these messages in the assistant context, so keep everything later turns may depend on.',
    '',
    'Focus on:',
    '- Infrastructure decisions (stacks, components, environments, regions, CIDR ranges, sizing)',
    '- Security decisions (IAM, access rules, secrets handling, network exposure)',
    '- Files read or changed and commands run, with their outcome',
    '- Open questions and tasks the user still expects',
    '',
    'DO NOT include:',
    '- Greetings, small talk or restated questions',
    '- Full file contents or command output',
    '- Speculation that was later corrected',
    '',
    'Write 150-400 words of plain prose or short bullet points.',
    '',
    'CONVERSATION TO SUMMARIZE:',
    '',
    ...transcript
  ].join('\n')
}

/**
 * Folds `plan.toCompact` into one summary. A failed or blank model summary
 * falls back to `simpleSummary`.
 */
export async function compactMessages(
  plan: CompactionPlan | undefined,
  options: CompactOptions = {}
): Promise<CompactionSummary> {
  if (!plan) throw new Error('compaction plan is missing')

  let modelText = ''
  let fallbackReason: string | undefined
  if (options.client && (options.useModelSummary ?? true)) {
    try {
      modelText = (
        await options.client.sendWithHistory([{role: 'user', content: buildSummaryPrompt(plan.toCompact)}], options.signal)
      ).trim()
      if (!modelText) fallbackReason = 'empty summary'
    } catch (error) {
      fallbackReason = error instanceof Error ? error.message : String(error)
    }
  }

  const usedModel = modelText.length > 0
  const content = usedModel ? `${SUMMARY_HEADER}:\n\n${modelText}` : simpleSummary(plan.toCompact)
  return {
    id: randomUUID(),
    content,
    messageCount: plan.toCompact.length,
    tokenCount: estimateTokens(content),
    usedModel,
    ...(fallbackReason === undefined ? {} : {fallbackReason})
  }
}
