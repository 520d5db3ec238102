import {describe, expect, it} from 'vitest'
import {
  buildSummaryPrompt,
  compactMessages,
  DEFAULT_COMPACTION,
  planCompaction,
  simpleSummary,
  type CompactionConfig
} from '../src/core/compactor.js'
import type {Message} from '../src/providers/types.js'
import {ScriptedProvider} from './helpers/fakes.js'

const enabled: CompactionConfig = {...DEFAULT_COMPACTION, enabled: true}

function turns(count: number): Message[] {
  return Array.from({length: count}, (_, index): Message => ({
    role: index % 2 === 0 ? 'user' : 'assistant',
    content: `message ${index + 1}`,
    provider: 'openai'
  }))
}

class FailingSummaryProvider extends ScriptedProvider {
  override async sendWithHistory(): Promise<string> {
    throw new Error('503 Service Unavailable')
  }
}

describe('planCompaction', () => {
  it('is disabled by default', () => {
    expect(DEFAULT_COMPACTION).toEqual({
      enabled: false,
      triggerThreshold: 0.75,
      compactRatio: 0.4,
      preserveRecent: 10,
      useModelSummary: true
    })
    expect(planCompaction(turns(45), 50, DEFAULT_COMPACTION)).toBeUndefined()
  })

  it('waits until the history reaches the trigger threshold', () => {
    expect(planCompaction(turns(30), 50, enabled)).toBeUndefined()
    expect(planCompaction(turns(38), 50, enabled)?.toCompact).toHaveLength(15)
    expect(planCompaction(turns(45), 50, enabled)?.toCompact).toHaveLength(18)
  })

  it('never compacts unlimited or empty history', () => {
    expect(planCompaction(turns(100), 0, enabled)).toBeUndefined()
    expect(planCompaction([], 50, enabled)).toBeUndefined()
  })

  it('keeps the preserved recent turns out of the summary', () => {
    const plan = planCompaction(turns(25), 30, {...enabled, compactRatio: 0.8, preserveRecent: 20})
    expect(plan?.toCompact).toHaveLength(5)
    expect(plan?.toKeep).toHaveLength(20)
  })

  it('folds the oldest turns and keeps the rest in order', () => {
    const messages = turns(50)
    const plan = planCompaction(messages, 50, enabled)

    expect(plan?.total).toBe(50)
    expect(plan?.toCompact).toEqual(messages.slice(0, 20))
    expect(plan?.toKeep).toEqual(messages.slice(20))
    expect(plan?.reason).toBe('50 messages reached 75% of the 50-message limit')
  })
})

describe('simpleSummary', () => {
  it('lists each turn under the header with long content truncated', () => {
    const long = 'Very long message content '.repeat(20)
    const summary = simpleSummary([
      {role: 'user', content: 'What is the VPC CIDR?'},
      {role: 'assistant', content: 'The VPC CIDR is 10.0.0.0/16 for production'},
      {role: 'user', content: long}
    ])

    expect(summary.split('\n')).toEqual([
      'SUMMARY OF EARLIER CONVERSATION:',
      '',
      '[user]: What is the VPC CIDR?',
      '[assistant]: The VPC CIDR is 10.0.0.0/16 for production',
      `[user]: ${long.slice(0, 200)}...`,
      '',
      '(Summarized 3 messages)'
    ])
  })
})

describe('buildSummaryPrompt', () => {
  it('numbers the transcript and states what to keep', () => {
    const prompt = buildSummaryPrompt([
      {role: 'user', content: 'Configure VPC for production'},
      {role: 'assistant', content: 'Use 10.0.0.0/16 with three private subnets.'}
    ])

    expect(prompt).toContain('Infrastructure decisions')
    expect(prompt).toContain('Security decisions')
    expect(prompt).toContain('DO NOT include:')
    expect(prompt).toContain('150-400 words')
    expect(prompt.slice(prompt.indexOf('CONVERSATION TO SUMMARIZE:'))).toBe(
      'CONVERSATION TO SUMMARIZE:\n\n[Message 1] User: Configure VPC for production\n[Message 2] Assistant: Use 10.0.0.0/16 with three private subnets.'
    )
  })
})

describe('compactMessages', () => {
  it('rejects a missing plan', async () => {
    await expect(compactMessages(undefined)).rejects.toThrow('compaction plan is missing')
  })

  it('summarizes without a model call when asked to', async () => {
    const plan = planCompaction(turns(10), 10, {...enabled, preserveRecent: 2})
    const client = new ScriptedProvider('openai')
    const summary = await compactMessages(plan, {client, useModelSummary: false})

    expect(client.plainRequests).toHaveLength(0)
    expect(summary.usedModel).toBe(false)
    expect(summary.messageCount).toBe(4)
    expect(summary.content).toBe(
      'SUMMARY OF EARLIER CONVERSATION:\n\n[user]: message 1\n[assistant]: message 2\n[user]: message 3\n[assistant]: message 4\n\n(Summarized 4 messages)'
    )
    expect(summary.tokenCount).toBeGreaterThan(0)
    expect(summary.id).not.toBe('')
  })

  it('asks the provider for a summary', async () => {
    const plan = planCompaction(turns(10), 10, {...enabled, preserveRecent: 2})
    const client = new ScriptedProvider('openai', [], ['  Production VPC uses 10.0.0.0/16.  '])
    const summary = await compactMessages(plan, {client})

    expect(client.plainRequests).toEqual([[{role: 'user', content: buildSummaryPrompt(turns(4))}]])
    expect(summary).toMatchObject({
      content: 'SUMMARY OF EARLIER CONVERSATION:\n\nProduction VPC uses 10.0.0.0/16.',
      messageCount: 4,
      tokenCount: 10,
      usedModel: true
    })
    expect(summary.fallbackReason).toBeUndefined()
  })

  it('falls back to the simple summary when the provider fails', async () => {
    const plan = planCompaction(turns(10), 10, {...enabled, preserveRecent: 2})
    const summary = await compactMessages(plan, {client: new FailingSummaryProvider('openai')})

    expect(summary.usedModel).toBe(false)
    expect(summary.fallbackReason).toBe('503 Service Unavailable')
    expect(summary.content).toBe(simpleSummary(turns(4)))
  })

  it('falls back to the simple summary when the provider answers blank', async () => {
    const plan = planCompaction(turns(10), 10, {...enabled, preserveRecent: 2})
    const summary = await compactMessages(plan, {client: new ScriptedProvider('openai', [], ['   '])})

    expect(summary.usedModel).toBe(false)
    expect(summary.fallbackReason).toBe('empty summary')
    expect(summary.content).toBe(simpleSummary(turns(4)))
  })
})
