import type {Message, ProviderClient, Role, Usage} from '../providers/types.js'
import type {ToolExecutor} from '../tools/types.js'
import {compactMessages, planCompaction, type CompactionConfig} from './compactor.js'
import type {EventBus} from './event-bus.js'
import type {ChatEvent} from './events.js'
import {buildHistory, filterByProvider, UNLIMITED_HISTORY, type CompactedPrefix, type HistoryLimits} from './history.js'
import {TurnOrchestrator, type TurnOutcome} from './orchestrator.js'
import type {SessionStore} from './session-store.js'
import {combineUsage} from './usage.js'

export const DEFAULT_PERSIST_TIMEOUT_MS = 5_000

export type ChatSessionOptions = {
  client: ProviderClient
  executor?: ToolExecutor
  store?: SessionStore
  bus?: EventBus<ChatEvent>
  limits?: HistoryLimits
  /** Folds a provider's oldest turns into a summary as its history nears `limits.maxMessages`. */
  compaction?: CompactionConfig
  maxToolRounds?: number
  instruction?: string
  /** Project memory replayed as a system message ahead of every turn. */
  memory?: string
  persistTimeoutMs?: number
}

export type SendOptions = {
  signal?: AbortSignal
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`persisting message timed out after ${timeoutMs}ms`)), timeoutMs)
    timer.unref?.()
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Owns one conversation: its messages, the active provider and the running
 * usage total. Exactly one turn may be in flight at a time.
 */
export class ChatSession {
  readonly id: string
  private client: ProviderClient
  private orchestrator: TurnOrchestrator
  private readonly options: ChatSessionOptions
  private readonly conversation: Message[]
  private readonly compacted = new Map<string, CompactedPrefix>()
  private writeChain: Promise<void> = Promise.resolve()
  private totalUsage: Usage | undefined
  private inFlight = false

  constructor(id: string, options: ChatSessionOptions, conversation: Message[] = []) {
    this.id = id
    this.options = options
    this.client = options.client
    this.conversation = conversation.map((message) => ({...message}))
    this.orchestrator = this.createOrchestrator()
  }

  static async create(options: ChatSessionOptions): Promise<ChatSession> {
    const id = options.store ? await options.store.createSession(options.client.name) : 'ephemeral'
    const session = new ChatSession(id, options)
    options.bus?.publish({
      type: 'session_start',
      sessionId: id,
      provider: options.client.name,
      model: options.client.model,
      resumed: false
    })
    return session
  }

  static async resume(sessionId: string, options: ChatSessionOptions & {store: SessionStore}): Promise<ChatSession> {
    const messages = await options.store.getMessages(sessionId, 0)
    const session = new ChatSession(sessionId, options, messages)
    options.bus?.publish({
      type: 'session_start',
      sessionId,
      provider: options.client.name,
      model: options.client.model,
      resumed: true
    })
    return session
  }

  get provider(): string {
    return this.client.name
  }

  get model(): string {
    return this.client.model
  }

  get usage(): Usage | undefined {
    return this.totalUsage ? {...this.totalUsage} : undefined
  }

  get messages(): Message[] {
    return this.conversation.map((message) => ({...message}))
  }

  /** Later turns go to `client` only; earlier turns stay in the conversation but are never sent to it. */
  switchProvider(client: ProviderClient): void {
    const from = this.client.name
    this.client = client
    this.orchestrator = this.createOrchestrator()
    this.options.bus?.publish({type: 'provider_switch', sessionId: this.id, from, to: client.name})
  }

  async send(text: string, options: SendOptions = {}): Promise<TurnOutcome> {
    if (this.inFlight) throw new Error(`Session ${this.id} is already processing a turn.`)
    this.inFlight = true
    try {
      return await this.runTurn(text, options.signal)
    } finally {
      this.inFlight = false
    }
  }

  private async runTurn(text: string, signal?: AbortSignal): Promise<TurnOutcome> {
    const provider = this.client.name
    const limits = this.options.limits ?? UNLIMITED_HISTORY
    await this.compactIfNeeded(provider, limits.maxMessages, signal)
    const history = buildHistory(this.conversation, provider, text, limits, this.compacted.get(provider))
    const memory = this.options.memory?.trim()
    const submitted: Message[] = memory ? [{role: 'system', content: memory}, ...history] : history

    this.record('user', text, provider)
    const outcome = await this.orchestrator.runTurn(submitted, {signal})
    if (outcome.ok) {
      this.record('assistant', outcome.content, provider)
      this.totalUsage = combineUsage(this.totalUsage, outcome.usage)
    }
    return outcome
  }

  private async compactIfNeeded(provider: string, maxMessages: number, signal?: AbortSignal): Promise<void> {
    const config = this.options.compaction
    if (!config?.enabled || signal?.aborted) return

    const previous = this.compacted.get(provider)
    const turns = filterByProvider(this.conversation, provider).slice(previous?.compactedCount ?? 0)
    const plan = planCompaction(turns, maxMessages, config)
    if (!plan) return

    const summary = await compactMessages(plan, {client: this.client, useModelSummary: config.useModelSummary, signal})
    this.compacted.set(provider, {
      summary: previous ? `${previous.summary}\n\n${summary.content}` : summary.content,
      compactedCount: (previous?.compactedCount ?? 0) + summary.messageCount
    })
    this.options.bus?.publish({
      type: 'history_compacted',
      sessionId: this.id,
      provider,
      summaryId: summary.id,
      compacted: summary.messageCount,
      kept: plan.toKeep.length,
      usedModel: summary.usedModel,
      tokenCount: summary.tokenCount,
      fallbackReason: summary.fallbackReason
    })
  }

  /** Waits for background persistence started by earlier turns. */
  async flush(): Promise<void> {
    await this.writeChain
  }

  close(): void {
    this.options.bus?.publish({type: 'session_end', sessionId: this.id})
  }

  private record(role: Role, content: string, provider: string): void {
    const message: Message = {role, content, provider}
    this.conversation.push(message)
    this.options.bus?.publish({type: 'message', sessionId: this.id, role, provider, content})
    this.persistInBackground(message)
  }

  // Storage is off the critical path: the turn never waits for disk. Writes are
  // chained so the log keeps conversation order.
  private persistInBackground(message: Message): void {
    const store = this.options.store
    if (!store) return

    const timeoutMs = this.options.persistTimeoutMs ?? DEFAULT_PERSIST_TIMEOUT_MS
    this.writeChain = this.writeChain.then(async () => {
      try {
        await withTimeout(store.addMessage(this.id, {...message}, AbortSignal.timeout(timeoutMs)), timeoutMs)
      } catch (error) {
        this.options.bus?.publish({
          type: 'persist_failed',
          sessionId: this.id,
          error: error instanceof Error ? error.message : String(error)
        })
      }
    })
  }

  private createOrchestrator(): TurnOrchestrator {
    return new TurnOrchestrator({
      client: this.client,
      executor: this.options.executor,
      bus: this.options.bus,
      sessionId: this.id,
      maxToolRounds: this.options.maxToolRounds,
      instruction: this.options.instruction
    })
  }
}
