import {readFile} from 'node:fs/promises'
import type {AppConfig} from '../config/schema.js'
import {getSessionsDir} from '../config/paths.js'
import {MockProvider} from '../providers/mock-provider.js'
import {OpenAIProvider} from '../providers/openai-provider.js'
import type {ProviderClient} from '../providers/types.js'
import type {SensitiveActionHandler} from '../tools/types.js'
import {createWorkspaceTools} from '../tools/workspace-tools.js'
import {ChatSession, type ChatSessionOptions} from './chat-session.js'
import type {EventBus} from './event-bus.js'
import type {ChatEvent} from './events.js'
import {JsonlSessionStore} from './session-store.js'

export type ProviderKind = AppConfig['provider']

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function resolveModel(configModel?: string): string {
  return nonEmpty(configModel) ?? nonEmpty(process.env.OPENAI_MODEL) ?? 'gpt-4o-mini'
}

export function isProviderKind(value: string): value is ProviderKind {
  return value === 'mock' || value === 'openai'
}

export function createProvider(config: AppConfig, kind: ProviderKind = config.provider): ProviderClient {
  if (kind === 'mock') return new MockProvider()

  const apiKey = nonEmpty(process.env.OPENAI_API_KEY)
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is missing. Set it in your environment or ~/.skiff/.env.')
  }

  return new OpenAIProvider({
    apiKey,
    name: config.providerName,
    model: resolveModel(config.model),
    baseUrl: config.baseURL,
    timeoutMs: config.runtime.modelTimeoutMs
  })
}

export async function readMemory(path: string): Promise<string | undefined> {
  try {
    const content = await readFile(path, 'utf8')
    return content.trim() ? content : undefined
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined
    throw error
  }
}

export type RuntimeOptions = {
  bus?: EventBus<ChatEvent>
  onSensitiveAction?: SensitiveActionHandler
  /** Skip the JSONL store (one-shot questions). */
  ephemeral?: boolean
}

export async function sessionOptionsFromConfig(
  config: AppConfig,
  options: RuntimeOptions = {}
): Promise<ChatSessionOptions> {
  return {
    client: createProvider(config),
    executor: createWorkspaceTools(config.workspace, {onSensitiveAction: options.onSensitiveAction}),
    store: options.ephemeral ? undefined : new JsonlSessionStore(getSessionsDir(config.homeDir)),
    bus: options.bus,
    limits: {maxMessages: config.history.maxMessages, maxTokens: config.history.maxTokens},
    compaction: config.history.compaction,
    maxToolRounds: config.runtime.maxToolRounds,
    memory: await readMemory(config.memoryFile),
    persistTimeoutMs: config.runtime.persistTimeoutMs
  }
}

export async function startSession(config: AppConfig, options: RuntimeOptions = {}): Promise<ChatSession> {
  return ChatSession.create(await sessionOptionsFromConfig(config, options))
}

export async function resumeSession(
  config: AppConfig,
  sessionId: string,
  options: RuntimeOptions = {}
): Promise<ChatSession> {
  const sessionOptions = await sessionOptionsFromConfig(config, options)
  const store = sessionOptions.store ?? new JsonlSessionStore(getSessionsDir(config.homeDir))
  return ChatSession.resume(sessionId, {...sessionOptions, store})
}
