import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function intFromEnv(name: string, minimum: number): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed >= minimum ? parsed : undefined
}

function record(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) ? {...value} : {}
}

function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined))
}

export async function loadConfig(searchFrom?: string): Promise<AppConfig> {
  const explorer = cosmiconfig('skiff')
  const result = await explorer.search(searchFrom)
  const base = record(result?.config)

  const merged: Record<string, unknown> = {
    ...base,
    provider: nonEmpty(process.env.SKIFF_PROVIDER) ?? base.provider,
    model: nonEmpty(process.env.OPENAI_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENAI_BASE_URL) ?? base.baseURL,
    history: {
      ...record(base.history),
      ...defined({
        maxMessages: intFromEnv('SKIFF_MAX_HISTORY_MESSAGES', 0),
        maxTokens: intFromEnv('SKIFF_MAX_HISTORY_TOKENS', 0)
      })
    },
    runtime: {
      ...record(base.runtime),
      ...defined({
        modelTimeoutMs: intFromEnv('SKIFF_MODEL_TIMEOUT_MS', 1),
        turnTimeoutMs: intFromEnv('SKIFF_TURN_TIMEOUT_MS', 1),
        maxToolRounds: intFromEnv('SKIFF_MAX_TOOL_ROUNDS', 1)
      })
    }
  }

  return appConfigSchema.parse(merged)
}
