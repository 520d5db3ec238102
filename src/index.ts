export {ChatSession, type ChatSessionOptions, type SendOptions} from './core/chat-session.js'
export {
  TurnOrchestrator,
  type TurnFailure,
  type TurnOrchestratorOptions,
  type TurnOutcome,
  type TurnSuccess
} from './core/orchestrator.js'
export {
  buildHistory,
  filterByProvider,
  windowHistory,
  UNLIMITED_HISTORY,
  type CompactedPrefix,
  type HistoryLimits
} from './core/history.js'
export {
  compactMessages,
  DEFAULT_COMPACTION,
  planCompaction,
  simpleSummary,
  type CompactionConfig,
  type CompactionPlan,
  type CompactionSummary
} from './core/compactor.js'
export {estimateTokens} from './core/token-estimator.js'
export {createActionIntentDetector, detectActionIntent, loadActionIntentLexicon} from './core/action-intent.js'
export {abortedError, classifyError, TurnError, type ClassifiedError, type ErrorKind} from './core/errors.js'
export {combineUsage, formatTokenCount, formatUsage} from './core/usage.js'
export {detectOutputFormat, renderToolNarrative, renderToolResultsPrompt} from './core/tool-output.js'
export {InMemoryEventBus, type EventBus} from './core/event-bus.js'
export type {ChatEvent} from './core/events.js'
export {InMemorySessionStore, JsonlSessionStore, type SessionStore, type SessionSummary} from './core/session-store.js'
export {createProvider, resumeSession, startSession} from './core/runtime.js'
export {ToolRegistry, type ToolDefinition} from './tools/registry.js'
export {createWorkspaceTools} from './tools/workspace-tools.js'
export type {ToolExecutor} from './tools/types.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export {MockProvider} from './providers/mock-provider.js'
export type * from './providers/types.js'
export {loadConfig} from './config/load-config.js'
export type {AppConfig} from './config/schema.js'
