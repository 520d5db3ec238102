import {z} from 'zod'
import {getMemoryPath, getSkiffHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const appConfigSchema = z
  .object({
    provider: z.enum(['mock', 'openai']).default('openai'),
    /** Identity used to isolate history; lets two OpenAI-compatible backends coexist. */
    providerName: optionalText,
    model: optionalText,
    baseURL: optionalText,
    workspace: z.string().default(() => process.cwd()),
    homeDir: z.string().default(() => getSkiffHome()),
    memoryFile: z.string().optional(),
    history: z
      .object({
        // 0 = unlimited
        maxMessages: nonNegativeInt.default(0),
        maxTokens: nonNegativeInt.default(0),
        compaction: z
          .object({
            enabled: z.boolean().default(false),
            triggerThreshold: z.coerce.number().gt(0).lte(1).default(0.75),
            compactRatio: z.coerce.number().gt(0).lte(1).default(0.4),
            preserveRecent: nonNegativeInt.default(10),
            useModelSummary: z.boolean().default(true)
          })
          .default({})
      })
      .default({}),
    runtime: z
      .object({
        modelTimeoutMs: positiveInt.default(120_000),
        turnTimeoutMs: positiveInt.default(300_000),
        maxToolRounds: positiveInt.default(10),
        persistTimeoutMs: positiveInt.default(5_000)
      })
      .default({})
  })
  .transform((config) => ({
    ...config,
    memoryFile: config.memoryFile ?? getMemoryPath(config.homeDir)
  }))

export type AppConfig = z.infer<typeof appConfigSchema>
