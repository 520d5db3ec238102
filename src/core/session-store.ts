import {randomUUID} from 'node:crypto'
import {appendFile, mkdir, readFile, readdir} from 'node:fs/promises'
import {basename, resolve} from 'node:path'
import {z} from 'zod'
import type {Message} from '../providers/types.js'

export type SessionSummary = {
  sessionId: string
  provider?: string
  startedAt?: string
  lastUpdatedAt?: string
  messageCount: number
}

export interface SessionStore {
  /** Registers a new session and returns its id. */
  createSession(provider: string, signal?: AbortSignal): Promise<string>
  addMessage(sessionId: string, message: Message, signal?: AbortSignal): Promise<void>
  /** Messages in insertion order starting at `sinceIndex`. */
  getMessages(sessionId: string, sinceIndex?: number, signal?: AbortSignal): Promise<Message[]>
  /** Newest first. */
  listSessions(): Promise<SessionSummary[]>
}

type InMemorySession = {
  provider: string
  startedAt: string
  lastUpdatedAt: string
  messages: Message[]
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, InMemorySession>()

  async createSession(provider: string): Promise<string> {
    const id = randomUUID()
    const now = new Date().toISOString()
    this.sessions.set(id, {provider, startedAt: now, lastUpdatedAt: now, messages: []})
    return id
  }

  async addMessage(sessionId: string, message: Message): Promise<void> {
    const session = this.get(sessionId)
    session.messages.push({...message})
    session.lastUpdatedAt = new Date().toISOString()
  }

  async getMessages(sessionId: string, sinceIndex = 0): Promise<Message[]> {
    return this.get(sessionId)
      .messages.slice(Math.max(0, sinceIndex))
      .map((message) => ({...message}))
  }

  async listSessions(): Promise<SessionSummary[]> {
    return [...this.sessions.entries()]
      .map(([sessionId, session]) => ({
        sessionId,
        provider: session.provider,
        startedAt: session.startedAt,
        lastUpdatedAt: session.lastUpdatedAt,
        messageCount: session.messages.length
      }))
      .sort((a, b) => Date.parse(b.lastUpdatedAt) - Date.parse(a.lastUpdatedAt))
  }

  private get(sessionId: string): InMemorySession {
    const session = this.sessions.get(sessionId)
    if (!session) throw new Error(`Session not found: ${sessionId}`)
    return session
  }
}

const sessionRecordSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('session_start'),
    ts: z.string(),
    sessionId: z.string(),
    provider: z.string()
  }),
  z.object({
    type: z.literal('message'),
    ts: z.string(),
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
    provider: z.string().optional()
  })
])

type SessionRecord = z.infer<typeof sessionRecordSchema>

function parseRecords(raw: string): SessionRecord[] {
  const records: SessionRecord[] = []
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue
    let json: unknown
    try {
      json = JSON.parse(line)
    } catch {
      continue
    }
    const parsed = sessionRecordSchema.safeParse(json)
    if (parsed.success) records.push(parsed.data)
  }
  return records
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/** One append-only `<id>.jsonl` file per session. */
export class JsonlSessionStore implements SessionStore {
  constructor(private readonly dir: string) {}

  pathFor(sessionId: string): string {
    return resolve(this.dir, `${sessionId}.jsonl`)
  }

  async createSession(provider: string, signal?: AbortSignal): Promise<string> {
    const sessionId = randomUUID()
    await this.append(sessionId, {type: 'session_start', ts: new Date().toISOString(), sessionId, provider}, signal)
    return sessionId
  }

  async addMessage(sessionId: string, message: Message, signal?: AbortSignal): Promise<void> {
    await this.append(
      sessionId,
      {
        type: 'message',
        ts: new Date().toISOString(),
        role: message.role,
        content: message.content,
        ...(message.provider ? {provider: message.provider} : {})
      },
      signal
    )
  }

  async getMessages(sessionId: string, sinceIndex = 0, signal?: AbortSignal): Promise<Message[]> {
    const raw = await readFile(this.pathFor(sessionId), {encoding: 'utf8', signal})
    const messages: Message[] = []
    for (const record of parseRecords(raw)) {
      if (record.type !== 'message') continue
      messages.push(
        record.provider && record.role !== 'system'
          ? {role: record.role, content: record.content, provider: record.provider}
          : {role: record.role, content: record.content}
      )
    }
    return messages.slice(Math.max(0, sinceIndex))
  }

  async listSessions(): Promise<SessionSummary[]> {
    let files: string[]
    try {
      files = await readdir(this.dir)
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }

    const summaries: SessionSummary[] = []
    for (const file of files.filter((name) => name.endsWith('.jsonl'))) {
      const records = parseRecords(await readFile(resolve(this.dir, file), 'utf8'))
      const start = records.find((record) => record.type === 'session_start')
      summaries.push({
        sessionId: basename(file, '.jsonl'),
        provider: start?.type === 'session_start' ? start.provider : undefined,
        startedAt: start?.ts,
        lastUpdatedAt: records.at(-1)?.ts,
        messageCount: records.filter((record) => record.type === 'message').length
      })
    }

    return summaries.sort((a, b) => {
      const aTs = Date.parse(a.lastUpdatedAt ?? a.startedAt ?? '')
      const bTs = Date.parse(b.lastUpdatedAt ?? b.startedAt ?? '')
      return (Number.isNaN(bTs) ? 0 : bTs) - (Number.isNaN(aTs) ? 0 : aTs)
    })
  }

  private async append(sessionId: string, record: SessionRecord, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    await mkdir(this.dir, {recursive: true})
    signal?.throwIfAborted()
    await appendFile(this.pathFor(sessionId), `${JSON.stringify(record)}\n`, 'utf8')
  }
}
