import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {ChatEvent} from '../events.js'

type EventLogRecord = {
  ts: string
} & ChatEvent

const MAX_LOGGED_CONTENT = 4000

function clip(event: ChatEvent): ChatEvent {
  if ((event.type === 'message' || event.type === 'model_response') && event.content.length > MAX_LOGGED_CONTENT) {
    return {...event, content: `${event.content.slice(0, MAX_LOGGED_CONTENT)}...[truncated]`}
  }
  if (event.type === 'tool_result' && event.output.length > MAX_LOGGED_CONTENT) {
    return {...event, output: `${event.output.slice(0, MAX_LOGGED_CONTENT)}...[truncated]`}
  }
  return event
}

/** Appends every event as one JSON line to a per-session diagnostics log. */
export class SessionLogSubscriber {
  private readonly pendingBySession = new Map<string, Promise<void>>()
  private readonly failures: string[] = []

  constructor(private readonly logPathFor: (sessionId: string) => string) {}

  handle(event: ChatEvent): Promise<void> {
    const record: EventLogRecord = {ts: new Date().toISOString(), ...clip(event)}
    const next = this.append(event.sessionId, record)
    if (event.type === 'session_end') {
      return next.finally(() => {
        this.pendingBySession.delete(event.sessionId)
      })
    }
    return next
  }

  /** Write errors seen so far; logging never interrupts a turn. */
  get errors(): string[] {
    return [...this.failures]
  }

  private append(sessionId: string, record: EventLogRecord): Promise<void> {
    const logPath = this.logPathFor(sessionId)
    const previous = this.pendingBySession.get(sessionId) ?? Promise.resolve()
    const next = previous.then(async () => {
      try {
        await mkdir(dirname(logPath), {recursive: true})
        await appendFile(logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        this.failures.push(error instanceof Error ? error.message : String(error))
      }
    })
    this.pendingBySession.set(sessionId, next)
    return next
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pendingBySession.values()])
  }
}
