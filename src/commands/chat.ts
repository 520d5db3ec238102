import {Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getEventLogPath, getSessionsDir} from '../config/paths.js'
import type {AppConfig} from '../config/schema.js'
import type {ChatSession} from '../core/chat-session.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {ChatEvent} from '../core/events.js'
import {createProvider, isProviderKind, resumeSession, startSession, type RuntimeOptions} from '../core/runtime.js'
import {JsonlSessionStore, type SessionSummary} from '../core/session-store.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {UsageSubscriber} from '../core/subscribers/usage-subscriber.js'
import {formatUsage} from '../core/usage.js'
import {cyan, dim, eventLine, failureText, red, shorten, usageFooter} from '../cli/render.js'

const HELP_LINES = [
  'chat commands:',
  '  /help                    show this help',
  '  /exit or /quit           exit chat',
  '  /clear                   start a fresh session',
  '  /history [n]             show recent messages (default 20)',
  '  /usage                   show token usage for this session',
  '  /provider <mock|openai>  switch provider; history is kept per provider',
  '  /sessions [n]            list recent sessions',
  '  /config                  print resolved config',
  'Ctrl-C cancels the running turn; Ctrl-C at the prompt exits.'
]

function countArg(input: string, fallback: number): number {
  const parsed = Number.parseInt(input.split(/\s+/)[1] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

function pickSession(summaries: SessionSummary[], specifier: string): SessionSummary | undefined {
  if (specifier === 'latest') return summaries[0]
  return summaries.find((summary) => summary.sessionId === specifier)
}

export default class Chat extends Command {
  static override description = 'Interactive chat with the infrastructure assistant'

  static override flags = {
    quiet: Flags.boolean({description: 'hide execution logs and show only assistant responses'}),
    verboseModel: Flags.boolean({description: 'show raw model responses for each step'}),
    nonInteractive: Flags.boolean({description: 'deny destructive shell commands without asking'}),
    resume: Flags.string({description: 'resume from session id or latest'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig()
    const rl = createInterface({input: stdIn, output: stdOut})
    const bus = new InMemoryEventBus<ChatEvent>()
    const eventLog = new SessionLogSubscriber((sessionId) => getEventLogPath(sessionId, config.homeDir))
    const usageStats = new UsageSubscriber((stats) => {
      if (flags.quiet) return
      const tokens = formatUsage(stats.usage) || '0 tokens'
      this.log(dim(`session ${stats.sessionId}: turns=${stats.turns} tool_calls=${stats.toolCalls} ${tokens}`))
    })
    const subscriptions = [
      bus.subscribe((event) => {
        void eventLog.handle(event)
      }),
      bus.subscribe((event) => usageStats.handle(event))
    ]
    if (!flags.quiet) {
      subscriptions.push(
        bus.subscribe((event) => {
          const line = eventLine(event, flags.verboseModel)
          if (line) this.log(line)
        })
      )
    }

    let current: AbortController | undefined
    let closed = false
    rl.on('SIGINT', () => {
      if (current) {
        current.abort()
        return
      }
      rl.close()
    })
    rl.on('close', () => {
      closed = true
    })

    const runtime: RuntimeOptions = {
      bus,
      onSensitiveAction: async ({tool, command}) => {
        if (flags.nonInteractive || !stdIn.isTTY) {
          this.log(red(`SENSITIVE_REQUEST tool=${tool} auto=deny command=${command}`))
          return false
        }
        const answer = (await rl.question(red(`Allow ${tool} to run "${command}"? [y/N] `))).trim().toLowerCase()
        return answer === 'y' || answer === 'yes'
      }
    }

    let session = await this.openSession(config, runtime, flags.resume)
    this.log(cyan('skiff chat started. Type /help for commands.'))

    try {
      while (!closed) {
        let input = ''
        try {
          input = (await rl.question(cyan('you> '))).trim()
        } catch {
          break
        }

        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input === '/help') {
          HELP_LINES.forEach((line) => this.log(cyan(line)))
          continue
        }

        if (input === '/clear') {
          await this.closeSession(session)
          session = await startSession(config, runtime)
          this.log(cyan('session cleared'))
          continue
        }

        if (input.startsWith('/history')) {
          const messages = session.messages.slice(-countArg(input, 20))
          if (messages.length === 0) this.log(cyan('(history empty)'))
          for (const message of messages) {
            this.log(`${message.role}[${message.provider ?? '-'}]> ${shorten(message.content, 300)}`)
          }
          continue
        }

        if (input === '/usage') {
          const stats = usageStats.stats(session.id)
          this.log(cyan(`session: ${session.id} provider=${session.provider} model=${session.model}`))
          this.log(cyan(`tokens: ${formatUsage(session.usage) || '0'}`))
          if (stats) {
            this.log(
              cyan(`turns=${stats.turns} tool_calls=${stats.toolCalls} tool_errors=${stats.toolErrors} nudges=${stats.nudges}`)
            )
          }
          continue
        }

        if (input.startsWith('/provider')) {
          const kind = input.split(/\s+/)[1] ?? ''
          if (!isProviderKind(kind)) {
            this.log(red('usage: /provider <mock|openai>'))
            continue
          }
          try {
            session.switchProvider(createProvider(config, kind))
          } catch (error) {
            this.log(red(error instanceof Error ? error.message : String(error)))
          }
          continue
        }

        if (input.startsWith('/sessions')) {
          const summaries = (await new JsonlSessionStore(getSessionsDir(config.homeDir)).listSessions()).slice(
            0,
            countArg(input, 20)
          )
          if (summaries.length === 0) this.log(cyan('(no persisted sessions)'))
          summaries.forEach((summary, index) => {
            this.log(
              `${index + 1}. ${summary.sessionId} provider=${summary.provider ?? '-'} messages=${summary.messageCount} updated=${summary.lastUpdatedAt ?? summary.startedAt ?? 'unknown'}`
            )
          })
          continue
        }

        if (input === '/config') {
          this.log(JSON.stringify(config, null, 2))
          continue
        }

        if (input.startsWith('/')) {
          this.log(red(`unknown command: ${input}`))
          continue
        }

        current = new AbortController()
        const signal = AbortSignal.any([current.signal, AbortSignal.timeout(config.runtime.turnTimeoutMs)])
        try {
          const outcome = await session.send(input, {signal})
          if (!outcome.ok) {
            const message = failureText(outcome)
            this.log(message ? red(message) : cyan('(cancelled)'))
            continue
          }

          this.log(cyan('assistant>'))
          this.log(outcome.content)
          const footer = usageFooter(outcome.usage)
          if (footer) this.log(footer)
        } finally {
          current = undefined
        }
      }
    } finally {
      await this.closeSession(session)
      await eventLog.flush()
      subscriptions.forEach((unsubscribe) => unsubscribe())
      rl.close()
    }
  }

  private async openSession(config: AppConfig, runtime: RuntimeOptions, resume?: string): Promise<ChatSession> {
    if (!resume) return startSession(config, runtime)

    const summaries = await new JsonlSessionStore(getSessionsDir(config.homeDir)).listSessions()
    const target = pickSession(summaries, resume)
    if (!target) {
      this.log(red(`No session found for --resume ${resume}; starting a new one.`))
      return startSession(config, runtime)
    }
    return resumeSession(config, target.sessionId, runtime)
  }

  private async closeSession(session: ChatSession): Promise<void> {
    session.close()
    await session.flush()
  }
}
