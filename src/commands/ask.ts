import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {getEventLogPath} from '../config/paths.js'
import {TurnError} from '../core/errors.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import type {ChatEvent} from '../core/events.js'
import {startSession} from '../core/runtime.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {eventLine, exitCodeFor, failureText, usageFooter} from '../cli/render.js'

export default class Ask extends Command {
  static override description = 'Ask the assistant a single question'

  static override flags = {
    quiet: Flags.boolean({description: 'print only the final answer'}),
    verboseModel: Flags.boolean({description: 'show raw model responses for each step'}),
    allowDestructive: Flags.boolean({description: 'let the assistant run destructive shell commands without asking'})
  }

  static override args = {
    question: Args.string({description: 'question or task', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Ask)
    const config = await loadConfig()
    const bus = new InMemoryEventBus<ChatEvent>()
    const eventLog = new SessionLogSubscriber((sessionId) => getEventLogPath(sessionId, config.homeDir))
    const unsubscribeLog = bus.subscribe((event) => {
      void eventLog.handle(event)
    })
    const unsubscribe = flags.quiet
      ? () => {}
      : bus.subscribe((event) => {
          const line = eventLine(event, flags.verboseModel)
          if (line) this.logToStderr(line)
        })

    const session = await startSession(config, {
      bus,
      ephemeral: true,
      onSensitiveAction: () => flags.allowDestructive
    }).catch((error: unknown) => {
      unsubscribe()
      unsubscribeLog()
      throw error
    })

    const controller = new AbortController()
    const onSigint = () => controller.abort()
    try {
      process.once('SIGINT', onSigint)
      const signal = AbortSignal.any([controller.signal, AbortSignal.timeout(config.runtime.turnTimeoutMs)])
      const outcome = await session.send(args.question, {signal})
      if (!outcome.ok) throw new TurnError(outcome.error)

      this.log(outcome.content)
      const footer = usageFooter(outcome.usage)
      if (footer && !flags.quiet) this.logToStderr(footer)
    } finally {
      process.off('SIGINT', onSigint)
      session.close()
      await session.flush()
      await eventLog.flush()
      unsubscribe()
      unsubscribeLog()
    }
  }

  protected override async catch(error: Error & {exitCode?: number}): Promise<unknown> {
    if (error instanceof TurnError) {
      return this.error(failureText({ok: false, error}) ?? 'Request cancelled.', {exit: exitCodeFor(error.kind)})
    }
    return super.catch(error)
  }
}
