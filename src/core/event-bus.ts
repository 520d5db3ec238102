export type EventHandler<TEvent> = (event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

type InMemoryEventBusOptions = {
  /** Receives errors thrown by subscribers; publishing itself never throws. */
  onHandlerError?: (error: unknown) => void
}

export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()
  private readonly onHandlerError: (error: unknown) => void

  constructor(options: InMemoryEventBusOptions = {}) {
    this.onHandlerError =
      options.onHandlerError ??
      ((error) => {
        process.emitWarning(`event subscriber failed: ${error instanceof Error ? error.message : String(error)}`)
      })
  }

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event)
      } catch (error) {
        this.onHandlerError(error)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }

  get size(): number {
    return this.handlers.size
  }
}
