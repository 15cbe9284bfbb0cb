// ---------------------------------------------------------------------------
// In-process event bus
//
// Services publish after their transaction commits. Subscribers (the reminder
// scheduler adapter, for one) run concurrently; a failing subscriber is
// logged and never reaches the publisher.
// ---------------------------------------------------------------------------

import type { DomainEvent, DomainEventType } from '@crewbook/domain'

export type EventHandler = (event: DomainEvent) => void | Promise<void>

export interface EventPublisher {
  publish(events: readonly DomainEvent[]): Promise<void>
}

export class EventBus implements EventPublisher {
  private readonly handlers = new Map<DomainEventType | '*', EventHandler[]>()

  /** Registers `handler` for one event type, or every type with `'*'`. Returns an unsubscribe function. */
  subscribe(eventType: DomainEventType | '*', handler: EventHandler): () => void {
    const list = this.handlers.get(eventType) ?? []
    this.handlers.set(eventType, [...list, handler])
    return () => {
      this.handlers.set(
        eventType,
        (this.handlers.get(eventType) ?? []).filter((h) => h !== handler),
      )
    }
  }

  async publish(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      const targets = [...(this.handlers.get(event.eventType) ?? []), ...(this.handlers.get('*') ?? [])]
      const results = await Promise.allSettled(targets.map(async (handler) => handler(event)))
      for (const result of results) {
        if (result.status === 'rejected') {
          console.error('[events] subscriber failed', {
            eventType: event.eventType,
            tenantId: event.tenantId,
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          })
        }
      }
    }
  }
}
