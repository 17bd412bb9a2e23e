import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  /** Per type: the subscribed handler mapped to its narrowing wrapper. */
  private readonly handlers = new Map<EventType, Map<(event: never) => void, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. Subscribing the same handler twice is a no-op. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<(event: never) => void, WildcardHandler>();
    if (!existing.has(handler)) {
      existing.set(handler, (event) => {
        if (isEventOf(event, type)) handler(event);
      });
    }
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit a domain event to all registered handlers. A throwing handler does not prevent
   * others from executing; its error is reported as a process warning.
   */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        try {
          handler(event);
        } catch (error) {
          this.reportHandlerError(event, error);
        }
      }
    }

    for (const handler of this.wildcardHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.reportHandlerError(event, error);
      }
    }
  }

  private reportHandlerError(event: DomainEvent, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    process.emitWarning(`Handler for '${event.type}' threw: ${message}`, { code: 'PAGERDATA_EVENT_HANDLER' });
  }
}
