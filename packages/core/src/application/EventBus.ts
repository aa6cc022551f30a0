import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Receives whatever a subscriber threw, with the event it was handling. */
export type HandlerErrorReporter = (error: unknown, event: DomainEvent) => void;

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed event bus for session events. Subscribe with `on()`, publish with `emit()`.
 *
 * Emission is synchronous. A throwing subscriber is reported and the
 * remaining subscribers still run.
 */
export class EventBus {
  /** Per type: the subscriber as registered, and the narrowing wrapper that runs it. */
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly reportHandlerError: HandlerErrorReporter = () => undefined) {}

  /** Subscribe to events of the given type. Registering the same handler twice has no effect. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const registered = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    if (!registered.has(handler)) {
      registered.set(handler, (event) => {
        if (isEventOf(event, type)) handler(event);
      });
    }
    this.handlers.set(type, registered);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  emit(event: DomainEvent): void {
    const typed = this.handlers.get(event.type);
    const subscribers = [...(typed?.values() ?? []), ...this.wildcardHandlers];

    for (const subscriber of subscribers) {
      try {
        subscriber(event);
      } catch (error) {
        this.reportHandlerError(error, event);
      }
    }
  }
}
