import { EventName, EventPayloads, MarketEvent, TypedEvent } from "./types";
import { logger } from "./logger";

export type EventListener = (event: MarketEvent) => void;

/**
 * In-process record of committed marketplace events.
 */
export class EventLog {
  private events: MarketEvent[] = [];
  private listeners = new Set<EventListener>();

  constructor(private readonly clock: () => number = Date.now) {}

  publish<K extends EventName>(name: K, data: EventPayloads[K]): TypedEvent<K> {
    const event: TypedEvent<K> = { name, ts: new Date(this.clock()).toISOString(), data };
    this.events.push(event);
    logger.info(`[EVENT] ${name}`, data);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error("[EVENT] Listener failed", {
          event: name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return event;
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  all(): MarketEvent[] {
    return [...this.events];
  }

  ofKind<K extends EventName>(name: K): Array<TypedEvent<K>> {
    return this.events.filter((event): event is TypedEvent<K> => event.name === name);
  }
}
