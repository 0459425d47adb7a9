/**
 * Simple in-memory pub/sub event bus.
 * Services emit governance notifications after a transaction commits; the
 * WebSocket handler broadcasts them to observers.
 */

export type EventType =
  | 'proposal.created'
  | 'proposal.cancelled'
  | 'proposal.status.updated'
  | 'session.closed'
  | 'vote.cast'
  | 'dao.status.updated'
  | 'params.updated'
  | 'admin.updated';

export type EventCallback = (event: EventType, data: unknown) => void;

export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private errorHandlers: Set<ListenerErrorHandler> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Receive errors thrown by listeners. A failing listener never stops
   * delivery to the others.
   */
  onListenerError(handler: ListenerErrorHandler): () => void {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];

    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }
  }

  /**
   * Remove all listeners and error handlers. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.errorHandlers.clear();
  }

  private reportListenerError(event: EventType, error: unknown): void {
    for (const handler of this.errorHandlers) {
      handler(event, error);
    }
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
