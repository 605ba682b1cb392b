import type { Event, EventPayloadMap, EventType } from "./types.js";

type EventHandler<T extends EventType> = (payload: EventPayloadMap[T]) => void | Promise<void>;
type AnyHandler = (payload: unknown) => void;
type ErrorHandler = (error: unknown) => void;

export class EventBus {
  private handlers = new Map<EventType, AnyHandler[]>();
  private pending = new Set<Promise<void>>();
  private asyncErrors: unknown[] = [];

  private trackPending(result: Promise<void>, onError?: ErrorHandler): void {
    const wrapped = result
      .catch((error: unknown) => {
        if (onError) {
          onError(error);
          return;
        }
        this.asyncErrors.push(error);
      })
      .finally(() => {
        this.pending.delete(wrapped);
      });
    this.pending.add(wrapped);
  }

  private register(type: EventType, wrapped: AnyHandler): () => void {
    const existing = this.handlers.get(type);
    if (existing) {
      existing.push(wrapped);
    } else {
      this.handlers.set(type, [wrapped]);
    }

    return (): void => {
      const handlers = this.handlers.get(type);
      if (!handlers) {
        return;
      }
      const index = handlers.indexOf(wrapped);
      if (index >= 0) {
        handlers.splice(index, 1);
      }
      if (handlers.length === 0) {
        this.handlers.delete(type);
      }
    };
  }

  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    return this.register(type, (payload) => {
      const result = handler(payload as EventPayloadMap[T]);
      if (result instanceof Promise) {
        this.trackPending(result);
      }
    });
  }

  /** Like `subscribe`, but handler failures go to `onError` instead of the emitter. */
  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError?: ErrorHandler
  ): () => void {
    return this.register(type, (payload) => {
      try {
        const result = handler(payload as EventPayloadMap[T]);
        if (result instanceof Promise) {
          this.trackPending(result, onError);
        }
      } catch (error) {
        if (onError) {
          onError(error);
        }
      }
    });
  }

  emit(event: Event): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers || handlers.length === 0) {
      return;
    }
    handlers.slice().forEach((handler) => handler(event.payload));
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
    if (this.asyncErrors.length > 0) {
      const errors = this.asyncErrors.splice(0);
      throw new AggregateError(errors, "EventBus async handlers failed");
    }
  }
}
