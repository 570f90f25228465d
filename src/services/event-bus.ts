import { EventEmitter } from 'node:events';
import type { EventType, InternalEvent } from '../types/events.js';
import type { Logger } from '../infra/logger.js';

type EventHandler = (event: InternalEvent) => void | Promise<void>;
type TypedHandler<T extends EventType> = (event: Extract<InternalEvent, { type: T }>) => void | Promise<void>;

export type Unsubscribe = () => void;

const ANY = 'event';

/**
 * In-process bus for position and trade events. A handler that throws or
 * rejects is logged and never reaches the emitter or the other handlers.
 */
export class EventBus {
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  private readonly wrapped = new Map<EventHandler, (event: InternalEvent) => void>();

  constructor(logger: Logger) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.logger = logger;
  }

  emit(event: InternalEvent): void {
    this.logger.debug({ eventType: event.type, eventId: event.id, chainId: event.chainId }, 'Event emitted');
    this.emitter.emit(ANY, event);
    this.emitter.emit(event.type, event);
  }

  on(handler: EventHandler): Unsubscribe {
    const listener = this.guard(handler);
    this.wrapped.set(handler, listener);
    this.emitter.on(ANY, listener);
    return () => this.off(handler);
  }

  onType<T extends EventType>(type: T, handler: TypedHandler<T>): Unsubscribe {
    const listener = (event: Extract<InternalEvent, { type: T }>): void => {
      this.settle(event, () => handler(event));
    };
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }

  off(handler: EventHandler): void {
    const listener = this.wrapped.get(handler);
    if (!listener) return;
    this.emitter.off(ANY, listener);
    this.wrapped.delete(handler);
  }

  listenerCount(type?: EventType): number {
    return this.emitter.listenerCount(type ?? ANY);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.wrapped.clear();
  }

  private guard(handler: EventHandler): (event: InternalEvent) => void {
    return (event) => {
      this.settle(event, () => handler(event));
    };
  }

  private settle(event: InternalEvent, run: () => void | Promise<void>): void {
    try {
      const result = run();
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.logger.error({ err, eventType: event.type, eventId: event.id }, 'Event handler rejected');
        });
      }
    } catch (err) {
      this.logger.error({ err, eventType: event.type, eventId: event.id }, 'Event handler threw');
    }
  }
}
