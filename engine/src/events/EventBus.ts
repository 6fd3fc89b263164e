/**
 * EventBus - pub/sub for engine lifecycle events
 *
 * - Typed: handlers receive the payload of the event type they subscribed to
 * - Sequential: handlers run in registration order and async ones are awaited
 * - Isolated: a failing handler is reported to the logger and never reaches
 *   the run that emitted the event
 *
 * @example
 * ```ts
 * const bus = new EventBus(logger);
 * bus.on(EngineEventType.TASK_COMPLETED, (event) => {
 *   console.log(event.payload.taskName, event.payload.result);
 * });
 * ```
 *
 * @module events
 */

import type { FlowLogger } from '../types/log-types.js';
import type { EngineEvent, EngineEventType } from './EngineEvents.js';

export type EventHandler<K extends EngineEventType = EngineEventType> = (
  event: EngineEvent<K>
) => void | Promise<void>;

export class EventBus {
  private listeners: Map<EngineEventType, EventHandler[]> = new Map();
  private wildcardListeners: EventHandler[] = [];

  constructor(private readonly logger?: FlowLogger) {}

  /**
   * Subscribe to one event type
   *
   * @returns Unsubscribe function
   */
  on<K extends EngineEventType>(type: K, handler: EventHandler<K>): () => void {
    const wrapped: EventHandler = (event) => (isEventOf(event, type) ? handler(event) : undefined);
    const handlers = this.listeners.get(type) ?? [];
    handlers.push(wrapped);
    this.listeners.set(type, handlers);

    return () => {
      const index = handlers.indexOf(wrapped);
      if (index !== -1) {
        handlers.splice(index, 1);
      }
    };
  }

  /**
   * Subscribe to every event
   */
  onAny(handler: EventHandler): () => void {
    this.wildcardListeners.push(handler);
    return () => {
      const index = this.wildcardListeners.indexOf(handler);
      if (index !== -1) {
        this.wildcardListeners.splice(index, 1);
      }
    };
  }

  async emit<K extends EngineEventType>(event: EngineEvent<K>): Promise<void> {
    const handlers = [...(this.listeners.get(event.type) ?? [])];
    for (const handler of handlers) {
      await this.invoke(event.type, event.runId, () => handler(event));
    }
    for (const handler of [...this.wildcardListeners]) {
      await this.invoke(event.type, event.runId, () => handler(event));
    }
  }

  listenerCount(type: EngineEventType): number {
    return (this.listeners.get(type)?.length ?? 0) + this.wildcardListeners.length;
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  private async invoke(type: EngineEventType, runId: string, call: () => void | Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (this.logger) {
        this.logger.error(`Event handler failed for "${type}"`, error, { runId });
      } else {
        console.error(`[EventBus] Handler error for event '${type}':`, error);
      }
    }
  }
}

function isEventOf<K extends EngineEventType>(event: EngineEvent, type: K): event is EngineEvent<K> {
  return event.type === type;
}
