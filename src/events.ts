/**
 * SQLBatcher Event System — Typed event emitter
 *
 * Flush, warning, adapter and error diagnostics flow through this. Wraps a
 * Node EventEmitter so only the names and payloads of BatcherEvents go in.
 */

import { EventEmitter } from 'events';
import type { BatcherEvents } from './types.js';

export type BatcherEventName = keyof BatcherEvents;
export type BatcherListener<E extends BatcherEventName> = (payload: BatcherEvents[E]) => void;

export class BatcherEventEmitter {
  private readonly events = new EventEmitter();

  on<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.events.on(event, listener);
    return this;
  }

  once<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.events.once(event, listener);
    return this;
  }

  off<E extends BatcherEventName>(event: E, listener: BatcherListener<E>): this {
    this.events.off(event, listener);
    return this;
  }

  /**
   * Returns false when nothing listens. An unheard 'error' is dropped, not
   * thrown: the caller already throws the BatcherError it reports.
   */
  emit<E extends BatcherEventName>(event: E, payload: BatcherEvents[E]): boolean {
    if (this.events.listenerCount(event) === 0) return false;
    return this.events.emit(event, payload);
  }

  listenerCount(event: BatcherEventName): number {
    return this.events.listenerCount(event);
  }
}
