// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

export interface EngineEventMap {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for engine events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EngineEventMap> {
  /** Emit a typed event, injecting a timestamp when it is empty. */
  emitEvent(event: EngineEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
