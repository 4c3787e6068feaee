// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for run and node events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit an event, filling in the timestamp when the event carries an empty one. */
  emitEvent(event: EngineEvent): void {
    const timestamped =
      'timestamp' in event && !event.timestamp
        ? { ...event, timestamp: new Date().toISOString() }
        : event;
    this.emit('event', timestamped);
  }
}
