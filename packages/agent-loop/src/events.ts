/**
 * Event system for the tool-calling session.
 *
 * Every step of a `send` emits a typed event, delivered synchronously to the
 * host application through the EventEmitter.
 */

/**
 * Discriminator tags for session events.
 */
export type EventKind =
  | "TURN_START"
  | "TEXT_DELTA"
  | "TOOL_CALL_START"
  | "TOOL_CALL_END"
  | "ITERATION_LIMIT"
  | "FINISHED"
  | "ERROR";

/**
 * A single event emitted by the session.
 */
export interface SessionEvent {
  kind: EventKind;
  timestamp: number;
  data?: Record<string, unknown>;
}

type EventHandler = (event: SessionEvent) => void;

/**
 * Simple synchronous event emitter for session events.
 */
export class EventEmitter {
  private _handlers: Map<EventKind, EventHandler[]> = new Map();
  private _anyHandlers: EventHandler[] = [];

  /**
   * Subscribe to a specific event kind. Returns an unsubscribe function.
   */
  on(kind: EventKind, handler: EventHandler): () => void {
    let handlers = this._handlers.get(kind);
    if (!handlers) {
      handlers = [];
      this._handlers.set(kind, handlers);
    }
    handlers.push(handler);
    return () => this.off(kind, handler);
  }

  /**
   * Subscribe to all events.
   */
  onAny(handler: EventHandler): void {
    this._anyHandlers.push(handler);
  }

  off(kind: EventKind, handler: EventHandler): void {
    const handlers = this._handlers.get(kind);
    if (!handlers) return;
    const idx = handlers.indexOf(handler);
    if (idx !== -1) handlers.splice(idx, 1);
  }

  /**
   * Emit an event to all matching subscribers, specific handlers first.
   */
  emit(event: SessionEvent): void {
    const handlers = this._handlers.get(event.kind);
    if (handlers) {
      for (const handler of [...handlers]) {
        handler(event);
      }
    }
    for (const handler of [...this._anyHandlers]) {
      handler(event);
    }
  }
}
