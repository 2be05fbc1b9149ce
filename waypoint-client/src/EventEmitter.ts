/**
 * EventEmitter - Generic typed event emitter
 *
 * Provides a type-safe event subscription system with support for:
 * - Multiple handlers per event
 * - One-time handlers (once)
 * - Unsubscribe functions
 */

type HandlerSets<TEvents> = { [K in keyof TEvents]?: Set<TEvents[K]> };

/**
 * Generic event emitter with type-safe event handling
 * @typeParam TEvents - Interface mapping event names to handler signatures
 */
export class EventEmitter<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  TEvents extends { [K in keyof TEvents]: (...args: any[]) => void },
> {
  private handlers: HandlerSets<TEvents> = {};
  private onceHandlers: HandlerSets<TEvents> = {};

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof TEvents>(event: K, handler: TEvents[K]): () => void {
    let eventHandlers = this.handlers[event];
    if (!eventHandlers) {
      eventHandlers = new Set();
      this.handlers[event] = eventHandlers;
    }
    eventHandlers.add(handler);

    return () => {
      this.off(event, handler);
    };
  }

  /**
   * Subscribe to an event once (automatically unsubscribes after first call)
   */
  once<K extends keyof TEvents>(event: K, handler: TEvents[K]): void {
    let once = this.onceHandlers[event];
    if (!once) {
      once = new Set();
      this.onceHandlers[event] = once;
    }
    once.add(handler);
    this.on(event, handler);
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof TEvents>(event: K, handler: TEvents[K]): void {
    this.handlers[event]?.delete(handler);
    this.onceHandlers[event]?.delete(handler);
  }

  /**
   * Remove all event listeners
   */
  removeAllListeners(): void {
    this.handlers = {};
    this.onceHandlers = {};
  }

  /**
   * Emit an event to all subscribers
   */
  protected emit<K extends keyof TEvents>(
    event: K,
    ...args: Parameters<TEvents[K]>
  ): void {
    const eventHandlers = this.handlers[event];
    if (!eventHandlers) return;

    for (const handler of Array.from(eventHandlers)) {
      if (this.onceHandlers[event]?.delete(handler)) {
        eventHandlers.delete(handler);
      }
      try {
        handler(...args);
      } catch (error) {
        console.error(`Error in event handler for ${String(event)}:`, error);
      }
    }
  }

  /**
   * Get the number of listeners for an event
   */
  listenerCount<K extends keyof TEvents>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
