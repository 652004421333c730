/**
 * pagewise - State Publisher
 * Typed change events followed by a snapshot of the observable state
 *
 * Every `publish` delivers the event to its listeners, then hands the
 * current snapshot to `onSnapshot`. Listeners observe the state already
 * updated, and the snapshot callback sees every change in order.
 */

import type { EventHandler, EventMap, Unsubscribe } from "../types";
import { LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

export interface PublisherConfig<S> {
  /** Reads the observable state after each event */
  snapshot: () => S;

  /** Called after the listeners of every published event */
  onSnapshot?: (state: S) => void;

  /** Called when a listener throws (default: logged) */
  onListenerError?: (error: unknown, event: string) => void;
}

export interface Publisher<T extends EventMap> {
  on: <K extends keyof T>(event: K, handler: EventHandler<T[K]>) => Unsubscribe;
  off: <K extends keyof T>(event: K, handler: EventHandler<T[K]>) => void;
  once: <K extends keyof T>(event: K, handler: EventHandler<T[K]>) => Unsubscribe;

  /** Deliver an event, then the snapshot */
  publish: <K extends keyof T>(event: K, payload: T[K]) => void;

  /** Drop every listener; later events only reach `onSnapshot` */
  clear: () => void;
}

type Listeners<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Implementation
// =============================================================================

export const createPublisher = <T extends EventMap, S>(
  config: PublisherConfig<S>,
): Publisher<T> => {
  const {
    snapshot,
    onSnapshot,
    onListenerError = (error: unknown, event: string): void => {
      console.error(`${LOG_PREFIX} Error in "${event}" listener:`, error);
    },
  } = config;

  const listeners: Listeners<T> = {};

  const handlersOf = <K extends keyof T>(event: K): Set<EventHandler<T[K]>> => {
    let handlers = listeners[event];
    if (!handlers) {
      handlers = new Set();
      listeners[event] = handlers;
    }
    return handlers;
  };

  const on = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): Unsubscribe => {
    handlersOf(event).add(handler);
    return () => off(event, handler);
  };

  const off = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): void => {
    listeners[event]?.delete(handler);
  };

  const once = <K extends keyof T>(event: K, handler: EventHandler<T[K]>): Unsubscribe => {
    const unsubscribe = on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  };

  const publish = <K extends keyof T>(event: K, payload: T[K]): void => {
    const handlers = listeners[event];
    if (handlers) {
      // A listener may unsubscribe while the event is delivered
      for (const handler of Array.from(handlers)) {
        try {
          handler(payload);
        } catch (error) {
          onListenerError(error, String(event));
        }
      }
    }
    onSnapshot?.(snapshot());
  };

  return {
    on,
    off,
    once,
    publish,
    clear: () => {
      for (const event in listeners) {
        delete listeners[event];
      }
    },
  };
};
