import { EventEmitter } from "node:events";
import type { RequestFailure, RequestSuccess } from "./domain/index.js";

/**
 * Notifications a load-test host publishes to its listeners
 */
export interface LoadTestEventMap {
  requestSuccess: RequestSuccess;
  requestFailure: RequestFailure;
  quitting: void;
}

export type LoadTestEventName = keyof LoadTestEventMap;

/**
 * Request listeners run on the request-issuing path and must return
 * synchronously. Quitting listeners may return a promise the host waits for.
 */
export type LoadTestListener<K extends LoadTestEventName> = K extends "quitting"
  ? () => void | Promise<void>
  : (payload: LoadTestEventMap[K]) => void;

/**
 * Registration side of the host's event bus
 */
export interface LoadTestEvents {
  /** Register a listener; the returned function removes it again */
  on<K extends LoadTestEventName>(event: K, listener: LoadTestListener<K>): () => void;
}

/**
 * Typed event bus for load-test hosts, backed by Node's EventEmitter
 */
export class LoadTestEventBus implements LoadTestEvents {
  private readonly emitter = new EventEmitter();
  private readonly quittingListeners = new Set<() => void | Promise<void>>();

  constructor() {
    // One listener per reporter/plugin; many simulated users never register
    this.emitter.setMaxListeners(100);
  }

  on<K extends LoadTestEventName>(event: K, listener: LoadTestListener<K>): () => void {
    if (isQuittingListener(event, listener)) {
      this.quittingListeners.add(listener);
      return () => {
        this.quittingListeners.delete(listener);
      };
    }

    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  /**
   * Dispatch a request notification to every listener, synchronously
   */
  emit<K extends Exclude<LoadTestEventName, "quitting">>(event: K, payload: LoadTestEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  /**
   * Dispatch `quitting` and wait for every listener to settle. Listener
   * failures are collected and rethrown together once all have settled.
   */
  async quit(): Promise<void> {
    const listeners = [...this.quittingListeners];
    const results = await Promise.allSettled(listeners.map(async (listener) => listener()));
    const failures = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));

    if (failures.length > 0) {
      throw new AggregateError(failures, "quitting listener failed");
    }
  }

  listenerCount(event: LoadTestEventName): number {
    return event === "quitting" ? this.quittingListeners.size : this.emitter.listenerCount(event);
  }
}

function isQuittingListener<K extends LoadTestEventName>(
  event: K,
  listener: LoadTestListener<K> | LoadTestListener<"quitting">
): listener is LoadTestListener<"quitting"> {
  return event === "quitting";
}
