import type { MetricSnapshot, StateEvent } from './core';

/**
 * Core abstraction for persistence backends.
 * All database-specific implementations must conform to this interface.
 *
 * Implementations may buffer internally, but a `get` issued after a `set`
 * for the same key must observe the new value.
 */
export interface PersistenceStore {
  /**
   * Retrieve the stored value for a key.
   *
   * @returns The stored value, or null if not found
   */
  get(key: string): Promise<string | null>;

  /**
   * Store a value, replacing any previous one.
   *
   * @example
   * await store.set('occupancy:binary_sensor.hall', '{"v":1,"totalDuration":12}')
   */
  set(key: string, value: string): Promise<void>;

  /** Remove a key. Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;

  /**
   * Optional: Initialize provider resources (connections, schemas, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}

/** Source of the current time in epoch ms. */
export interface Clock {
  now(): number;
}

export type Unsubscribe = () => void | Promise<void>;

export type StateEventHandler = (event: StateEvent) => void | Promise<void>;

/**
 * Delivers state changes from the host's event bus.
 *
 * Events for a given source arrive serially and, mostly, in time order.
 * Duplicates are allowed.
 */
export interface SourceWatcher {
  subscribe(handler: StateEventHandler): Unsubscribe | Promise<Unsubscribe>;
}

/**
 * Sink for computed metrics. Naming, units and exposure are up to the
 * implementation.
 */
export interface MetricPublisher {
  publish(snapshot: MetricSnapshot): void;

  /** Optional: drop everything published for a removed source. */
  retract?(sourceId: string): void;
}

/**
 * Lists the sources eligible for tracking.
 */
export interface SourceDiscovery {
  listSources(): Promise<string[]>;
}
