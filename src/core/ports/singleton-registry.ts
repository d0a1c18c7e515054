/**
 * Port: Singleton Registry: sole owner of long-lived component instances.
 * At most one live instance per name.
 */

export interface SingletonHandle<T = unknown> {
  readonly name: string;
  readonly instance: T;
  /** Wall-clock creation time (ISO-8601) */
  readonly createdAt: string;
}

export interface SingletonRegistryStats {
  readonly instances: number;
  readonly created: number;
  readonly replaced: number;
  readonly deleted: number;
}

/** Releases what an instance holds (open sockets, timers) when its binding is dropped */
export type Disposer<T> = (instance: T) => Promise<void> | void;

export interface SingletonRegistry {
  /**
   * Return the live instance, constructing it with `factory` only if absent.
   * `dispose` runs when the binding is later deleted, replaced or cleared.
   */
  getOrCreate<T>(name: string, factory: () => T, dispose?: Disposer<T>): T;
  /** Bind `instance` to `name`, disposing any previous binding */
  replace<T>(name: string, instance: T, dispose?: Disposer<T>): Promise<void>;
  /** Remove and dispose the binding; the next getOrCreate constructs afresh */
  delete(name: string): Promise<boolean>;
  exists(name: string): boolean;
  handle(name: string): SingletonHandle | undefined;
  names(): string[];
  /** Drop and dispose every binding; returns how many were removed */
  clear(): Promise<number>;
  stats(): SingletonRegistryStats;
}
