/**
 * Singleton registry: sole owner of long-lived component instances.
 * No decorators, no reflect-metadata, no module-global state: one registry
 * is created at process start and threaded through the composition root.
 */

import type {
  Disposer,
  SingletonHandle,
  SingletonRegistry,
  SingletonRegistryStats,
} from "../core/ports/singleton-registry.js";

export class InvalidNameError extends Error {
  constructor() {
    super("[Registry] Component name must be a non-empty string");
    this.name = "InvalidNameError";
  }
}

interface RegistryOptions {
  /** Wall-clock source for handle timestamps */
  readonly wallTime?: () => Date;
}

type Release = () => Promise<void> | void;

export const createSingletonRegistry = (options: RegistryOptions = {}): SingletonRegistry => {
  const wallTime = options.wallTime ?? (() => new Date());
  const handles = new Map<string, SingletonHandle>();
  const releases = new Map<string, Release>();
  let created = 0;
  let replaced = 0;
  let deleted = 0;

  const assertName = (name: string): void => {
    if (name.length === 0) throw new InvalidNameError();
  };

  const bind = <T>(name: string, instance: T, dispose: Disposer<T> | undefined): void => {
    handles.set(name, { name, instance, createdAt: wallTime().toISOString() });
    if (dispose) {
      releases.set(name, () => dispose(instance));
    } else {
      releases.delete(name);
    }
  };

  // The binding is gone before the release is awaited, so a concurrent
  // getOrCreate already builds the replacement.
  const unbind = (name: string): Release | undefined => {
    const release = releases.get(name);
    releases.delete(name);
    handles.delete(name);
    return release;
  };

  return {
    getOrCreate<T>(name: string, factory: () => T, dispose?: Disposer<T>): T {
      assertName(name);
      const existing = handles.get(name);
      if (existing !== undefined) {
        return existing.instance as T;
      }
      // A throwing factory propagates before anything is bound
      const instance = factory();
      bind(name, instance, dispose);
      created++;
      return instance;
    },

    async replace<T>(name: string, instance: T, dispose?: Disposer<T>): Promise<void> {
      assertName(name);
      const previous = unbind(name);
      bind(name, instance, dispose);
      replaced++;
      await previous?.();
    },

    async delete(name: string): Promise<boolean> {
      assertName(name);
      if (!handles.has(name)) return false;
      const release = unbind(name);
      deleted++;
      await release?.();
      return true;
    },

    exists(name: string): boolean {
      assertName(name);
      return handles.has(name);
    },

    handle(name: string): SingletonHandle | undefined {
      return handles.get(name);
    },

    names(): string[] {
      return [...handles.keys()].sort();
    },

    async clear(): Promise<number> {
      const pending = [...handles.keys()].map(unbind);
      deleted += pending.length;
      await Promise.all(pending.map((release) => release?.()));
      return pending.length;
    },

    stats(): SingletonRegistryStats {
      return { instances: handles.size, created, replaced, deleted };
    },
  };
};

/** Well-known component names */
export const Components = {
  Config: "config",
  Logger: "logger",
  Metrics: "metrics",
  Cache: "cache",
  HttpClient: "http_client",
  WebSocketClient: "websocket_client",
  CircuitBreakers: "circuit_breakers",
  Health: "health",
} as const;

export type ComponentName = (typeof Components)[keyof typeof Components];
