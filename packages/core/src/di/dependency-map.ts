import createDebug from "debug";
import type {
  DependencyKey,
  DependencyRegistry,
  DependencyResolver,
  Logger,
  Provider,
} from "@depwire/types";
import {
  CircularDependencyException,
  DependencyException,
  UnknownDependencyException,
} from "../errors/dependency-exception";
import { createBinding, isPromiseLike, type Binding } from "./bindings";
import { Key, keyToString, slotOf, type KeySlot } from "./key";

const debug = createDebug("depwire:core:map");

export type DependencyMapOptions = {
  /** Shown in debug output; useful when several maps coexist. */
  name?: string;
  /** Receives constructor failures before they are rethrown. */
  logger?: Logger;
};

type Registration = {
  key: DependencyKey;
  binding: Binding;
};

// Constructor failures already reported by an inner resolution.
const reported = new WeakSet<object>();

export class DependencyMap implements DependencyRegistry {
  protected readonly registrations = new Map<KeySlot, Registration>();
  private readonly resolving = new Set<KeySlot>();
  private readonly resolvingPath: DependencyKey[] = [];

  constructor(protected readonly options: DependencyMapOptions = {}) {}

  get name(): string {
    return this.options.name ?? "default";
  }

  register<T>(key: DependencyKey<T>, provider: Provider<T>): void {
    const binding = createBinding(provider);
    debug("[%s] register %s (%s)", this.name, keyToString(key), binding.kind);
    this.registrations.set(slotOf(key), { key, binding });
  }

  value<T>(key: DependencyKey<T>, value: T): this {
    this.register(key, { useValue: value });
    return this;
  }

  factory<T>(key: DependencyKey<T>, construct: (resolver: DependencyResolver) => T): this {
    this.register(key, { useFactory: construct, lifetime: "transient" });
    return this;
  }

  singleton<T>(key: DependencyKey<T>, construct: (resolver: DependencyResolver) => T): this {
    this.register(key, { useFactory: construct, lifetime: "singleton" });
    return this;
  }

  contextual<T>(key: DependencyKey<T>, construct: (resolver: DependencyResolver) => T): this {
    this.register(key, { useFactory: construct, lifetime: "context" });
    return this;
  }

  resolve<T>(key: DependencyKey<T>): T {
    return this.resolveWith(key, this);
  }

  /**
   * Resolves `key`, handing `resolver` to constructors so that overlays such as
   * `PatchedDependencyMap` also see the nested lookups of a factory.
   */
  resolveWith<T>(key: DependencyKey<T>, resolver: DependencyResolver): T {
    const slot = slotOf(key);
    const registration = this.registrations.get(slot);
    if (!registration) {
      throw new UnknownDependencyException(key);
    }

    const { binding } = registration;
    if (binding.kind === "instance") {
      // Values in the map are stored untyped; the key's type parameter is the contract.
      return binding.get(resolver) as T;
    }

    if (this.resolving.has(slot)) {
      throw new CircularDependencyException([...this.resolvingPath, key]);
    }

    debug("[%s] resolve %s (%s)", this.name, keyToString(key), binding.kind);
    this.resolving.add(slot);
    this.resolvingPath.push(key);
    try {
      const value = binding.get(resolver);
      if (isPromiseLike(value)) {
        void value.then(undefined, (error: unknown) => this.report(key, error));
      }
      return value as T;
    } catch (error) {
      this.report(key, error);
      throw error;
    } finally {
      this.resolving.delete(slot);
      this.resolvingPath.pop();
    }
  }

  contains(key: DependencyKey): boolean {
    return this.registrations.has(slotOf(key));
  }

  delete(key: DependencyKey): boolean {
    debug("[%s] delete %s", this.name, keyToString(key));
    return this.registrations.delete(slotOf(key));
  }

  /** Registered keys, in registration order. Diagnostics only. */
  keys(): DependencyKey[] {
    return [...this.registrations.values()].map((registration) => registration.key);
  }

  /**
   * Discards cached singleton and context values so they are constructed again
   * on next resolution. Resets every registration when called without keys.
   */
  reset(...keys: DependencyKey[]): void {
    const targets =
      keys.length > 0
        ? keys.map((key) => this.registrations.get(slotOf(key)))
        : [...this.registrations.values()];

    for (const registration of targets) {
      registration?.binding.reset();
    }
  }

  /** Copies every registration into `target` with fresh cache cells. */
  protected copyInto(target: DependencyMap): void {
    for (const [slot, { key, binding }] of this.registrations) {
      target.registrations.set(slot, { key, binding: binding.clone() });
    }
  }

  private report(key: DependencyKey, error: unknown): void {
    if (error instanceof DependencyException) return;
    if (typeof error === "object" && error !== null) {
      if (reported.has(error)) return;
      reported.add(error);
    }

    debug("[%s] constructing %s failed", this.name, keyToString(key));
    this.options.logger?.error("Unexpected problem when creating an instance", {
      key: keyToString(key),
      map: this.name,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export type DependencyEntries =
  | Iterable<readonly [DependencyKey, unknown]>
  | Readonly<Record<string, unknown>>;

function isPairIterable(
  entries: DependencyEntries,
): entries is Iterable<readonly [DependencyKey, unknown]> {
  return Symbol.iterator in entries;
}

/**
 * Builds a map of plain values. Accepts a `Map`, an array of `[key, value]`
 * pairs, or a record whose property names become `Key`s.
 *
 * @example
 * ```ts
 * const map = dependencyMapOf({ greeting: "hello" });
 * map.resolve(new Key("greeting")); // "hello"
 * ```
 */
export function dependencyMapOf(
  entries: DependencyEntries,
  options?: DependencyMapOptions,
): DependencyMap {
  const map = new DependencyMap(options);
  const pairs = isPairIterable(entries)
    ? entries
    : Object.entries(entries).map(([name, value]) => [new Key(name), value] as const);

  for (const [key, value] of pairs) {
    map.value(key, value);
  }
  return map;
}
