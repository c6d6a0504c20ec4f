import type { DependencyKey, Type } from "./common";

/**
 * How often a factory runs:
 * - `transient`: on every resolution
 * - `singleton`: once per registration
 * - `context`: once per dependency context
 */
export type Lifetime = "transient" | "singleton" | "context";

/** Read side of a dependency registry, handed to factories and injectors. */
export interface DependencyResolver {
  resolve<T>(key: DependencyKey<T>): T;
  contains(key: DependencyKey): boolean;
}

/** Minimal registry contract for packages that register their own dependencies. */
export interface DependencyRegistry extends DependencyResolver {
  register<T>(key: DependencyKey<T>, provider: Provider<T>): void;
  delete(key: DependencyKey): boolean;
}

// Provider registration for the dependency map
export type ValueProvider<T = unknown> = {
  useValue: T;
};

export type FactoryProvider<T = unknown> = {
  useFactory: (resolver: DependencyResolver) => T;
  lifetime?: Lifetime;
};

export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
  inject?: DependencyKey[];
  lifetime?: Lifetime;
};

export type Provider<T = unknown> = ValueProvider<T> | FactoryProvider<T> | ClassProvider<T>;
