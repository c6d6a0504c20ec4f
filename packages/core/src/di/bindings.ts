import type { DependencyResolver, Lifetime, Provider } from "@depwire/types";
import { DependencyException } from "../errors/dependency-exception";
import { currentDependencyContext, type DependencyContext } from "./context";

export type BindingKind = "instance" | "factory" | "singleton" | "context";

type Construct<T> = (resolver: DependencyResolver) => T;

type Cell<T> = {
  readonly value: T;
};

/** Registry-owned strategy turning a registration into a value. */
export interface Binding<T = unknown> {
  readonly kind: BindingKind;
  get(resolver: DependencyResolver): T;
  /** Drops any cached value; the next `get` constructs again. */
  reset(): void;
  /** Same recipe with fresh cache cells, for contextual maps. */
  clone(): Binding<T>;
}

export class InstanceBinding<T> implements Binding<T> {
  readonly kind = "instance";

  constructor(private readonly value: T) {}

  get(): T {
    return this.value;
  }

  reset(): void {}

  clone(): Binding<T> {
    return this;
  }
}

export class FactoryBinding<T> implements Binding<T> {
  readonly kind = "factory";

  constructor(private readonly construct: Construct<T>) {}

  get(resolver: DependencyResolver): T {
    return this.construct(resolver);
  }

  reset(): void {}

  clone(): Binding<T> {
    return new FactoryBinding(this.construct);
  }
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" && value !== null && "then" in value && typeof value.then === "function"
  );
}

/**
 * Check-construct-store over one cache cell. A throwing constructor leaves the
 * cell empty. A constructor returning a promise has the promise cached, and a
 * rejected promise is evicted so the next resolution constructs again.
 */
abstract class CachedBinding<T> implements Binding<T> {
  abstract readonly kind: BindingKind;

  constructor(protected readonly construct: Construct<T>) {}

  protected abstract load(): Cell<T> | undefined;
  protected abstract store(cell: Cell<T>): void;
  protected abstract evict(cell: Cell<T>): void;
  abstract reset(): void;
  abstract clone(): Binding<T>;

  get(resolver: DependencyResolver): T {
    const cached = this.load();
    if (cached) return cached.value;

    const cell: Cell<T> = { value: this.construct(resolver) };
    this.store(cell);

    if (isPromiseLike(cell.value)) {
      void cell.value.then(undefined, () => this.evict(cell));
    }

    return cell.value;
  }
}

export class SingletonBinding<T> extends CachedBinding<T> {
  readonly kind = "singleton";
  private cell: Cell<T> | undefined;

  protected load(): Cell<T> | undefined {
    return this.cell;
  }

  protected store(cell: Cell<T>): void {
    this.cell = cell;
  }

  protected evict(cell: Cell<T>): void {
    if (this.cell === cell) this.cell = undefined;
  }

  reset(): void {
    this.cell = undefined;
  }

  clone(): Binding<T> {
    return new SingletonBinding(this.construct);
  }
}

export class ContextBinding<T> extends CachedBinding<T> {
  readonly kind = "context";
  private cells = new WeakMap<DependencyContext, Cell<T>>();

  protected load(): Cell<T> | undefined {
    return this.cells.get(currentDependencyContext());
  }

  protected store(cell: Cell<T>): void {
    this.cells.set(currentDependencyContext(), cell);
  }

  protected evict(cell: Cell<T>): void {
    // Promise reactions run in the context that registered them.
    const context = currentDependencyContext();
    if (this.cells.get(context) === cell) this.cells.delete(context);
  }

  reset(): void {
    this.cells = new WeakMap();
  }

  clone(): Binding<T> {
    return new ContextBinding(this.construct);
  }
}

function bindingFor<T>(construct: Construct<T>, lifetime: Lifetime = "transient"): Binding<T> {
  switch (lifetime) {
    case "transient":
      return new FactoryBinding(construct);
    case "singleton":
      return new SingletonBinding(construct);
    case "context":
      return new ContextBinding(construct);
  }
}

export function createBinding<T>(provider: Provider<T>): Binding<T> {
  if ("useValue" in provider) {
    return new InstanceBinding(provider.useValue);
  }

  if ("useFactory" in provider) {
    return bindingFor(provider.useFactory, provider.lifetime);
  }

  if ("useClass" in provider) {
    const { useClass, inject = [] } = provider;
    return bindingFor(
      (resolver) => new useClass(...inject.map((key) => resolver.resolve(key))),
      provider.lifetime,
    );
  }

  throw new DependencyException("Invalid provider configuration");
}
