import type { DependencyKey, DependencyResolver } from "@depwire/types";
import type { DependencyMap } from "./dependency-map";
import { slotOf, type KeySlot } from "./key";

/**
 * Overrides values of a dependency map without touching its registrations.
 * Meant for tests: bind the injector to the overlay and patch what the test
 * needs to fake.
 *
 * Factories of the target resolve their own dependencies through the overlay,
 * so patches are visible anywhere in a dependency graph. Singletons built while
 * patched keep the patched collaborators; call `target.reset()` when tearing
 * down.
 *
 * @example
 * ```ts
 * const deps = new PatchedDependencyMap(map);
 * deps.patch(Redis, fakeRedis);
 * const inject = bind(deps);
 * ```
 */
export class PatchedDependencyMap implements DependencyResolver {
  private readonly patches = new Map<KeySlot, { key: DependencyKey; value: unknown }>();

  constructor(readonly target: DependencyMap) {}

  patch<T>(key: DependencyKey<T>, value: T): this {
    this.patches.set(slotOf(key), { key, value });
    return this;
  }

  unpatch(key: DependencyKey): boolean {
    return this.patches.delete(slotOf(key));
  }

  /** Removes every patch. */
  clear(): void {
    this.patches.clear();
  }

  patchedKeys(): DependencyKey[] {
    return [...this.patches.values()].map((patch) => patch.key);
  }

  resolve<T>(key: DependencyKey<T>): T {
    const patched = this.patches.get(slotOf(key));
    if (patched) {
      // Patches are stored untyped; `patch` checked the value against the key.
      return patched.value as T;
    }
    return this.target.resolveWith(key, this);
  }

  contains(key: DependencyKey): boolean {
    return this.patches.has(slotOf(key)) || this.target.contains(key);
  }
}
