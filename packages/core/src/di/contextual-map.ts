import createDebug from "debug";
import type { DependencyKey, DependencyResolver } from "@depwire/types";
import { DependencyMap } from "./dependency-map";

const debug = createDebug("depwire:core:map");

/**
 * A dependency map that can switch between named contexts (a tenant, a
 * locale). Each context is an isolated `DependencyMap` seeded from the root
 * registrations when first selected, so singleton factories run once per
 * context.
 *
 * Resolution, membership and `value` follow the selected context; `register`
 * and the other registration helpers always target the root, affecting
 * contexts created afterwards.
 */
export class ContextualDependencyMap extends DependencyMap {
  private readonly contexts = new Map<string, DependencyMap>();
  private active: DependencyMap = this;

  /** Selects (creating on first use) the map for `name`; `null` selects the root. */
  context(name: string | null): DependencyMap {
    if (name === null) {
      this.active = this;
      return this;
    }

    let map = this.contexts.get(name);
    if (!map) {
      debug("[%s] initializing context %s", this.name, name);
      map = new DependencyMap({ ...this.options, name: `${this.name}/${name}` });
      this.copyInto(map);
      this.contexts.set(name, map);
    }

    debug("[%s] switched to context %s", this.name, name);
    this.active = map;
    return map;
  }

  /** Name of the selected context, `null` for the root. */
  get current(): string | null {
    for (const [name, map] of this.contexts) {
      if (map === this.active) return name;
    }
    return null;
  }

  /** Drops every context and selects the root. */
  resetContexts(): void {
    this.contexts.clear();
    this.active = this;
  }

  override resolveWith<T>(key: DependencyKey<T>, resolver: DependencyResolver): T {
    if (this.active === this) return super.resolveWith(key, resolver);
    return this.active.resolveWith(key, resolver);
  }

  override contains(key: DependencyKey): boolean {
    if (this.active === this) return super.contains(key);
    return this.active.contains(key);
  }

  override value<T>(key: DependencyKey<T>, value: T): this {
    if (this.active === this) return super.value(key, value);
    this.active.value(key, value);
    return this;
  }
}
