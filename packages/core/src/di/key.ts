import type { AbstractType, DependencyKey, KeyPart, NamedKey } from "@depwire/types";

/**
 * Named dependency token for values that are not naturally a class.
 *
 * Equality is by label parts, so two `Key` objects built from the same parts
 * address the same registration:
 *
 * @example
 * ```ts
 * const HASH = new Key<(input: string) => string>("hash");
 * map.singleton(HASH, () => sha256);
 * map.resolve(new Key("hash")); // same provider
 * ```
 */
export class Key<T = unknown> implements NamedKey<T> {
  readonly kind = "named" as const;
  readonly id: string;
  readonly label: string;
  readonly parts: readonly KeyPart[];
  declare readonly __type?: T;

  constructor(part: KeyPart, ...rest: KeyPart[]) {
    this.parts = Object.freeze([part, ...rest]);
    // Typed pairs keep 1 apart from "1", and NaN apart from Infinity.
    this.id = JSON.stringify(this.parts.map((p) => [typeof p, String(p)]));
    this.label = this.parts.map(String).join(":");
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    return isNamedKey(other) && other.id === this.id;
  }

  toString(): string {
    return `Key(${this.label})`;
  }
}

// Registry index: the class itself, or the canonical id of a named key.
export type KeySlot = string | AbstractType;

export function isNamedKey(value: unknown): value is NamedKey {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "named" &&
    "id" in value &&
    typeof value.id === "string"
  );
}

export function slotOf(key: DependencyKey): KeySlot {
  return typeof key === "function" ? key : key.id;
}

export function keyToString(key: DependencyKey): string {
  if (typeof key === "function") return key.name || "<anonymous class>";
  return key.label;
}
