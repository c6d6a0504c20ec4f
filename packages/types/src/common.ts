// Constructor type for class providers. Uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Class or abstract class used as a dependency key; concrete classes satisfy it too.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

export type KeyPart = string | number | boolean;

/**
 * Named dependency token, for dependencies that are not naturally a class
 * (a hashing function, a connection string). Implemented by `Key` in
 * `@depwire/core`; two named keys are equal iff their ids are equal.
 */
export interface NamedKey<T = unknown> {
  readonly kind: "named";
  /** Canonical identity used to index the registry. */
  readonly id: string;
  /** Human-readable label for errors and logs. */
  readonly label: string;
  readonly parts: readonly KeyPart[];
  // Phantom field carrying the resolved type; never set at runtime.
  readonly __type?: T;
}

// Token for dependency injection: a named key or a class reference
export type DependencyKey<T = unknown> = NamedKey<T> | AbstractType<T>;

// Resolved value type of a dependency key
export type KeyValue<K> =
  K extends NamedKey<infer T> ? T : K extends AbstractType<infer T> ? T : never;
