import createDebug from "debug";
import type { DependencyKey, DependencyResolver } from "@depwire/types";
import { DependencyException } from "../errors/dependency-exception";
import { dependencyMapOf, type DependencyEntries } from "../di/dependency-map";
import { isNamedKey, keyToString } from "../di/key";

const debug = createDebug("depwire:core:injector");

/** Maps properties of an operation's dependencies object to the keys that supply them. */
export type InjectionPoints<D> = {
  [K in keyof D]?: DependencyKey<D[K]>;
};

export type WrapOptions = {
  /**
   * Argument index of the dependencies object. Defaults to the operation's
   * `length` minus one, which only finds the dependencies object when no
   * parameter up to and including it has a default value. Pass it explicitly
   * otherwise.
   */
  position?: number;
};

/**
 * Same call signature as the wrapped operation, with the dependencies object
 * optional and partial: whatever the caller supplies wins over injection.
 */
export type InjectedOperation<A extends unknown[], D, R> = {
  (...args: A): R;
  (...args: [...A, Partial<D>]): R;
};

function isDependencyResolver(value: unknown): value is DependencyResolver {
  return (
    typeof value === "object" &&
    value !== null &&
    "resolve" in value &&
    typeof value.resolve === "function" &&
    "contains" in value &&
    typeof value.contains === "function"
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Wraps operations so they receive their dependencies from a resolver.
 *
 * @example
 * ```ts
 * const HASH = new Key<(input: string) => string>("hash");
 * const inject = bind(new DependencyMap().singleton(HASH, () => sha256));
 *
 * const hasher = inject.wrap(
 *   (subject: string, deps: { hash: (input: string) => string }) => deps.hash(subject),
 *   { hash: HASH },
 * );
 *
 * hasher("foobarbaz");                   // resolved hash
 * hasher("x", { hash: (s) => s.length.toString() }); // caller's override
 * ```
 */
export class Injector {
  constructor(readonly dependencies: DependencyResolver) {}

  wrap<A extends unknown[], D extends object, R>(
    operation: (...args: [...A, D]) => R,
    points: InjectionPoints<D>,
    options: WrapOptions = {},
  ): InjectedOperation<A, D, R> {
    const name = operation.name || "anonymous";
    if (options.position === undefined && operation.length === 0) {
      throw new DependencyException(
        `Cannot locate the dependencies object of ${name}; pass { position } when it has a default value`,
      );
    }
    const position = options.position ?? operation.length - 1;
    const hint = options.position === undefined ? "; pass { position } if it has a default value" : "";
    const declared: Readonly<Record<string, DependencyKey | undefined>> = points;

    // Named keys always denote a dependency; class keys only when registered.
    const injectable: Array<readonly [string, DependencyKey]> = [];
    for (const [param, key] of Object.entries(declared)) {
      if (key === undefined) continue;
      if (isNamedKey(key) || this.dependencies.contains(key)) {
        injectable.push([param, key]);
      } else {
        debug("%s: %s is not registered, leaving %s to the caller", name, keyToString(key), param);
      }
    }

    if (injectable.length === 0) {
      debug("%s: no injectable dependencies found", name);
    }

    // Operations take heterogeneous argument lists; the public signature is
    // enforced by InjectedOperation.
    const invoke = operation as (...args: unknown[]) => R;
    const dependencies = this.dependencies;

    return function injected(this: unknown, ...args: unknown[]): R {
      const supplied = args[position];
      let deps: Record<string, unknown>;
      if (supplied === undefined) {
        deps = {};
      } else if (isRecord(supplied)) {
        // Keep the prototype so class instances retain their methods and getters.
        const copy: Record<string, unknown> = Object.create(Object.getPrototypeOf(supplied));
        deps = Object.assign(copy, supplied);
      } else {
        throw new DependencyException(
          `Expected a dependencies object as argument ${position} of ${name}, got ${typeof supplied}${hint}`,
        );
      }

      for (const [param, key] of injectable) {
        if (deps[param] !== undefined) continue;
        debug("%s: injecting %s with %s", name, param, keyToString(key));
        deps[param] = dependencies.resolve(key);
      }

      const leading = args.slice(0, position);
      while (leading.length < position) leading.push(undefined);

      return invoke.apply(this, [...leading, deps, ...args.slice(position + 1)]);
    };
  }
}

/**
 * Creates an injector over a dependency map, or over a plain collection of
 * values, which is turned into a map of instances first.
 */
export function bind(dependencies: DependencyResolver | DependencyEntries): Injector {
  return new Injector(
    isDependencyResolver(dependencies) ? dependencies : dependencyMapOf(dependencies),
  );
}
