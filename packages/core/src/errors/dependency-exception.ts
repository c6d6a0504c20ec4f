import type { DependencyKey } from "@depwire/types";
import { keyToString } from "../di/key";

export class DependencyException extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DependencyException";
  }
}

export class UnknownDependencyException extends DependencyException {
  constructor(public readonly key: DependencyKey) {
    super(`No provider registered for ${keyToString(key)}`);
    this.name = "UnknownDependencyException";
  }
}

export class CircularDependencyException extends DependencyException {
  constructor(public readonly path: readonly DependencyKey[]) {
    super(`Circular dependency detected: ${path.map(keyToString).join(" → ")}`);
    this.name = "CircularDependencyException";
  }
}
