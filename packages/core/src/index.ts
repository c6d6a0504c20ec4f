// DI
export { Key, isNamedKey, keyToString } from "./di/key";
export { DependencyMap, dependencyMapOf } from "./di/dependency-map";
export { ContextualDependencyMap } from "./di/contextual-map";
export { PatchedDependencyMap } from "./di/patched-map";
export {
  runInDependencyContext,
  currentDependencyContext,
  ROOT_CONTEXT,
} from "./di/context";

// Injection
export { Injector, bind } from "./functions/injector";

// Errors
export {
  DependencyException,
  UnknownDependencyException,
  CircularDependencyException,
} from "./errors/dependency-exception";

// Re-export key types from @depwire/types
export type {
  Type,
  AbstractType,
  KeyPart,
  NamedKey,
  DependencyKey,
  KeyValue,
  Lifetime,
  Provider,
  ValueProvider,
  FactoryProvider,
  ClassProvider,
  DependencyResolver,
  DependencyRegistry,
  Logger,
  LogLevel,
} from "@depwire/types";

// Re-export types defined in core
export type { KeySlot } from "./di/key";
export type { DependencyMapOptions, DependencyEntries } from "./di/dependency-map";
export type { DependencyContext } from "./di/context";
export type { BindingKind } from "./di/bindings";
export type { InjectionPoints, WrapOptions, InjectedOperation } from "./functions/injector";
