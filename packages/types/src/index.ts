export type {
  Type,
  AbstractType,
  KeyPart,
  NamedKey,
  DependencyKey,
  KeyValue,
} from "./common";

export type {
  Lifetime,
  DependencyResolver,
  DependencyRegistry,
  ValueProvider,
  FactoryProvider,
  ClassProvider,
  Provider,
} from "./container";

export type { LogLevel, Logger } from "./telemetry";
