import type { ResourceName } from "./common";

export type ConsumerKind = "constructor" | "provider" | "injection";

/** Identifies the consumer a dependency map is about to be handed to. */
export type InjectionAttributes = {
  kind: ConsumerKind;
  /** Resource name, class name, or `Class.method` for injection methods. */
  consumer: string;
  /** Name of the class that declares the consumer. */
  owner: string;
  /** Custom attributes attached with `@SetMetadata`. */
  metadata: Readonly<Record<string, unknown>>;
};

export type DependencyMap = Record<ResourceName, unknown>;

export type InjectionInterceptor = (
  attrs: InjectionAttributes,
  dependencies: DependencyMap,
) => DependencyMap;
