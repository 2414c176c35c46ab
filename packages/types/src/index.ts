export type {
  Type,
  ResourceName,
  ParameterKind,
  ParameterSpec,
  ParameterDeclaration,
} from "./common";

export type {
  ConsumerKind,
  InjectionAttributes,
  DependencyMap,
  InjectionInterceptor,
} from "./injection";

export type { ResourceInjector } from "./container";
