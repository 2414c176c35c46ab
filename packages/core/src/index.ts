import "reflect-metadata";

// Decorators
export { Provide } from "./decorators/provide";
export { Injectable, Inject } from "./decorators/injectable";
export { SetMetadata } from "./decorators/metadata";

// DI
export { Injector } from "./di/injector";
export { Resolver } from "./di/resolver";
export { scanModules } from "./di/scanner";
export { buildDependencyGraph, findCycle, assertAcyclic } from "./di/dependency-graph";
export { createSignature } from "./di/signature";

// Application
export { InjectorFactory } from "./application/factory";

// Errors
export {
  InjectorException,
  InjectionError,
  CircularDependencyError,
} from "./errors/injector-exception";

// Metadata constants (used by tooling that reads declarations)
export {
  PROVIDER_METADATA,
  INJECTION_METHODS_METADATA,
  INJECTABLE_METADATA,
  CUSTOM_METADATA,
} from "./metadata/constants";

// Re-export key types from @wirebox/types
export type {
  Type,
  ResourceName,
  ParameterKind,
  ParameterSpec,
  ParameterDeclaration,
  ConsumerKind,
  InjectionAttributes,
  DependencyMap,
  InjectionInterceptor,
  ResourceInjector,
} from "@wirebox/types";

// Re-export types defined in core
export type { CreateOptions } from "./application/factory";
export type { ProviderBinding, ProviderMap } from "./di/scanner";
export type { DependencyGraph } from "./di/dependency-graph";
export type { Signature, Parameter } from "./di/signature";
