import type { ResourceName, Type } from "./common";
import type { DependencyMap, InjectionInterceptor } from "./injection";

/** Public contract of an injector built from provider modules. */
export interface ResourceInjector {
  create<T extends object>(target: Type<T>, overrides?: DependencyMap): T;
  inject<T extends object>(instance: T, overrides?: DependencyMap): T;
  require<T = unknown>(name: ResourceName): T;
  has(name: ResourceName): boolean;
  addInjectionInterceptor(interceptor: InjectionInterceptor): void;
}
