import "reflect-metadata";
import createDebug from "debug";
import type {
  DependencyMap,
  InjectionInterceptor,
  ResourceInjector,
  ResourceName,
  Type,
} from "@wirebox/types";
import { InjectionError } from "../errors/injector-exception";
import { assertAcyclic, buildDependencyGraph } from "./dependency-graph";
import type { DependencyGraph } from "./dependency-graph";
import { injectMethods } from "./method-injector";
import { getClassMetadata, getConstructorSignature } from "./registry";
import { Resolver } from "./resolver";
import { scanModules } from "./scanner";
import type { ProviderMap } from "./scanner";
import { EMPTY_SIGNATURE } from "./signature";

const debug = createDebug("wirebox:core:injector");

/**
 * Builds objects from the resources declared by a set of modules.
 *
 * The provider map and its dependency graph are fixed at construction; a
 * cycle among providers fails construction with a `CircularDependencyError`.
 * Each resource is produced at most once per injector.
 *
 * @example
 * ```ts
 * class AppModule {
 *   @Provide()
 *   name() {
 *     return "Lain";
 *   }
 * }
 *
 * @Injectable("name")
 * class NamePrinter {
 *   constructor(public name: string) {}
 * }
 *
 * const printer = new Injector(new AppModule()).create(NamePrinter);
 * ```
 */
export class Injector implements ResourceInjector {
  private readonly providers: ProviderMap;
  private readonly graph: DependencyGraph;
  private readonly resolver: Resolver;

  constructor(...modules: object[]) {
    const providers = scanModules(modules);
    const graph = buildDependencyGraph(providers);
    assertAcyclic(graph);

    this.providers = providers;
    this.graph = graph;
    this.resolver = new Resolver(providers);
    debug("ready: %d modules, %d providers", modules.length, providers.size);
  }

  create<T extends object>(target: Type<T>, overrides?: DependencyMap): T {
    const declared = getConstructorSignature(target);
    if (!declared && target.length > 0) {
      throw new InjectionError(
        `Class ${target.name} has constructor parameters but does not declare them. ` +
          "Add @Injectable() naming the resources it takes.",
        target.name,
      );
    }

    const args = this.resolver.resolveArguments(
      declared ?? EMPTY_SIGNATURE,
      {
        kind: "constructor",
        consumer: target.name,
        owner: target.name,
        metadata: getClassMetadata(target),
      },
      overrides,
    );
    debug("create %s (%d args)", target.name, args.length);
    const instance = new target(...args);
    injectMethods(instance, this.resolver, overrides);
    return instance;
  }

  inject<T extends object>(instance: T, overrides?: DependencyMap): T {
    debug("inject %s", instance.constructor.name);
    injectMethods(instance, this.resolver, overrides);
    return instance;
  }

  require<T = unknown>(name: ResourceName): T {
    return this.resolver.resolve(name) as T;
  }

  has(name: ResourceName): boolean {
    return this.resolver.has(name);
  }

  isResolved(name: ResourceName): boolean {
    return this.resolver.isResolved(name);
  }

  getDependencies(name: ResourceName): readonly ResourceName[] {
    return this.graph.get(name) ?? [];
  }

  /** Resolves the named resources now, or every resource when none are named. */
  preload(...names: ResourceName[]): void {
    const targets = names.length > 0 ? names : [...this.providers.keys()];
    debug("preload: %d resources", targets.length);
    for (const name of targets) {
      this.resolver.resolve(name);
    }
  }

  addInjectionInterceptor(interceptor: InjectionInterceptor): void {
    this.resolver.addInterceptor(interceptor);
  }
}
