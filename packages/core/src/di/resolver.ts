import createDebug from "debug";
import type {
  DependencyMap,
  InjectionAttributes,
  InjectionInterceptor,
  ResourceName,
} from "@wirebox/types";
import { InjectionError } from "../errors/injector-exception";
import type { ProviderBinding, ProviderMap } from "./scanner";
import { bindArguments, injectableParameters } from "./signature";
import type { Signature } from "./signature";

const debug = createDebug("wirebox:core:resolver");

const NO_OVERRIDES: DependencyMap = Object.freeze({});

function providerAttributes(binding: ProviderBinding): InjectionAttributes {
  return {
    kind: "provider",
    consumer: binding.name,
    owner: binding.ownerName,
    metadata: binding.metadata,
  };
}

/**
 * Resolves named resources against a provider map, producing each at most
 * once, and turns consumer signatures into call arguments.
 */
export class Resolver {
  private readonly cache = new Map<ResourceName, unknown>();
  private readonly interceptors: InjectionInterceptor[] = [];
  private readonly resolving: ResourceName[] = [];

  constructor(private readonly providers: ProviderMap) {}

  addInterceptor(interceptor: InjectionInterceptor): void {
    this.interceptors.push(interceptor);
    debug("interceptor #%d added", this.interceptors.length);
  }

  has(name: ResourceName): boolean {
    return this.providers.has(name);
  }

  isResolved(name: ResourceName): boolean {
    return this.cache.has(name);
  }

  /**
   * Produces a resource, or returns the cached one. Overrides reach the
   * provider's parameters that name no other provider; the first value
   * produced is the one cached.
   */
  resolve(name: ResourceName, overrides: DependencyMap = NO_OVERRIDES): unknown {
    if (this.cache.has(name)) {
      debug("resolve %s → cached", name);
      return this.cache.get(name);
    }

    const binding = this.providers.get(name);
    if (!binding) {
      throw new InjectionError(`No provider registered for "${name}"`, name, [
        ...this.resolving,
      ]);
    }

    debug("resolve %s → providing (%s)", name, binding.ownerName);
    this.resolving.push(name);
    try {
      const args = this.resolveArguments(
        binding.signature,
        providerAttributes(binding),
        overrides,
      );
      const value: unknown = Reflect.apply(binding.callable, binding.owner, args);
      this.cache.set(name, value);
      return value;
    } finally {
      this.resolving.pop();
    }
  }

  /**
   * Resolves every injectable parameter of a signature (override, then
   * provider, then default), runs the interceptor chain over the result and
   * lays it out as call arguments. Inside a provider, a parameter naming
   * another provider always comes from that provider.
   */
  resolveArguments(
    signature: Signature,
    attrs: InjectionAttributes,
    overrides: DependencyMap = NO_OVERRIDES,
  ): unknown[] {
    if (signature.illegal) {
      throw new InjectionError(
        `Cannot inject ${attrs.consumer}: ${signature.illegal}`,
        attrs.consumer,
        [...this.resolving],
      );
    }

    const dependencies: DependencyMap = {};
    for (const param of injectableParameters(signature)) {
      const provided = this.providers.has(param.name);
      if (Object.hasOwn(overrides, param.name) && !(provided && attrs.kind === "provider")) {
        dependencies[param.name] = overrides[param.name];
      } else if (provided) {
        dependencies[param.name] = this.resolve(param.name, overrides);
      } else if (param.hasDefault) {
        dependencies[param.name] = param.defaultValue;
      } else {
        throw new InjectionError(
          `Cannot resolve parameter "${param.name}" of ${attrs.consumer}: ` +
            "no override, provider or default value",
          attrs.consumer,
          [...this.resolving],
        );
      }
    }

    return bindArguments(signature, this.intercept(attrs, dependencies));
  }

  private intercept(attrs: InjectionAttributes, dependencies: DependencyMap): DependencyMap {
    let current = dependencies;
    for (const interceptor of this.interceptors) {
      current = interceptor(attrs, current);
    }
    if (this.interceptors.length > 0) {
      debug("intercept %s: %d interceptors", attrs.consumer, this.interceptors.length);
    }
    return current;
  }
}
