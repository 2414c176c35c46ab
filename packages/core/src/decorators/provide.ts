import "reflect-metadata";
import type { ParameterDeclaration } from "@wirebox/types";
import { PROVIDER_METADATA } from "../metadata/constants";
import { createSignature } from "../di/signature";
import type { ProviderEntry } from "../di/registry";

/**
 * Marks a module method as the provider of the resource named after it.
 * The declared parameters name the resources it depends on.
 *
 * @example
 * ```ts
 * class AppModule {
 *   @Provide()
 *   name() {
 *     return "Lain";
 *   }
 *
 *   @Provide("name")
 *   greeting(name: string) {
 *     return `Hello, ${name}`;
 *   }
 * }
 * ```
 */
export function Provide(...params: ParameterDeclaration[]): MethodDecorator {
  return (target, propertyKey, descriptor) => {
    if (typeof target === "function") {
      throw new TypeError(`@Provide() cannot be applied to static member ${String(propertyKey)}`);
    }
    if (typeof propertyKey === "symbol") {
      throw new TypeError(`@Provide() requires a string-named method, got ${String(propertyKey)}`);
    }
    const method = descriptor.value;
    if (typeof method !== "function") {
      throw new TypeError(`@Provide() can only be applied to methods, "${propertyKey}" is not one`);
    }

    const existing: Map<string, ProviderEntry> =
      Reflect.getOwnMetadata(PROVIDER_METADATA, target.constructor) ?? new Map();
    existing.set(propertyKey, {
      name: propertyKey,
      method,
      signature: createSignature(params),
    });
    Reflect.defineMetadata(PROVIDER_METADATA, existing, target.constructor);
  };
}
