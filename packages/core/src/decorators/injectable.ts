import "reflect-metadata";
import type { ParameterDeclaration } from "@wirebox/types";
import { INJECTABLE_METADATA, INJECTION_METHODS_METADATA } from "../metadata/constants";
import { createSignature } from "../di/signature";
import type { InjectionEntry } from "../di/registry";

/**
 * Declares the resources a class receives through its constructor, in
 * parameter order. Subclasses without their own declaration inherit it.
 */
export function Injectable(...params: ParameterDeclaration[]): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, createSignature(params), target);
  };
}

/**
 * Marks a method to be called with resolved resources once the instance
 * exists. Every marked method in the class hierarchy runs, including ones
 * shadowed by a same-named method on a subclass.
 */
export function Inject(...params: ParameterDeclaration[]): MethodDecorator {
  return (target, propertyKey, descriptor) => {
    if (typeof target === "function") {
      throw new TypeError(`@Inject() cannot be applied to static member ${String(propertyKey)}`);
    }
    const method = descriptor.value;
    if (typeof method !== "function") {
      throw new TypeError(`@Inject() can only be applied to methods, ${String(propertyKey)} is not one`);
    }

    const existing: InjectionEntry[] =
      Reflect.getOwnMetadata(INJECTION_METHODS_METADATA, target.constructor) ?? [];
    existing.push({ methodName: propertyKey, method, signature: createSignature(params) });
    Reflect.defineMetadata(INJECTION_METHODS_METADATA, existing, target.constructor);
  };
}
