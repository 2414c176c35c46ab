import "reflect-metadata";
import type { ResourceName } from "@wirebox/types";
import {
  CUSTOM_METADATA,
  INJECTABLE_METADATA,
  INJECTION_METHODS_METADATA,
  PROVIDER_METADATA,
} from "../metadata/constants";
import type { Signature } from "./signature";

export type ProviderEntry = {
  name: ResourceName;
  // The exact function decorated, so a subclass override is never substituted.
  method: Function;
  signature: Signature;
};

export type InjectionEntry = {
  methodName: string | symbol;
  method: Function;
  signature: Signature;
};

const NO_METADATA: Readonly<Record<string, unknown>> = Object.freeze({});

/**
 * Lists the constructors of an object's prototype chain, root ancestor first,
 * excluding `Object`.
 */
export function ancestorChain(instance: object): Function[] {
  const chain: Function[] = [];
  let proto: unknown = Object.getPrototypeOf(instance);
  while (proto !== null && proto !== Object.prototype && typeof proto === "object") {
    const ctor: unknown = Reflect.get(proto, "constructor");
    if (typeof ctor === "function") chain.push(ctor);
    proto = Object.getPrototypeOf(proto);
  }
  return chain.reverse();
}

/** Provider entries declared directly on a class, in declaration order. */
export function getOwnProviderEntries(type: Function): ProviderEntry[] {
  const entries: Map<ResourceName, ProviderEntry> | undefined = Reflect.getOwnMetadata(
    PROVIDER_METADATA,
    type,
  );
  return entries ? [...entries.values()] : [];
}

/** Injection entries declared directly on a class, in declaration order. */
export function getOwnInjectionEntries(type: Function): InjectionEntry[] {
  const entries: InjectionEntry[] | undefined = Reflect.getOwnMetadata(
    INJECTION_METHODS_METADATA,
    type,
  );
  return entries ? [...entries] : [];
}

/**
 * The constructor signature declared on a class. A class whose own constructor
 * takes no parameters, such as the implicit one of a subclass, inherits the
 * signature of its nearest decorated ancestor.
 */
export function getConstructorSignature(type: Function): Signature | undefined {
  const own: Signature | undefined = Reflect.getOwnMetadata(INJECTABLE_METADATA, type);
  if (own) return own;
  if (type.length > 0) return undefined;
  return Reflect.getMetadata(INJECTABLE_METADATA, type);
}

export function getClassMetadata(type: Function): Readonly<Record<string, unknown>> {
  return Reflect.getMetadata(CUSTOM_METADATA, type) ?? NO_METADATA;
}

/** Custom attributes of a method, as set on the class that declares it. */
export function getMethodMetadata(
  type: Function,
  methodName: string | symbol,
): Readonly<Record<string, unknown>> {
  if (typeof methodName === "symbol") return NO_METADATA;
  return Reflect.getOwnMetadata(CUSTOM_METADATA, type, methodName) ?? NO_METADATA;
}
