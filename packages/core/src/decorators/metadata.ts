import "reflect-metadata";
import { CUSTOM_METADATA } from "../metadata/constants";

function merge(
  existing: Record<string, unknown> | undefined,
  key: string,
  value: unknown,
): Record<string, unknown> {
  return { ...existing, [key]: value };
}

/**
 * Attaches a custom attribute to a class or to one of its methods. Interceptors
 * receive the attributes of the consumer they run for: the class for its
 * constructor, the method for a provider or injection method.
 *
 * Method attributes are kept on the declaring class, keyed by method name,
 * alongside its provider and injection entries.
 */
export function SetMetadata(key: string, value: unknown) {
  return (target: object, methodName?: string | symbol, descriptor?: PropertyDescriptor): void => {
    if (methodName === undefined) {
      Reflect.defineMetadata(
        CUSTOM_METADATA,
        merge(Reflect.getOwnMetadata(CUSTOM_METADATA, target), key, value),
        target,
      );
      return;
    }

    if (typeof target === "function") {
      throw new TypeError(`@SetMetadata() cannot be applied to static member ${String(methodName)}`);
    }
    if (typeof methodName === "symbol") {
      throw new TypeError(`@SetMetadata() requires a string-named method, got ${String(methodName)}`);
    }
    if (typeof descriptor?.value !== "function") {
      throw new TypeError(`@SetMetadata() can only be applied to classes and methods, "${methodName}" is neither`);
    }

    Reflect.defineMetadata(
      CUSTOM_METADATA,
      merge(Reflect.getOwnMetadata(CUSTOM_METADATA, target.constructor, methodName), key, value),
      target.constructor,
      methodName,
    );
  };
}
