import createDebug from "debug";
import type { DependencyMap } from "@wirebox/types";
import type { Resolver } from "./resolver";
import { ancestorChain, getMethodMetadata, getOwnInjectionEntries } from "./registry";

const debug = createDebug("wirebox:core:injector");

/**
 * Calls every `@Inject()` method of the instance's class hierarchy once, root
 * ancestor first. Entries are collected per declaring class, so a subclass
 * method never hides a same-named one on its parent.
 */
export function injectMethods(
  instance: object,
  resolver: Resolver,
  overrides?: DependencyMap,
): void {
  for (const type of ancestorChain(instance)) {
    for (const entry of getOwnInjectionEntries(type)) {
      const consumer = `${type.name}.${String(entry.methodName)}`;
      const args = resolver.resolveArguments(
        entry.signature,
        {
          kind: "injection",
          consumer,
          owner: type.name,
          metadata: getMethodMetadata(type, entry.methodName),
        },
        overrides,
      );
      debug("inject %s", consumer);
      Reflect.apply(entry.method, instance, args);
    }
  }
}
