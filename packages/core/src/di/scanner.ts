import createDebug from "debug";
import type { ResourceName } from "@wirebox/types";
import type { Signature } from "./signature";
import { ancestorChain, getMethodMetadata, getOwnProviderEntries } from "./registry";

const debug = createDebug("wirebox:core:scanner");

export type ProviderBinding = {
  readonly name: ResourceName;
  readonly owner: object;
  readonly ownerName: string;
  readonly callable: Function;
  readonly signature: Signature;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type ProviderMap = ReadonlyMap<ResourceName, ProviderBinding>;

/**
 * Collects the providers of every module into one map without invoking any of
 * them. Within a module's class hierarchy the most-derived declaration of a
 * name wins; across modules the later one does.
 */
export function scanModules(modules: readonly object[]): ProviderMap {
  const providers = new Map<ResourceName, ProviderBinding>();

  for (const module of modules) {
    const chain = ancestorChain(module);
    const ownerName = chain.length > 0 ? chain[chain.length - 1].name : "Object";

    for (const type of chain) {
      for (const entry of getOwnProviderEntries(type)) {
        const previous = providers.get(entry.name);
        if (previous) {
          debug(
            "scan %s: %s.%s overrides %s.%s",
            ownerName,
            type.name,
            entry.name,
            previous.ownerName,
            entry.name,
          );
        }
        providers.set(entry.name, {
          name: entry.name,
          owner: module,
          ownerName: type.name,
          callable: entry.method,
          signature: entry.signature,
          metadata: getMethodMetadata(type, entry.name),
        });
      }
    }
  }

  debug("scan: %d modules → %d providers", modules.length, providers.size);
  return providers;
}
