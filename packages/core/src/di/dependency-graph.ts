import createDebug from "debug";
import type { ResourceName } from "@wirebox/types";
import { CircularDependencyError } from "../errors/injector-exception";
import type { ProviderMap } from "./scanner";
import { injectableParameters } from "./signature";

const debug = createDebug("wirebox:core:graph");

export type DependencyGraph = ReadonlyMap<ResourceName, readonly ResourceName[]>;

/**
 * Adds an edge from each provider to every parameter that names another
 * provider. Parameters with no provider are external inputs, not edges, and
 * rest parameters are never filled, so they add none either.
 */
export function buildDependencyGraph(providers: ProviderMap): DependencyGraph {
  const graph = new Map<ResourceName, ResourceName[]>();
  for (const [name, binding] of providers) {
    const edges: ResourceName[] = [];
    for (const param of injectableParameters(binding.signature)) {
      if (providers.has(param.name) && !edges.includes(param.name)) {
        edges.push(param.name);
      }
    }
    graph.set(name, edges);
  }
  debug("build: %d nodes", graph.size);
  return graph;
}

type Frame = {
  node: ResourceName;
  next: number;
};

/**
 * Depth-first search with an explicit stack. Returns the first cycle found as
 * the names along it, ending with the name it started from, or null.
 */
export function findCycle(graph: DependencyGraph): ResourceName[] | null {
  const done = new Set<ResourceName>();
  const visiting = new Set<ResourceName>();

  for (const root of graph.keys()) {
    if (done.has(root)) continue;

    const stack: Frame[] = [{ node: root, next: 0 }];
    const path: ResourceName[] = [root];
    visiting.add(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edges = graph.get(frame.node) ?? [];

      if (frame.next < edges.length) {
        const dep = edges[frame.next];
        frame.next += 1;

        if (visiting.has(dep)) {
          return [...path.slice(path.indexOf(dep)), dep];
        }
        if (!done.has(dep)) {
          visiting.add(dep);
          stack.push({ node: dep, next: 0 });
          path.push(dep);
        }
        continue;
      }

      visiting.delete(frame.node);
      done.add(frame.node);
      stack.pop();
      path.pop();
    }
  }

  return null;
}

export function assertAcyclic(graph: DependencyGraph): void {
  const cycle = findCycle(graph);
  if (cycle) {
    debug("cycle: %s", cycle.join(" → "));
    throw new CircularDependencyError(cycle);
  }
}
