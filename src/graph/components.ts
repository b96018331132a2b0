import type { Graph } from "./types.js";
import { neighborsOf } from "./helpers.js";

/**
 * Partition the graph into connected components, one BFS per unvisited key.
 *
 * Components are ordered by the key that seeded them; members are in BFS
 * order from that seed. Only keys seed a search: a vertex that appears
 * solely as a neighbour belongs to whichever component reaches it first.
 */
export function bfsConnectedComponents<V>(graph: Graph<V>): V[][] {
  const visited = new Set<V>();
  const components: V[][] = [];

  for (const root of graph.keys()) {
    if (visited.has(root)) continue;
    visited.add(root);
    const component: V[] = [];
    const queue: V[] = [root];
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      component.push(current);
      for (const neighbor of neighborsOf(graph, current)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
    components.push(component);
  }

  return components;
}
