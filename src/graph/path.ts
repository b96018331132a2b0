import type { Graph, PathResult } from "./types.js";
import { neighborsOf, sameVertex } from "./helpers.js";

interface FrontierEntry<V> {
  vertex: V;
  path: V[];
}

/**
 * Fewest-edges path from `start` to `target`, both ends included.
 *
 * Unlike breadthFirstSearch, unknown endpoints are not an error: a start
 * or target that is not a graph key yields `{ found: false }`, the same
 * as an unreachable target. Among equally short paths the one reached
 * first in adjacency order wins.
 */
export function bfsShortestPath<V>(
  graph: Graph<V>,
  start: V,
  target: V
): PathResult<V> {
  if (!graph.has(start) || !graph.has(target)) return { found: false };
  if (sameVertex(start, target)) {
    return { found: true, path: [start] };
  }

  const visited = new Set<V>([start]);
  const queue: FrontierEntry<V>[] = [{ vertex: start, path: [start] }];

  for (let head = 0; head < queue.length; head++) {
    const { vertex, path } = queue[head];
    for (const neighbor of neighborsOf(graph, vertex)) {
      if (sameVertex(neighbor, target)) {
        return { found: true, path: [...path, neighbor] };
      }
      if (visited.has(neighbor)) continue;
      visited.add(neighbor);
      queue.push({ vertex: neighbor, path: [...path, neighbor] });
    }
  }

  return { found: false };
}
