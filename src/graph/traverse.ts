import type { Graph } from "./types.js";
import { VertexNotFoundError } from "./errors.js";
import { neighborsOf } from "./helpers.js";

/**
 * Visit every vertex reachable from `start`, level by level.
 *
 * Vertices are marked visited when enqueued, so each is emitted once.
 * Ties within a level follow the order neighbours were discovered.
 *
 * @throws {VertexNotFoundError} if `start` is not a key of `graph`.
 */
export function breadthFirstSearch<V>(graph: Graph<V>, start: V): V[] {
  if (!graph.has(start)) {
    throw new VertexNotFoundError(start);
  }

  const visited = new Set<V>([start]);
  const queue: V[] = [start];
  const order: V[] = [];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    order.push(current);
    for (const neighbor of neighborsOf(graph, current)) {
      if (visited.has(neighbor)) continue;
      visited.add(neighbor);
      queue.push(neighbor);
    }
  }

  return order;
}

/**
 * Edge distance from `start` to every reachable vertex. Entries are in
 * visitation order, so the keys match breadthFirstSearch(graph, start).
 *
 * @throws {VertexNotFoundError} if `start` is not a key of `graph`.
 */
export function bfsDepths<V>(graph: Graph<V>, start: V): Map<V, number> {
  if (!graph.has(start)) {
    throw new VertexNotFoundError(start);
  }

  const depths = new Map<V, number>([[start, 0]]);
  const queue: V[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const next = (depths.get(current) ?? 0) + 1;
    for (const neighbor of neighborsOf(graph, current)) {
      if (depths.has(neighbor)) continue;
      depths.set(neighbor, next);
      queue.push(neighbor);
    }
  }

  return depths;
}
