import type { Graph } from "./types.js";

const NO_NEIGHBORS: readonly never[] = [];

/** Adjacency list of a vertex; vertices without an entry have none. */
export function neighborsOf<V>(graph: Graph<V>, vertex: V): readonly V[] {
  return graph.get(vertex) ?? NO_NEIGHBORS;
}

/** Build a graph from a plain object. Keys keep the object's key order. */
export function graphFromRecord(
  record: Readonly<Record<string, readonly string[]>>
): Graph<string> {
  const graph = new Map<string, string[]>();
  for (const [vertex, neighbors] of Object.entries(record)) {
    graph.set(vertex, [...neighbors]);
  }
  return graph;
}

export function graphToRecord(graph: Graph<string>): Record<string, string[]> {
  return Object.fromEntries(
    [...graph].map(([vertex, neighbors]): [string, string[]] => [
      vertex,
      [...neighbors],
    ])
  );
}

/** SameValueZero, the equality Map and Set use for keys. */
export function sameVertex<V>(a: V, b: V): boolean {
  return a === b || (a !== a && b !== b);
}
