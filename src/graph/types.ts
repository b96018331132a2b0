/**
 * An adjacency mapping. Key order is the order vertices are scanned;
 * adjacency order decides which neighbour is discovered first.
 * A vertex that only appears as a neighbour has no outgoing edges.
 */
export type Graph<V = string> = ReadonlyMap<V, readonly V[]>;

/** Result of a shortest-path search. `found: false` means no path. */
export type PathResult<V = string> =
  | { found: true; path: V[] }
  | { found: false };

/** A graph as kept on disk, with its metadata. */
export interface GraphDocument {
  name: string;
  description?: string;
  /** Edges are one-way unless set to false. Defaults to true. */
  directed: boolean;
  graph: Graph<string>;
}
