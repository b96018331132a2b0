import type { Graph, GraphDocument } from "./types.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

export interface ValidateOptions {
  /** When false, every edge is expected to be listed from both ends. */
  directed?: boolean;
}

/**
 * Report suspicious adjacency data. Nothing reported here stops the BFS
 * operations from running; a neighbour without its own entry is simply a
 * vertex with no outgoing edges.
 */
export function validateGraph<V>(
  graph: Graph<V>,
  options: ValidateOptions = {}
): ValidationError[] {
  const errors: ValidationError[] = [];

  checkDeclaredNeighbors(graph, errors);
  checkDuplicateNeighbors(graph, errors);
  checkSelfLoops(graph, errors);
  if (options.directed === false) {
    checkSymmetry(graph, errors);
  }

  return errors;
}

export function validateDocument(doc: GraphDocument): ValidationError[] {
  return validateGraph(doc.graph, { directed: doc.directed });
}

// Rule: Every adjacency target should also be declared as a key
function checkDeclaredNeighbors<V>(
  graph: Graph<V>,
  errors: ValidationError[]
): void {
  for (const [vertex, neighbors] of graph) {
    for (const neighbor of new Set(neighbors)) {
      if (!graph.has(neighbor)) {
        errors.push({
          rule: "neighbor-declared",
          message: `Vertex "${String(vertex)}" lists undeclared neighbor "${String(neighbor)}" (treated as having no neighbors)`,
          path: `adjacency.${String(vertex)}`,
        });
      }
    }
  }
}

// Rule: A vertex lists each neighbor at most once
function checkDuplicateNeighbors<V>(
  graph: Graph<V>,
  errors: ValidationError[]
): void {
  for (const [vertex, neighbors] of graph) {
    const seen = new Set<V>();
    for (const neighbor of neighbors) {
      if (seen.has(neighbor)) {
        errors.push({
          rule: "no-duplicate-neighbors",
          message: `Vertex "${String(vertex)}" lists neighbor "${String(neighbor)}" more than once`,
          path: `adjacency.${String(vertex)}`,
        });
      }
      seen.add(neighbor);
    }
  }
}

// Rule: No vertex is its own neighbor
function checkSelfLoops<V>(graph: Graph<V>, errors: ValidationError[]): void {
  for (const [vertex, neighbors] of graph) {
    if (neighbors.includes(vertex)) {
      errors.push({
        rule: "no-self-loop",
        message: `Vertex "${String(vertex)}" lists itself as a neighbor`,
        path: `adjacency.${String(vertex)}`,
      });
    }
  }
}

// Rule: In an undirected graph, u → v implies v → u (when v is declared)
function checkSymmetry<V>(graph: Graph<V>, errors: ValidationError[]): void {
  for (const [vertex, neighbors] of graph) {
    for (const neighbor of new Set(neighbors)) {
      const back = graph.get(neighbor);
      if (back && !back.includes(vertex)) {
        errors.push({
          rule: "undirected-symmetry",
          message: `Edge "${String(vertex)}" → "${String(neighbor)}" has no reverse edge in an undirected graph`,
          path: `adjacency.${String(neighbor)}`,
        });
      }
    }
  }
}
