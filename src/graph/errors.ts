import type { ZodError, ZodIssue } from "zod";

/** Thrown when a traversal starts from a vertex that is not a graph key. */
export class VertexNotFoundError extends Error {
  readonly vertex: unknown;

  constructor(vertex: unknown) {
    super(`Start vertex "${String(vertex)}" not found in graph`);
    this.name = "VertexNotFoundError";
    this.vertex = vertex;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Formats a zod issue path the way it would be written in the document.
 *
 *   []                     → "(root)"
 *   ["adjacency", "A", 1]  → "adjacency.A[1]"
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  if (path.length === 0) return "(root)";
  return path
    .map((seg, i) =>
      typeof seg === "number" ? `[${seg}]` : i === 0 ? seg : `.${seg}`
    )
    .join("");
}

/**
 * Thrown by parseGraphDocument when the YAML is an object but not a graph
 * document. The message lists one line per issue; the ZodError is the cause.
 */
export class GraphDocumentError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(zodError: ZodError) {
    const lines = zodError.issues
      .map((issue) => `  ${formatIssuePath(issue.path)}: ${issue.message}`)
      .join("\n");
    super(`Invalid graph document:\n${lines}`, { cause: zodError });
    this.name = "GraphDocumentError";
    this.issues = zodError.issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
