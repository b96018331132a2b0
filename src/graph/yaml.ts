import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { GraphDocument } from "./types.js";
import { GraphDocumentError } from "./errors.js";
import { graphFromRecord, graphToRecord } from "./helpers.js";

// YAML reads bare numbers as numbers; vertex labels are always strings.
const vertexSchema = z
  .union([z.string().min(1), z.number()])
  .transform((v) => String(v));

// Objects list integer-like keys first in ascending order and give
// "__proto__" no own key, so neither can keep its place as a vertex.
const INTEGER_KEY = /^(?:0|[1-9]\d*)$/;

const adjacencyKeySchema = z
  .string()
  .min(1)
  .refine((key) => !(INTEGER_KEY.test(key) && Number(key) < 2 ** 32 - 1), {
    message: "Integer-like vertex names cannot be adjacency keys: their order in the file would be lost",
  })
  .refine((key) => key !== "__proto__", {
    message: 'The vertex name "__proto__" cannot be an adjacency key',
  });

const graphDocumentSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  directed: z.boolean().default(true),
  adjacency: z.record(
    adjacencyKeySchema,
    z
      .array(vertexSchema)
      .nullable()
      .transform((neighbors) => neighbors ?? [])
  ),
});

/**
 * Parse a YAML string into a GraphDocument.
 *
 * Adjacency keys keep their order in the file. Integer-like keys ("1", "20")
 * and "__proto__" are rejected; they may still appear as neighbors.
 *
 * @throws {GraphDocumentError} if the YAML object is not a graph document.
 */
export function parseGraphDocument(yamlString: string): GraphDocument {
  const raw: unknown = yaml.load(yamlString);
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error("Invalid graph document: expected a YAML object");
  }

  const result = graphDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new GraphDocumentError(result.error);
  }

  const { name, description, directed, adjacency } = result.data;
  const doc: GraphDocument = {
    name,
    directed,
    graph: graphFromRecord(adjacency),
  };
  if (description !== undefined) doc.description = description;
  return doc;
}

export function serializeGraphDocument(doc: GraphDocument): string {
  const out: Record<string, unknown> = { name: doc.name };
  if (doc.description !== undefined) out.description = doc.description;
  out.directed = doc.directed;
  out.adjacency = graphToRecord(doc.graph);

  return yaml.dump(out, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
  });
}

export function loadGraphDocument(filePath: string): GraphDocument {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseGraphDocument(content);
}

export function saveGraphDocument(doc: GraphDocument, filePath: string): void {
  const content = serializeGraphDocument(doc);
  fs.writeFileSync(filePath, content, "utf-8");
}
