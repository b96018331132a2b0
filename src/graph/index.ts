export type { Graph, PathResult, GraphDocument } from "./types.js";

export { VertexNotFoundError, GraphDocumentError } from "./errors.js";

export { breadthFirstSearch, bfsDepths } from "./traverse.js";
export { bfsShortestPath } from "./path.js";
export { bfsConnectedComponents } from "./components.js";

export { graphFromRecord, graphToRecord, neighborsOf } from "./helpers.js";

export { validateGraph, validateDocument } from "./validate.js";
export type { ValidationError, ValidateOptions } from "./validate.js";

export {
  parseGraphDocument,
  serializeGraphDocument,
  loadGraphDocument,
  saveGraphDocument,
} from "./yaml.js";
