/**
 * Run the three BFS operations on the bundled sample graphs.
 * Run: npx tsx src/demo.ts [graphsDir]
 *
 * graphsDir defaults to data/graphs under the working directory.
 */
import * as path from "node:path";
import {
  breadthFirstSearch,
  bfsShortestPath,
  bfsConnectedComponents,
  loadGraphDocument,
  validateDocument,
} from "./graph/index.js";

const dir = path.resolve(process.argv[2] ?? path.join(process.cwd(), "data", "graphs"));

const sample = loadGraphDocument(path.join(dir, "sample.yaml"));
const disconnected = loadGraphDocument(path.join(dir, "disconnected.yaml"));

for (const doc of [sample, disconnected]) {
  for (const issue of validateDocument(doc)) {
    console.log(`  [${doc.name}] ${issue.rule}: ${issue.message}`);
  }
}

function show(vertices: readonly string[]): string {
  return `[${vertices.join(", ")}]`;
}

console.log("BFS traversal:");
console.log(`  from A: ${show(breadthFirstSearch(sample.graph, "A"))}`);

console.log("\nShortest path:");
const route = bfsShortestPath(sample.graph, "A", "F");
console.log(`  A → F: ${route.found ? show(route.path) : "no path"}`);

console.log("\nConnected components:");
for (const [i, component] of bfsConnectedComponents(disconnected.graph).entries()) {
  console.log(`  ${i + 1}: ${show(component)}`);
}
