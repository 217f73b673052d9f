/**
 * Graph export document assembly and output.
 */

import { rename, rm, writeFile } from "node:fs/promises";
import type {
  FullGraphEdge,
  GraphExportDocument,
  MultiDiGraph,
} from "@street-graph/types";
import { EXPORT_JSON_INDENT, NODE_ID_PREFIX } from "../config.js";
import { normalizeLength } from "./attributes.js";
import { projectNodes } from "./nodes.js";
import { canonicalizeSegments } from "./segments.js";
import { selectStartingLocation } from "./starting-location.js";

/**
 * Every directed edge of the full graph, parallel edges included.
 */
export function projectFullGraphEdges(graph: MultiDiGraph): FullGraphEdge[] {
  return graph.edges.map((edge) => ({
    u: `${NODE_ID_PREFIX}${edge.u}`,
    v: `${NODE_ID_PREFIX}${edge.v}`,
    length: normalizeLength(edge.attributes.length),
  }));
}

/**
 * Assemble the export document from both graph views.
 *
 * The simplified graph provides nodes, segments and the starting
 * location; the full graph is projected as-is.
 */
export function buildGraphExport(
  simplified: MultiDiGraph,
  full: MultiDiGraph
): GraphExportDocument {
  const nodes = projectNodes(simplified);
  return {
    nodes,
    segments: canonicalizeSegments(simplified),
    startingLocation: selectStartingLocation(nodes),
    fullGraphNodes: projectNodes(full),
    fullGraphEdges: projectFullGraphEdges(full),
  };
}

export function serializeGraphExport(doc: GraphExportDocument): string {
  return JSON.stringify(doc, null, EXPORT_JSON_INDENT) + "\n";
}

/**
 * Write the document as pretty-printed UTF-8 JSON.
 *
 * The JSON goes to a temporary file next to `path` which is then renamed
 * over it, so `path` either holds the complete document or is untouched.
 */
export async function writeGraphExport(path: string, doc: GraphExportDocument): Promise<void> {
  const json = serializeGraphExport(doc);
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    await writeFile(tempPath, json, "utf-8");
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
