import type { ExportNode, MultiDiGraph } from "@street-graph/types";
import { NODE_ID_PREFIX } from "../config.js";
import { normalizeCoordinate } from "./attributes.js";

/**
 * Project graph nodes to export nodes, in graph order.
 * Missing coordinates become 0.
 */
export function projectNodes(graph: Pick<MultiDiGraph, "nodes">): ExportNode[] {
  const nodes: ExportNode[] = [];
  for (const [id, attrs] of graph.nodes) {
    nodes.push({
      id: `${NODE_ID_PREFIX}${id}`,
      lat: normalizeCoordinate(attrs.lat),
      lon: normalizeCoordinate(attrs.lon),
    });
  }
  return nodes;
}
