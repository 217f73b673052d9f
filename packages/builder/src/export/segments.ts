/**
 * Edge canonicalization: simplified multigraph edges -> unique segments.
 */

import type { ExportSegment, MultiDiGraph, MultiEdge } from "@street-graph/types";
import { NODE_ID_PREFIX, SEGMENT_ID_PREFIX } from "../config.js";
import {
  extractGeometry,
  normalizeLength,
  normalizeName,
  normalizeOneWay,
  normalizeWayIds,
} from "./attributes.js";

/**
 * Key shared by an edge and its reverse: sorted endpoints plus the
 * parallel-edge key.
 */
export function canonicalEdgeKey(edge: Pick<MultiEdge, "u" | "v" | "key">): string {
  const pair = edge.u <= edge.v ? `${edge.u}|${edge.v}` : `${edge.v}|${edge.u}`;
  return `${pair}|${edge.key}`;
}

/**
 * Produce one segment per physical link of the simplified graph.
 *
 * Edges are visited in graph order; an edge whose canonical key was
 * already emitted is dropped, so a link stored once per direction yields
 * the segment of whichever direction came first.
 */
export function canonicalizeSegments(graph: MultiDiGraph): ExportSegment[] {
  const seen = new Set<string>();
  const segments: ExportSegment[] = [];

  for (const edge of graph.edges) {
    const canonicalKey = canonicalEdgeKey(edge);
    if (seen.has(canonicalKey)) continue;
    seen.add(canonicalKey);

    segments.push(toSegment(edge, graph));
  }

  return segments;
}

function toSegment(edge: MultiEdge, graph: MultiDiGraph): ExportSegment {
  const { u, v, key, attributes } = edge;
  return {
    id: `${SEGMENT_ID_PREFIX}${u}_${v}_${key}`,
    startNodeId: `${NODE_ID_PREFIX}${u}`,
    endNodeId: `${NODE_ID_PREFIX}${v}`,
    lengthMeters: normalizeLength(attributes.length),
    name: normalizeName(attributes.name),
    osmWayIds: normalizeWayIds(attributes.osmid, attributes.id),
    geometry: extractGeometry(attributes.geometry, graph.nodes.get(u), graph.nodes.get(v)),
    oneway: normalizeOneWay(attributes.oneway),
  };
}
