/**
 * Build the full street multigraph from OSM elements.
 *
 * Every pair of consecutive nodes on a drivable way becomes a directed
 * edge, so the result keeps every original point as a node. The
 * simplifier later folds non-intersection nodes into edge geometry.
 */

import type {
  BoundingBox,
  Coordinate,
  MultiDiGraph,
  MultiEdge,
  NodeAttributes,
  RawEdgeAttributes,
} from "@street-graph/types";
import type { OsmNode, OsmWay } from "./types.js";
import { isDrivableWay } from "./types.js";
import {
  extractHighway,
  extractName,
  extractOneWay,
  extractOneWayTag,
  isReverseOneWay,
} from "./tag-extractors.js";

/** Options controlling how ways turn into directed edges */
export interface MultiGraphBuildOptions {
  /**
   * Add the reverse edge for every way, one-way or not. Direction is then
   * carried only by the `oneway` attribute.
   */
  bidirectional?: boolean;
  /**
   * How the `oneway` attribute is recorded:
   * - "boolean": parsed flag
   * - "tag": the tag string as written on the way
   */
  onewayEncoding?: "boolean" | "tag";
  /** Drop nodes outside this box together with their edges */
  bbox?: BoundingBox;
}

/**
 * Statistics about the graph building process.
 */
export interface MultiGraphBuildStats {
  /** Number of nodes in the graph */
  nodesCount: number;
  /** Number of directed edges in the graph */
  edgesCount: number;
  /** Total length of all directed edges in meters */
  totalLengthMeters: number;
  /** Number of drivable OSM ways processed */
  waysProcessed: number;
  /** Number of ways treated as one-way */
  oneWayWays: number;
  /** Edges dropped because an endpoint fell outside the bbox */
  edgesOutsideBbox: number;
  /** Time taken to build the graph in milliseconds */
  buildTimeMs: number;
}

/**
 * Result of building a graph from OSM elements.
 */
export interface MultiGraphBuildResult {
  graph: MultiDiGraph;
  stats: MultiGraphBuildStats;
}

/**
 * Build a MultiDiGraph from an async iterable of OSM elements.
 *
 * Algorithm:
 * 1. Collect all nodes into a map and all drivable ways into a list
 * 2. For each way (node order flipped for oneway=-1), create an edge
 *    between each pair of consecutive nodes, plus the reverse edge unless
 *    the way is one-way and the build is not bidirectional
 * 3. Skip edges with an endpoint outside the bbox
 * 4. Keep only nodes that ended up on an edge
 *
 * Parallel edges between the same ordered pair get increasing keys.
 *
 * @param elements - Async iterable of OSM nodes and ways
 * @param options - Direction, encoding and bbox options
 * @returns Graph and build statistics
 */
export async function buildMultiGraph(
  elements: AsyncIterable<OsmNode | OsmWay> | Iterable<OsmNode | OsmWay>,
  options: MultiGraphBuildOptions = {}
): Promise<MultiGraphBuildResult> {
  const startTime = Date.now();
  const bidirectional = options.bidirectional ?? false;
  const encoding = options.onewayEncoding ?? "boolean";
  const { bbox } = options;

  const osmNodes = new Map<number, OsmNode>();
  const osmWays: OsmWay[] = [];

  for await (const element of elements) {
    if (element.type === "node") {
      osmNodes.set(element.id, element);
    } else if (isDrivableWay(element.tags)) {
      osmWays.push(element);
    }
  }

  const edges: MultiEdge[] = [];
  const nextKey = new Map<string, number>();
  const usedNodeIds = new Set<number>();
  let totalLengthMeters = 0;
  let oneWayWays = 0;
  let edgesOutsideBbox = 0;

  const addEdge = (from: OsmNode, to: OsmNode, attributes: RawEdgeAttributes): void => {
    const u = String(from.id);
    const v = String(to.id);
    const pairKey = `${u}>${v}`;
    const key = nextKey.get(pairKey) ?? 0;
    nextKey.set(pairKey, key + 1);
    edges.push({ u, v, key, attributes });
    usedNodeIds.add(from.id);
    usedNodeIds.add(to.id);
    totalLengthMeters += attributes.length ?? 0;
  };

  for (const way of osmWays) {
    const isOneWay = extractOneWay(way.tags);
    if (isOneWay) oneWayWays++;

    const refs = isReverseOneWay(way.tags) ? [...way.refs].reverse() : way.refs;
    const name = extractName(way.tags);
    const highway = extractHighway(way.tags);
    const oneway = encoding === "boolean" ? isOneWay : extractOneWayTag(way.tags);

    for (let i = 0; i < refs.length - 1; i++) {
      const fromId = refs[i];
      const toId = refs[i + 1];
      if (fromId === undefined || toId === undefined || fromId === toId) continue;
      const from = osmNodes.get(fromId);
      const to = osmNodes.get(toId);
      if (!from || !to) continue;

      if (bbox && (!isInBbox(from, bbox) || !isInBbox(to, bbox))) {
        edgesOutsideBbox++;
        continue;
      }

      const attributes: RawEdgeAttributes = {
        osmid: way.id,
        length: haversineDistance(toCoordinate(from), toCoordinate(to)),
        highway,
        ...(oneway !== undefined && { oneway }),
        ...(name !== undefined && { name }),
      };

      addEdge(from, to, attributes);
      if (bidirectional || !isOneWay) {
        addEdge(to, from, { ...attributes });
      }
    }
  }

  const nodes = new Map<string, NodeAttributes>();
  for (const osmNode of osmNodes.values()) {
    if (usedNodeIds.has(osmNode.id)) {
      nodes.set(String(osmNode.id), { lat: osmNode.lat, lon: osmNode.lon });
    }
  }

  return {
    graph: { nodes, edges },
    stats: {
      nodesCount: nodes.size,
      edgesCount: edges.length,
      totalLengthMeters,
      waysProcessed: osmWays.length,
      oneWayWays,
      edgesOutsideBbox,
      buildTimeMs: Date.now() - startTime,
    },
  };
}

/**
 * Check whether a node lies inside a bounding box (edges inclusive).
 */
export function isInBbox(node: { lat: number; lon: number }, bbox: BoundingBox): boolean {
  return (
    node.lat >= bbox.minLat &&
    node.lat <= bbox.maxLat &&
    node.lon >= bbox.minLng &&
    node.lon <= bbox.maxLng
  );
}

function toCoordinate(node: OsmNode): Coordinate {
  return { lat: node.lat, lng: node.lon };
}

/**
 * Calculate distance between two coordinates using Haversine formula.
 *
 * @param a - First coordinate
 * @param b - Second coordinate
 * @returns Distance in meters
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const R = 6371000; // Earth's radius in meters

  const lat1 = (a.lat * Math.PI) / 180;
  const lat2 = (b.lat * Math.PI) / 180;
  const dLat = ((b.lat - a.lat) * Math.PI) / 180;
  const dLng = ((b.lng - a.lng) * Math.PI) / 180;

  const sinDLat = Math.sin(dLat / 2);
  const sinDLng = Math.sin(dLng / 2);

  const h =
    sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLng * sinDLng;

  return 2 * R * Math.asin(Math.sqrt(h));
}
