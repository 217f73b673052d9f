/**
 * Graph simplification: collapse the full multigraph into an
 * intersection graph.
 *
 * Nodes that merely bend a street are folded into the geometry of a
 * single merged edge; only intersections, dead-ends and points where the
 * underlying OSM way changes stay as nodes.
 */

import type {
  LonLat,
  MultiDiGraph,
  MultiEdge,
  NodeAttributes,
  RawEdgeAttributes,
} from "@street-graph/types";
import { SimplificationError } from "../../errors.js";

/** Options for graph simplification */
export interface SimplifyOptions {
  /**
   * Also keep nodes where incident edges belong to different OSM ways
   * (default: true).
   */
  strict?: boolean;
}

/** Adjacency view over a multigraph, built once per simplification */
export interface Adjacency {
  /** nodeId -> successor ids, one entry per outgoing edge */
  successors: Map<string, string[]>;
  /** nodeId -> predecessor ids, one entry per incoming edge */
  predecessors: Map<string, string[]>;
  /** nodeId -> outgoing edges */
  outEdges: Map<string, MultiEdge[]>;
  /** nodeId -> incoming edges */
  inEdges: Map<string, MultiEdge[]>;
}

/**
 * Simplify a multigraph to its intersection topology.
 *
 * Algorithm:
 * 1. Mark endpoints (see {@link isEndpoint})
 * 2. From every endpoint, walk each non-endpoint successor until the next
 *    endpoint, collecting the path
 * 3. Replace every path by one edge from its first to its last node whose
 *    attributes aggregate the path's edges
 * 4. Drop the interior nodes of every path and their edges
 *
 * The input graph is not modified.
 *
 * @param graph - Full multigraph
 * @param options - Simplification options
 * @returns A new, simplified multigraph
 * @throws SimplificationError if a walk reaches a node with several
 *   unvisited successors
 */
export function simplifyGraph(
  graph: MultiDiGraph,
  options: SimplifyOptions = {}
): MultiDiGraph {
  const strict = options.strict ?? true;
  const adjacency = buildAdjacency(graph);

  const endpoints = new Set<string>();
  for (const nodeId of graph.nodes.keys()) {
    if (isEndpoint(nodeId, adjacency, strict)) {
      endpoints.add(nodeId);
    }
  }

  const paths: string[][] = [];
  for (const endpoint of endpoints) {
    for (const successor of unique(adjacency.successors.get(endpoint) ?? [])) {
      if (!endpoints.has(successor)) {
        paths.push(buildPath(endpoint, successor, endpoints, adjacency));
      }
    }
  }

  const interior = new Set<string>();
  for (const path of paths) {
    for (const nodeId of path.slice(1, -1)) {
      interior.add(nodeId);
    }
  }

  const edges: MultiEdge[] = graph.edges.filter(
    (edge) => !interior.has(edge.u) && !interior.has(edge.v)
  );
  const usedKeys = new Map<string, Set<number>>();
  for (const edge of edges) {
    keysFor(usedKeys, edge.u, edge.v).add(edge.key);
  }

  for (const path of paths) {
    const u = path[0];
    const v = path[path.length - 1];
    if (u === undefined || v === undefined) continue;

    const keys = keysFor(usedKeys, u, v);
    let key = keys.size;
    while (keys.has(key)) key++;
    keys.add(key);

    edges.push({ u, v, key, attributes: mergePathAttributes(path, graph, adjacency) });
  }

  const nodes = new Map<string, NodeAttributes>();
  for (const [nodeId, attrs] of graph.nodes) {
    if (!interior.has(nodeId)) nodes.set(nodeId, attrs);
  }

  return { nodes, edges };
}

/**
 * Decide whether a node must stay in the simplified graph.
 *
 * A node is an endpoint if it:
 * - has a self-loop
 * - is a source or a sink (no incoming or no outgoing edges)
 * - does not sit between exactly two neighbours with degree 2 (one-way
 *   street) or 4 (two-way street)
 * - in strict mode, joins edges belonging to different OSM ways
 */
export function isEndpoint(nodeId: string, adjacency: Adjacency, strict = true): boolean {
  const successors = adjacency.successors.get(nodeId) ?? [];
  const predecessors = adjacency.predecessors.get(nodeId) ?? [];

  if (successors.includes(nodeId)) return true;
  if (successors.length === 0 || predecessors.length === 0) return true;

  const neighbors = new Set([...predecessors, ...successors]);
  const degree = successors.length + predecessors.length;
  if (!(neighbors.size === 2 && (degree === 2 || degree === 4))) return true;

  if (strict) {
    const wayIds = new Set<string>();
    const incident = [
      ...(adjacency.inEdges.get(nodeId) ?? []),
      ...(adjacency.outEdges.get(nodeId) ?? []),
    ];
    for (const edge of incident) {
      for (const id of toList(edge.attributes.osmid)) {
        wayIds.add(String(id));
      }
    }
    if (wayIds.size > 1) return true;
  }

  return false;
}

/**
 * Build adjacency maps for a multigraph.
 */
export function buildAdjacency(graph: MultiDiGraph): Adjacency {
  const adjacency: Adjacency = {
    successors: new Map(),
    predecessors: new Map(),
    outEdges: new Map(),
    inEdges: new Map(),
  };
  for (const edge of graph.edges) {
    push(adjacency.successors, edge.u, edge.v);
    push(adjacency.predecessors, edge.v, edge.u);
    push(adjacency.outEdges, edge.u, edge);
    push(adjacency.inEdges, edge.v, edge);
  }
  return adjacency;
}

/**
 * Walk from an endpoint through non-endpoints until the next endpoint.
 */
function buildPath(
  endpoint: string,
  start: string,
  endpoints: ReadonlySet<string>,
  adjacency: Adjacency
): string[] {
  const path = [endpoint, start];
  const onPath = new Set(path);
  let current = start;

  while (true) {
    const currentSuccessors = adjacency.successors.get(current) ?? [];
    const next = unique(currentSuccessors).filter((n) => !onPath.has(n));
    const successor = next[0];

    if (next.length === 1 && successor !== undefined) {
      path.push(successor);
      if (endpoints.has(successor)) return path;
      onPath.add(successor);
      current = successor;
      continue;
    }

    if (next.length === 0) {
      // Ring with a single endpoint: close it
      if (currentSuccessors.includes(endpoint)) {
        path.push(endpoint);
      } else {
        console.warn(`[simplify] Unexpected pattern handled near node ${current}`);
      }
      return path;
    }

    throw new SimplificationError(`Unexpected simplify pattern failed near node ${current}`);
  }
}

/**
 * Aggregate the attributes of every edge along a path.
 *
 * Length is summed. Any other attribute is kept as a single value when
 * all edges agree, else as the list of distinct values in path order.
 * Geometry is the [lon, lat] sequence of the path's nodes.
 */
function mergePathAttributes(
  path: string[],
  graph: MultiDiGraph,
  adjacency: Adjacency
): RawEdgeAttributes {
  const parts: RawEdgeAttributes[] = [];
  for (let i = 1; i < path.length; i++) {
    const from = path[i - 1];
    const to = path[i];
    if (from === undefined || to === undefined) continue;
    const edge = adjacency.outEdges.get(from)?.find((e) => e.v === to);
    if (edge) parts.push(edge.attributes);
  }

  const merged: RawEdgeAttributes = {
    length: parts.reduce((sum, part) => sum + (part.length ?? 0), 0),
  };

  const osmid = mergeValues(parts.map((p) => p.osmid));
  if (osmid !== undefined) merged.osmid = osmid;
  const name = mergeValues(parts.map((p) => p.name));
  if (name !== undefined) merged.name = name;
  const highway = mergeValues(parts.map((p) => p.highway));
  if (highway !== undefined) merged.highway = highway;
  const oneway = mergeValues(parts.map((p) => p.oneway));
  if (oneway !== undefined) merged.oneway = oneway;

  merged.geometry = path.map((nodeId): LonLat => {
    const node = graph.nodes.get(nodeId);
    return [node?.lon ?? 0, node?.lat ?? 0];
  });

  return merged;
}

/**
 * Collapse per-edge values into one value or a list of distinct values.
 */
function mergeValues<T extends string | number | boolean>(
  values: (T | T[] | undefined)[]
): T | T[] | undefined {
  const distinct: T[] = [];
  for (const value of values) {
    for (const item of toList(value)) {
      if (!distinct.includes(item)) distinct.push(item);
    }
  }
  if (distinct.length === 0) return undefined;
  return distinct.length === 1 ? distinct[0] : distinct;
}

function toList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function unique<T>(items: T[]): T[] {
  return [...new Set(items)];
}

function push<T>(map: Map<string, T[]>, key: string, item: T): void {
  const existing = map.get(key);
  if (existing) {
    existing.push(item);
  } else {
    map.set(key, [item]);
  }
}

function keysFor(usedKeys: Map<string, Set<number>>, u: string, v: string): Set<number> {
  const pairKey = `${u}>${v}`;
  let keys = usedKeys.get(pairKey);
  if (!keys) {
    keys = new Set();
    usedKeys.set(pairKey, keys);
  }
  return keys;
}
