/**
 * Directed multigraph produced by a graph source.
 *
 * Mirrors the shape OSM tooling hands back after loading a street network:
 * nodes keyed by their source id, and directed edges keyed by
 * (u, v, key) where `key` tells parallel edges between the same ordered
 * pair apart. Edge attributes keep the loose encodings OSM data arrives
 * in; the export pipeline normalizes them.
 */

/** Coordinates of a graph node, in degrees. Either may be missing in raw data. */
export interface NodeAttributes {
  lat?: number;
  lon?: number;
}

/** A raw OSM one-way tag value: boolean after parsing, or the tag string */
export type OneWayTag = boolean | string;

/** An OSM way id, numeric or as read from a text format */
export type WayId = number | string;

/** A geometry vertex as stored on edges: [lon, lat] */
export type LonLat = [number, number];

/**
 * Edge attributes as delivered by a graph source.
 *
 * After simplification any attribute that differed along a merged path
 * becomes a list of the distinct values.
 */
export interface RawEdgeAttributes {
  /** Length in meters */
  length?: number;
  name?: string | string[];
  /** Passed through from the source; not read by the export pipeline */
  highway?: string | string[];
  oneway?: OneWayTag | OneWayTag[];
  osmid?: WayId | WayId[];
  /** Alternative spelling of `osmid` used by some loaders */
  id?: WayId | WayId[];
  /** Intermediate path geometry, ordered [lon, lat] pairs */
  geometry?: LonLat[];
}

/** A directed edge of a multigraph */
export interface MultiEdge {
  u: string;
  v: string;
  /** Disambiguates parallel edges with the same ordered (u, v) pair */
  key: number;
  attributes: RawEdgeAttributes;
}

/** Immutable directed multigraph */
export interface MultiDiGraph {
  nodes: ReadonlyMap<string, NodeAttributes>;
  edges: readonly MultiEdge[];
}

/** The two views every graph source yields */
export interface GraphPair {
  /** Intersections and dead-ends only; intermediate points folded into geometry */
  simplified: MultiDiGraph;
  /** Every original point as a node */
  full: MultiDiGraph;
}
