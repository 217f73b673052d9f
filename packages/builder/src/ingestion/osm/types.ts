/**
 * OSM-specific types for parsing XML, PBF and Overpass data.
 *
 * These types represent the raw data from OSM before transformation
 * into the multigraph handed to the export pipeline.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** A node from OSM - represents a point location */
export interface OsmNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
  tags?: OsmTags;
}

/** A way from OSM - represents a linear feature (road, path, etc.) */
export interface OsmWay {
  type: "way";
  id: number;
  /** Ordered list of node IDs that make up this way */
  refs: number[];
  tags?: OsmTags;
}

/** Union of the OSM element types the graph builder consumes */
export type OsmElement = OsmNode | OsmWay;

/**
 * Highway tag values that make up the drivable network.
 *
 * Listed explicitly so that footways, cycleways, tracks, construction
 * and the like are left out of the exported street graph.
 */
export const DRIVABLE_HIGHWAYS = [
  "motorway",
  "motorway_link",
  "trunk",
  "trunk_link",
  "primary",
  "primary_link",
  "secondary",
  "secondary_link",
  "tertiary",
  "tertiary_link",
  "unclassified",
  "residential",
  "living_street",
  "service",
  "road",
] as const;

export type DrivableHighway = (typeof DRIVABLE_HIGHWAYS)[number];

const DRIVABLE_SET: ReadonlySet<string> = new Set(DRIVABLE_HIGHWAYS);

/**
 * Check if a highway tag value belongs to the drivable network.
 */
export function isDrivableHighway(highway: string | undefined): highway is DrivableHighway {
  if (!highway) return false;
  return DRIVABLE_SET.has(highway);
}

/**
 * Check if a way should become part of the street graph.
 * Ways tagged `area=yes` are plazas, not streets.
 */
export function isDrivableWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;
  if (tags["area"] === "yes") return false;
  return isDrivableHighway(tags["highway"]);
}
