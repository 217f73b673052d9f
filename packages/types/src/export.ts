/**
 * The exported graph document.
 *
 * One JSON file carries both graph views: the simplified intersection
 * graph as nodes + segments for routing, and the full graph as bare
 * nodes + directed edges for distance-matrix computation.
 */

/** A node of either graph view */
export interface ExportNode {
  /** `node_<source id>` */
  id: string;
  lat: number;
  lon: number;
}

/** A deduplicated street segment between two intersections */
export interface ExportSegment {
  /** `seg_<u>_<v>_<key>` */
  id: string;
  startNodeId: string;
  endNodeId: string;
  lengthMeters: number;
  name: string | null;
  /** OSM ways merged into this segment */
  osmWayIds: number[];
  /** Physical path as [lat, lon] pairs, start to end */
  geometry: [number, number][];
  oneway: boolean;
}

/** A directed edge of the full graph */
export interface FullGraphEdge {
  u: string;
  v: string;
  length: number;
}

export interface GraphExportDocument {
  nodes: ExportNode[];
  segments: ExportSegment[];
  startingLocation: ExportNode | null;
  fullGraphNodes: ExportNode[];
  fullGraphEdges: FullGraphEdge[];
}
