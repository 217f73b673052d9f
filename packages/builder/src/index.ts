/**
 * @street-graph/builder
 *
 * Converts an OSM street network into a portable graph export document.
 *
 * Pipeline:
 * 1. Load an OSM extract (XML, PBF, or a saved Overpass response) -> full MultiDiGraph
 * 2. Simplify to intersections -> simplified MultiDiGraph
 * 3. Canonicalize segments, project nodes, pick a starting location
 * 4. Write both views as one JSON document
 */

// End-to-end export
export { exportGraph, formatBbox, type ExportGraphOptions } from "./pipeline.js";
export { runCli, parseArgs, parseBbox, USAGE, type CliArgs } from "./cli.js";

// Errors
export {
  GraphExportError,
  InputError,
  SimplificationError,
  GraphExportFormatError,
} from "./errors.js";

// Configuration
export {
  DEFAULT_BBOX,
  NODE_ID_PREFIX,
  SEGMENT_ID_PREFIX,
  OVERPASS_ENDPOINT,
  OVERPASS_TIMEOUT_SECONDS,
  OVERPASS_USER_AGENT,
} from "./config.js";

// Graph sources
export {
  XmlGraphSource,
  PbfGraphSource,
  OverpassGraphSource,
  selectGraphSource,
  type GraphSource,
} from "./ingestion/index.js";

// OSM parsing
export {
  parseOsmPbf,
  parseOsmXml,
  parseOsmXmlString,
  buildMultiGraph,
  isInBbox,
  haversineDistance,
  type MultiGraphBuildOptions,
  type MultiGraphBuildResult,
  type MultiGraphBuildStats,
  simplifyGraph,
  isEndpoint,
  buildAdjacency,
  type Adjacency,
  type SimplifyOptions,
  extractHighway,
  extractOneWay,
  extractOneWayTag,
  isReverseOneWay,
  extractName,
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type DrivableHighway,
  DRIVABLE_HIGHWAYS,
  isDrivableHighway,
  isDrivableWay,
} from "./ingestion/osm/index.js";

// Overpass API
export {
  buildOverpassQuery,
  fetchOverpassData,
  downloadOverpassExtract,
  parseOverpassJson,
  parseOverpassResponse,
  OverpassResponseSchema,
  type OverpassOptions,
  type OverpassResponse,
} from "./ingestion/overpass/index.js";

// Export document
export {
  normalizeOneWay,
  normalizeName,
  normalizeWayIds,
  normalizeLength,
  normalizeCoordinate,
  extractGeometry,
  canonicalizeSegments,
  canonicalEdgeKey,
  projectNodes,
  selectStartingLocation,
  buildGraphExport,
  projectFullGraphEdges,
  serializeGraphExport,
  writeGraphExport,
  parseGraphExport,
  readGraphExport,
  GraphExportDocumentSchema,
} from "./export/index.js";
