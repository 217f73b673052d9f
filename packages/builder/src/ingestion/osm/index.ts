/**
 * OSM parsing module.
 *
 * Parses OSM PBF and XML files and builds the street multigraph.
 */

export { parseOsmPbf } from "./pbf-parser.js";
export { parseOsmXml, parseOsmXmlString } from "./xml-parser.js";
export {
  buildMultiGraph,
  isInBbox,
  haversineDistance,
  type MultiGraphBuildOptions,
  type MultiGraphBuildResult,
  type MultiGraphBuildStats,
} from "./graph-builder.js";
export {
  simplifyGraph,
  isEndpoint,
  buildAdjacency,
  type Adjacency,
  type SimplifyOptions,
} from "./simplify.js";
export {
  extractHighway,
  extractOneWay,
  extractOneWayTag,
  isReverseOneWay,
  extractName,
} from "./tag-extractors.js";
export {
  type OsmNode,
  type OsmWay,
  type OsmElement,
  type OsmTags,
  type DrivableHighway,
  DRIVABLE_HIGHWAYS,
  isDrivableHighway,
  isDrivableWay,
} from "./types.js";
