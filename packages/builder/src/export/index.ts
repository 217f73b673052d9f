/**
 * Graph export module.
 *
 * Simplified + full MultiDiGraph -> GraphExportDocument -> JSON file.
 */

export {
  normalizeOneWay,
  normalizeName,
  normalizeWayIds,
  normalizeLength,
  normalizeCoordinate,
  extractGeometry,
} from "./attributes.js";
export { canonicalizeSegments, canonicalEdgeKey } from "./segments.js";
export { projectNodes } from "./nodes.js";
export { selectStartingLocation } from "./starting-location.js";
export {
  buildGraphExport,
  projectFullGraphEdges,
  serializeGraphExport,
  writeGraphExport,
} from "./document.js";
export { parseGraphExport, readGraphExport, GraphExportDocumentSchema } from "./reader.js";
