/**
 * Overpass API ingestion module.
 *
 * Downloads the drivable network for a bounding box and reads saved
 * responses back as OSM elements.
 */

export {
  buildOverpassQuery,
  fetchOverpassData,
  downloadOverpassExtract,
  type OverpassOptions,
} from "./query.js";
export {
  parseOverpassJson,
  parseOverpassResponse,
  OverpassResponseSchema,
  type OverpassResponse,
} from "./parser.js";
