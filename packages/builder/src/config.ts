/**
 * Runtime configuration.
 *
 * Environment overrides are read once at module load.
 */

import type { BoundingBox } from "@street-graph/types";

/** Region exported when no --bbox is given (Riga, Latvia) */
export const DEFAULT_BBOX: BoundingBox = {
  minLat: 56.88,
  minLng: 23.95,
  maxLat: 57.05,
  maxLng: 24.3,
};

export const NODE_ID_PREFIX = "node_";
export const SEGMENT_ID_PREFIX = "seg_";

/** Indent used when writing the export document */
export const EXPORT_JSON_INDENT = 2;

export const OVERPASS_ENDPOINT =
  process.env["OVERPASS_ENDPOINT"] ?? "https://overpass-api.de/api/interpreter";

export const OVERPASS_TIMEOUT_SECONDS = parseInt(
  process.env["OVERPASS_TIMEOUT"] ?? "180",
  10,
);

export const OVERPASS_USER_AGENT =
  process.env["OVERPASS_USER_AGENT"] ?? "street-graph-export";
