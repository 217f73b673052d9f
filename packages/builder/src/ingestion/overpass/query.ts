/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for the drivable street network and
 * fetches results via the overpass-ts client.
 */

import { writeFile } from "node:fs/promises";
import type { BoundingBox } from "@street-graph/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import {
  OVERPASS_ENDPOINT,
  OVERPASS_TIMEOUT_SECONDS,
  OVERPASS_USER_AGENT,
} from "../../config.js";
import { DRIVABLE_HIGHWAYS } from "../osm/types.js";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Query timeout in seconds */
  timeout?: number;
  /** User-agent string */
  userAgent?: string;
}

/**
 * Build an Overpass QL query for drivable ways within a bbox.
 *
 * Uses `out body geom;` to get inline geometry on ways, avoiding
 * a second query for node coordinates.
 *
 * @param bbox - Bounding box (WGS84)
 * @param timeout - Query timeout in seconds
 * @returns Overpass QL query string
 */
export function buildOverpassQuery(
  bbox: BoundingBox,
  timeout: number = OVERPASS_TIMEOUT_SECONDS
): string {
  // Overpass bbox format: (south, west, north, east)
  const bboxStr = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
  const highwayRegex = `^(${DRIVABLE_HIGHWAYS.join("|")})$`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"~"${highwayRegex}"]["area"!="yes"](${bboxStr});
);
out body geom;`;
}

/**
 * Fetch the drivable network for a bounding box from the Overpass API.
 *
 * @param bbox - Bounding box to query
 * @param options - API options (endpoint, timeout, user agent)
 * @returns Overpass JSON response
 */
export async function fetchOverpassData(
  bbox: BoundingBox,
  options?: OverpassOptions
): Promise<OverpassJson> {
  const query = buildOverpassQuery(bbox, options?.timeout);

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? OVERPASS_ENDPOINT,
    userAgent: options?.userAgent ?? OVERPASS_USER_AGENT,
  };

  return overpassJson(query, overpassOpts);
}

/**
 * Download the network for a bbox and save the raw response to disk,
 * where OverpassGraphSource can load it.
 *
 * @returns Number of elements saved
 */
export async function downloadOverpassExtract(
  bbox: BoundingBox,
  outputPath: string,
  options?: OverpassOptions
): Promise<number> {
  const data = await fetchOverpassData(bbox, options);
  await writeFile(outputPath, JSON.stringify(data), "utf-8");
  return data.elements.length;
}
