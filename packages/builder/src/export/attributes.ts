/**
 * Normalizers for raw edge attributes.
 *
 * Graph sources hand attributes over in whatever shape OSM tooling left
 * them: scalars, lists of merged values, strings where numbers were
 * expected. Each normalizer accepts any value and returns one canonical
 * shape. None of them throw.
 */

import type { NodeAttributes } from "@street-graph/types";

/** One-way tag values, compared case-insensitively */
const ONE_WAY_VALUES: ReadonlySet<string> = new Set(["yes", "true", "1", "-1"]);

/**
 * Normalize a one-way attribute to a boolean.
 *
 * A list (from merged ways) is one-way if any element is.
 *
 * @example
 * normalizeOneWay([true, false]) // true
 * normalizeOneWay("-1")          // true
 * normalizeOneWay("no")          // false
 * normalizeOneWay(undefined)     // false
 */
export function normalizeOneWay(value: unknown): boolean {
  if (value === true) return true;
  if (typeof value === "string") return ONE_WAY_VALUES.has(value.toLowerCase());
  if (Array.isArray(value)) return value.some((item) => normalizeOneWay(item));
  return false;
}

/**
 * Normalize a street name. A list yields its first element when that is a
 * string.
 */
export function normalizeName(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" ? first : null;
  }
  return null;
}

/**
 * Normalize way ids to a list of numbers.
 *
 * Reads `osmid`, falling back to `id`. Numeric strings are converted;
 * anything else is dropped.
 */
export function normalizeWayIds(osmid: unknown, id?: unknown): number[] {
  const value = osmid ?? id;
  if (value === undefined || value === null) return [];

  const items: unknown[] = Array.isArray(value) ? value : [value];
  const ids: number[] = [];
  for (const item of items) {
    const wayId = toWayId(item);
    if (wayId !== undefined) ids.push(wayId);
  }
  return ids;
}

function toWayId(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value);
  return undefined;
}

/** Length in meters, or 0 unless finite and non-negative */
export function normalizeLength(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 0;
}

/** A coordinate in degrees, or 0 when missing or not finite */
export function normalizeCoordinate(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Extract segment geometry as [lat, lon] pairs.
 *
 * Stored geometry is [lon, lat] and gets flipped, keeping vertex order.
 * When it is missing, empty or malformed, the segment is the straight
 * line between its endpoint nodes.
 *
 * @param geometry - Raw `geometry` attribute
 * @param start - Attributes of the edge's start node
 * @param end - Attributes of the edge's end node
 */
export function extractGeometry(
  geometry: unknown,
  start: NodeAttributes | undefined,
  end: NodeAttributes | undefined
): [number, number][] {
  if (Array.isArray(geometry) && geometry.length > 0) {
    const points: [number, number][] = [];
    for (const vertex of geometry) {
      const point = toLatLon(vertex);
      if (!point) break;
      points.push(point);
    }
    if (points.length === geometry.length) return points;
  }

  return [
    [normalizeCoordinate(start?.lat), normalizeCoordinate(start?.lon)],
    [normalizeCoordinate(end?.lat), normalizeCoordinate(end?.lon)],
  ];
}

function toLatLon(vertex: unknown): [number, number] | undefined {
  if (!Array.isArray(vertex) || vertex.length < 2) return undefined;
  const lon: unknown = vertex[0];
  const lat: unknown = vertex[1];
  if (typeof lon !== "number" || typeof lat !== "number") return undefined;
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return undefined;
  return [lat, lon];
}
