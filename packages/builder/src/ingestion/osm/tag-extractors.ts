/**
 * Extract edge attributes from OSM tags.
 *
 * These functions convert OSM's tag key-value pairs into the values
 * recorded on multigraph edges.
 */

import type { OsmTags } from "./types.js";

/**
 * Extract the highway classification.
 *
 * @param tags - OSM tags object
 * @returns The highway tag value, or "road" if missing
 */
export function extractHighway(tags: OsmTags | undefined): string {
  return tags?.["highway"] ?? "road";
}

/**
 * Extract one-way information from OSM tags.
 *
 * Handles:
 * - oneway=yes|true|1|-1|reverse
 * - junction=roundabout (implicit one-way)
 *
 * @param tags - OSM tags object
 * @returns true if one-way, false if bidirectional
 */
export function extractOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;

  const oneway = tags["oneway"];
  const junction = tags["junction"];

  // Roundabouts are implicitly one-way
  if (junction === "roundabout") return true;

  if (oneway === "yes" || oneway === "true" || oneway === "1") return true;

  // Reverse one-way (still one-way, just opposite direction)
  // The graph builder flips the node order for these
  if (oneway === "-1" || oneway === "reverse") return true;

  return false;
}

/**
 * Check if a way has reverse one-way direction.
 * Used during graph building to create edges in the correct direction.
 */
export function isReverseOneWay(tags: OsmTags | undefined): boolean {
  if (!tags) return false;
  const oneway = tags["oneway"];
  return oneway === "-1" || oneway === "reverse";
}

/**
 * Extract the one-way tag recorded on directed edges.
 *
 * Two-way ways keep the tag as written. One-way ways always report a value
 * the exporter reads as one-way: "-1" for reversed ways (whose node order
 * the graph builder has already flipped) and "yes" for roundabouts that
 * carry no one-way value of their own.
 *
 * @returns The tag value, or undefined when a two-way way carries none
 */
export function extractOneWayTag(tags: OsmTags | undefined): string | undefined {
  const oneway = tags?.["oneway"];
  if (!extractOneWay(tags)) return oneway;
  if (isReverseOneWay(tags)) return "-1";
  return oneway === "yes" || oneway === "true" || oneway === "1" ? oneway : "yes";
}

/**
 * Extract the street name.
 *
 * @param tags - OSM tags object
 * @returns Name string, or undefined when missing or blank
 */
export function extractName(tags: OsmTags | undefined): string | undefined {
  const name = tags?.["name"]?.trim();
  return name ? name : undefined;
}
