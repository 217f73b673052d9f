import type { ExportNode } from "@street-graph/types";

/**
 * Pick the node closest to the centroid of all nodes.
 *
 * The centroid is the plain mean of latitudes and longitudes, and
 * distance is squared Euclidean in degrees. Ties go to the earlier node.
 *
 * @returns The chosen node, or null for an empty list
 */
export function selectStartingLocation(nodes: readonly ExportNode[]): ExportNode | null {
  if (nodes.length === 0) return null;

  let sumLat = 0;
  let sumLon = 0;
  for (const node of nodes) {
    sumLat += node.lat;
    sumLon += node.lon;
  }
  const centerLat = sumLat / nodes.length;
  const centerLon = sumLon / nodes.length;

  let best: ExportNode | null = null;
  let bestDistance = Infinity;
  for (const node of nodes) {
    const dLat = node.lat - centerLat;
    const dLon = node.lon - centerLon;
    const distance = dLat * dLat + dLon * dLon;
    if (distance < bestDistance) {
      best = node;
      bestDistance = distance;
    }
  }
  return best;
}
