/**
 * OSM PBF file parser.
 *
 * Wraps osm-pbf-parser-node to stream OSM elements from a PBF file,
 * filtering to the drivable street network.
 */

import { createOSMStream } from "osm-pbf-parser-node";
import type { OsmNode, OsmWay } from "./types.js";
import { isDrivableWay } from "./types.js";

/**
 * Raw item from osm-pbf-parser-node.
 * The library's types are incomplete, so we define the shape here.
 */
interface RawOsmItem {
  type: "node" | "way" | "relation" | "header";
  id?: number;
  lat?: number;
  lon?: number;
  refs?: number[];
  tags?: Record<string, string>;
}

/**
 * Parse an OSM PBF file and yield nodes and ways.
 *
 * Two passes over the file: PBF files store nodes before ways, but we only
 * want nodes referenced by drivable ways, so the ways are collected first
 * and the file is streamed again for their nodes.
 *
 * @param pbfPath - Path to the PBF file
 * @yields Referenced OsmNodes, then the drivable OsmWays
 */
export async function* parseOsmPbf(
  pbfPath: string
): AsyncGenerator<OsmNode | OsmWay> {
  const referencedNodeIds = new Set<number>();
  const ways: OsmWay[] = [];

  for await (const rawItem of createOSMStream(pbfPath, { withTags: true })) {
    const item = rawItem as RawOsmItem;
    if (item.type === "way" && item.id !== undefined && item.refs) {
      const tags = item.tags;
      if (isDrivableWay(tags)) {
        ways.push({ type: "way", id: item.id, refs: item.refs, tags });
        for (const nodeId of item.refs) {
          referencedNodeIds.add(nodeId);
        }
      }
    }
  }

  for await (const rawItem of createOSMStream(pbfPath, { withTags: true })) {
    const item = rawItem as RawOsmItem;
    if (item.type === "node" && item.id !== undefined) {
      if (referencedNodeIds.has(item.id) && item.lat !== undefined && item.lon !== undefined) {
        yield {
          type: "node",
          id: item.id,
          lat: item.lat,
          lon: item.lon,
          tags: item.tags,
        };
      }
    }
  }

  for (const way of ways) {
    yield way;
  }
}
