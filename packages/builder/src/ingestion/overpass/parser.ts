/**
 * Overpass JSON response parser.
 *
 * Converts Overpass API response elements into our OsmNode/OsmWay types,
 * which are then consumed by the buildMultiGraph() pipeline.
 *
 * With `out body geom;`, Overpass returns:
 * - Ways with `nodes[]` (OSM node IDs) and `geometry[]` (inline lat/lon)
 * - Nodes with `lat`/`lon` and `tags`
 *
 * The geometry[] and nodes[] arrays on ways are parallel: geometry[i]
 * corresponds to nodes[i]. This lets us create OsmNode objects without
 * a separate node query.
 */

import { z } from "zod";
import { InputError } from "../../errors.js";
import type { OsmNode, OsmWay } from "../osm/types.js";
import { isDrivableWay } from "../osm/types.js";

const TagsSchema = z.record(z.string());

const OverpassNodeSchema = z.object({
  type: z.literal("node"),
  id: z.number(),
  lat: z.number(),
  lon: z.number(),
  tags: TagsSchema.optional(),
});

const OverpassWaySchema = z.object({
  type: z.literal("way"),
  id: z.number(),
  nodes: z.array(z.number()),
  tags: TagsSchema.optional(),
  // Vertices outside the queried area come back as null
  geometry: z.array(z.object({ lat: z.number(), lon: z.number() }).nullable()).optional(),
});

const OverpassOtherSchema = z.object({ type: z.string() }).passthrough();

export const OverpassResponseSchema = z.object({
  elements: z.array(z.union([OverpassNodeSchema, OverpassWaySchema, OverpassOtherSchema])),
});

export type OverpassResponse = z.infer<typeof OverpassResponseSchema>;

/**
 * Parse and validate the text of a saved Overpass response.
 *
 * @throws InputError if the text is not JSON or lacks an elements array
 */
export function parseOverpassJson(text: string): OverpassResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InputError("Invalid Overpass response: not valid JSON", { cause: err });
  }

  const result = OverpassResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new InputError(
      `Invalid Overpass response: ${result.error.issues[0]?.message ?? "unexpected shape"}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Parse an Overpass JSON response into OsmNode and OsmWay elements.
 *
 * Yields:
 * 1. OsmNodes from explicit node elements
 * 2. OsmNodes synthesized from way geometry (for coordinate lookup)
 * 3. OsmWays with refs pointing to node IDs
 *
 * @param response - Validated Overpass response
 */
export async function* parseOverpassResponse(
  response: OverpassResponse
): AsyncGenerator<OsmNode | OsmWay> {
  const yieldedNodeIds = new Set<number>();

  for (const element of response.elements) {
    const node = OverpassNodeSchema.safeParse(element);
    if (!node.success) continue;

    const osmNode: OsmNode = {
      type: "node",
      id: node.data.id,
      lat: node.data.lat,
      lon: node.data.lon,
    };
    if (node.data.tags) osmNode.tags = node.data.tags;
    yield osmNode;
    yieldedNodeIds.add(node.data.id);
  }

  for (const element of response.elements) {
    const parsed = OverpassWaySchema.safeParse(element);
    if (!parsed.success) continue;
    const way = parsed.data;

    // The query filters server-side, but saved responses may come from elsewhere
    if (!isDrivableWay(way.tags)) continue;

    if (way.geometry) {
      for (let i = 0; i < way.nodes.length; i++) {
        const nodeId = way.nodes[i];
        const geom = way.geometry[i];
        if (nodeId === undefined || !geom || yieldedNodeIds.has(nodeId)) continue;

        yield { type: "node", id: nodeId, lat: geom.lat, lon: geom.lon };
        yieldedNodeIds.add(nodeId);
      }
    }

    const osmWay: OsmWay = { type: "way", id: way.id, refs: way.nodes };
    if (way.tags) osmWay.tags = way.tags;
    yield osmWay;
  }
}
