/**
 * OSM XML file parser.
 *
 * Reads an `.osm` document (as exported by JOSM or the OSM website) with
 * @xmldom/xmldom and yields the same OsmNode/OsmWay stream as the PBF
 * parser, so both feed the same graph builder.
 *
 * OSM XML structure (simplified):
 * <osm version="0.6">
 *   <node id="1" lat="56.95" lon="24.10"/>
 *   <way id="100">
 *     <nd ref="1"/>
 *     <nd ref="2"/>
 *     <tag k="highway" v="residential"/>
 *   </way>
 * </osm>
 */

import { readFile } from "node:fs/promises";
import { DOMParser } from "@xmldom/xmldom";
import { InputError } from "../../errors.js";
import type { OsmNode, OsmTags, OsmWay } from "./types.js";
import { isDrivableWay } from "./types.js";

/**
 * Parse an OSM XML file and yield nodes and ways.
 *
 * @param xmlPath - Path to the .osm file
 * @yields Nodes referenced by drivable ways, then the drivable ways
 * @throws InputError if the file is not an OSM XML document
 */
export async function* parseOsmXml(
  xmlPath: string
): AsyncGenerator<OsmNode | OsmWay> {
  const content = await readFile(xmlPath, "utf-8");
  yield* parseOsmXmlString(content);
}

/**
 * Parse OSM XML content already held in memory.
 */
export function* parseOsmXmlString(content: string): Generator<OsmNode | OsmWay> {
  const doc = new DOMParser().parseFromString(content, "text/xml");
  const root = doc.documentElement;
  if (!root || root.tagName !== "osm") {
    throw new InputError("Invalid OSM XML: missing <osm> root element");
  }

  const ways: OsmWay[] = [];
  const referencedNodeIds = new Set<number>();
  const wayElements = root.getElementsByTagName("way");
  for (let i = 0; i < wayElements.length; i++) {
    const el = wayElements.item(i);
    if (!el) continue;
    const id = readNumber(el, "id");
    if (id === undefined) continue;

    const tags = readTags(el);
    if (!isDrivableWay(tags)) continue;

    const refs: number[] = [];
    const nds = el.getElementsByTagName("nd");
    for (let j = 0; j < nds.length; j++) {
      const nd = nds.item(j);
      const ref = nd ? readNumber(nd, "ref") : undefined;
      if (ref !== undefined) {
        refs.push(ref);
        referencedNodeIds.add(ref);
      }
    }
    ways.push({ type: "way", id, refs, tags });
  }

  const nodeElements = root.getElementsByTagName("node");
  for (let i = 0; i < nodeElements.length; i++) {
    const el = nodeElements.item(i);
    if (!el) continue;
    const id = readNumber(el, "id");
    const lat = readNumber(el, "lat");
    const lon = readNumber(el, "lon");
    if (id === undefined || lat === undefined || lon === undefined) continue;
    if (!referencedNodeIds.has(id)) continue;

    const tags = readTags(el);
    const node: OsmNode = { type: "node", id, lat, lon };
    if (tags) node.tags = tags;
    yield node;
  }

  yield* ways;
}

/**
 * Read a numeric attribute, or undefined if missing or not a number.
 */
function readNumber(el: Element, name: string): number | undefined {
  const raw = el.getAttribute(name);
  if (raw === null || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Collect `<tag k=".." v=".."/>` children into an OsmTags object.
 */
function readTags(el: Element): OsmTags | undefined {
  const tagElements = el.getElementsByTagName("tag");
  if (tagElements.length === 0) return undefined;

  const tags: OsmTags = {};
  for (let i = 0; i < tagElements.length; i++) {
    const tag = tagElements.item(i);
    const key = tag?.getAttribute("k");
    const value = tag?.getAttribute("v");
    if (key && value !== null && value !== undefined) {
      tags[key] = value;
    }
  }
  return tags;
}
