/**
 * Graph sources: turn an OSM extract on disk into the simplified and full
 * multigraph views consumed by the exporter.
 *
 * One implementation per on-disk format, picked by file extension with
 * {@link selectGraphSource}.
 */

import { readFile } from "node:fs/promises";
import type { BoundingBox, GraphPair, MultiDiGraph } from "@street-graph/types";
import { InputError, SimplificationError } from "../errors.js";
import {
  buildMultiGraph,
  parseOsmPbf,
  parseOsmXml,
  simplifyGraph,
  type MultiGraphBuildOptions,
  type OsmNode,
  type OsmWay,
} from "./osm/index.js";
import { parseOverpassJson, parseOverpassResponse } from "./overpass/index.js";

/** Loads an OSM extract as a pair of multigraph views */
export interface GraphSource {
  /** Short name used as the log tag */
  readonly name: string;
  /**
   * Load the extract at `path`, optionally truncated to `bbox`.
   *
   * @throws InputError if the extract holds no drivable edges in the area
   */
  load(path: string, bbox?: BoundingBox): Promise<GraphPair>;
}

interface GraphPairOptions {
  tag: string;
  path: string;
  build: MultiGraphBuildOptions;
  /** Fall back to the full graph when simplification fails */
  recoverSimplification: boolean;
}

/**
 * OSM XML source (.osm, .xml).
 *
 * Every way gets edges in both directions; one-way status is carried as a
 * boolean attribute only. Simplification failures are fatal.
 */
export class XmlGraphSource implements GraphSource {
  readonly name = "xml";

  async load(path: string, bbox?: BoundingBox): Promise<GraphPair> {
    return buildGraphPair(parseOsmXml(path), {
      tag: this.name,
      path,
      build: { bidirectional: true, onewayEncoding: "boolean", ...(bbox && { bbox }) },
      recoverSimplification: false,
    });
  }
}

/**
 * OSM PBF source (.pbf).
 *
 * Edges follow one-way direction and keep the raw `oneway` tag. If
 * simplification fails, both views use the full graph.
 */
export class PbfGraphSource implements GraphSource {
  readonly name = "pbf";

  async load(path: string, bbox?: BoundingBox): Promise<GraphPair> {
    return buildGraphPair(parseOsmPbf(path), {
      tag: this.name,
      path,
      build: { bidirectional: false, onewayEncoding: "tag", ...(bbox && { bbox }) },
      recoverSimplification: true,
    });
  }
}

/**
 * Saved Overpass API response (.json), as written by `--download`.
 * Built and simplified like the PBF source.
 */
export class OverpassGraphSource implements GraphSource {
  readonly name = "overpass";

  async load(path: string, bbox?: BoundingBox): Promise<GraphPair> {
    const response = parseOverpassJson(await readFile(path, "utf-8"));
    console.error(`[overpass] Read ${response.elements.length} elements from ${path}`);

    return buildGraphPair(parseOverpassResponse(response), {
      tag: this.name,
      path,
      build: { bidirectional: false, onewayEncoding: "tag", ...(bbox && { bbox }) },
      recoverSimplification: true,
    });
  }
}

/**
 * Pick the graph source for a file by its extension.
 *
 * @throws InputError for unsupported extensions
 */
export function selectGraphSource(path: string): GraphSource {
  const lower = path.toLowerCase();
  if (lower.endsWith(".pbf")) return new PbfGraphSource();
  if (lower.endsWith(".json")) return new OverpassGraphSource();
  if (lower.endsWith(".osm") || lower.endsWith(".xml")) return new XmlGraphSource();
  throw new InputError(
    `Unsupported input format: ${path} (expected .osm, .xml, .osm.xml, .pbf or .json)`
  );
}

async function buildGraphPair(
  elements: AsyncIterable<OsmNode | OsmWay>,
  options: GraphPairOptions
): Promise<GraphPair> {
  const { tag } = options;
  const { graph: full, stats } = await buildMultiGraph(elements, options.build);

  console.error(
    `[${tag}] Full graph: ${stats.nodesCount} nodes, ${stats.edgesCount} edges, ` +
      `${(stats.totalLengthMeters / 1000).toFixed(1)}km from ${stats.waysProcessed} ways ` +
      `in ${stats.buildTimeMs}ms`
  );
  if (stats.edgesOutsideBbox > 0) {
    console.error(`[${tag}] Dropped ${stats.edgesOutsideBbox} edges outside the bounding box`);
  }

  if (full.edges.length === 0) {
    throw new InputError(`No edges found in ${options.path} for the given area`);
  }

  let simplified: MultiDiGraph;
  try {
    simplified = simplifyGraph(full);
  } catch (err) {
    if (!options.recoverSimplification || !(err instanceof SimplificationError)) {
      throw err;
    }
    console.warn(`[${tag}] Simplification failed, using the full graph: ${err.message}`);
    return { simplified: full, full };
  }

  console.error(
    `[${tag}] Simplified graph: ${simplified.nodes.size} nodes, ${simplified.edges.length} edges`
  );
  return { simplified, full };
}
