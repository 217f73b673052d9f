/**
 * End-to-end export: OSM extract on disk -> graph export JSON file.
 */

import { existsSync } from "node:fs";
import type { BoundingBox, GraphExportDocument } from "@street-graph/types";
import { InputError } from "./errors.js";
import { selectGraphSource } from "./ingestion/index.js";
import { downloadOverpassExtract } from "./ingestion/overpass/index.js";
import { buildGraphExport, writeGraphExport } from "./export/index.js";

export interface ExportGraphOptions {
  /** OSM extract (.osm, .xml, .pbf, or saved Overpass .json) */
  inputPath: string;
  /** Where to write the export document */
  outputPath: string;
  /** Area to keep */
  bbox: BoundingBox;
  /**
   * Fetch the area from the Overpass API into `inputPath` (a .json path)
   * when that file does not exist yet
   */
  download?: boolean;
}

/**
 * Load an OSM extract, convert both graph views and write the document.
 *
 * Nothing is written to `outputPath` unless every step succeeds.
 *
 * @returns The document that was written
 * @throws InputError for a missing or unsupported input file, or an area
 *   without drivable streets
 */
export async function exportGraph(options: ExportGraphOptions): Promise<GraphExportDocument> {
  const { inputPath, outputPath, bbox } = options;

  if (!existsSync(inputPath)) {
    if (!options.download) {
      throw new InputError(`Input file not found: ${inputPath}`);
    }
    if (!inputPath.toLowerCase().endsWith(".json")) {
      throw new InputError(`--download saves an Overpass response and needs a .json path, got ${inputPath}`);
    }
    console.error(`[overpass] Downloading ${formatBbox(bbox)} to ${inputPath}`);
    const count = await downloadOverpassExtract(bbox, inputPath);
    console.error(`[overpass] Saved ${count} elements`);
  }

  const source = selectGraphSource(inputPath);
  console.error(`[cli] Loading ${inputPath} (${source.name}) within ${formatBbox(bbox)}`);
  const { simplified, full } = await source.load(inputPath, bbox);

  const doc = buildGraphExport(simplified, full);
  console.error(
    `[export] ${doc.nodes.length} nodes, ${doc.segments.length} segments, ` +
      `${doc.fullGraphNodes.length} full graph nodes, ${doc.fullGraphEdges.length} full graph edges`
  );
  if (doc.startingLocation) {
    const { id, lat, lon } = doc.startingLocation;
    console.error(`[export] Starting location ${id} (${lat}, ${lon})`);
  }

  await writeGraphExport(outputPath, doc);
  console.error(`[export] Wrote ${outputPath}`);
  return doc;
}

/** minLat,minLon,maxLat,maxLon, the order --bbox takes */
export function formatBbox(bbox: BoundingBox): string {
  return `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
}
