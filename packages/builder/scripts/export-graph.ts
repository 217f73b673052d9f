/**
 * Export the street graph of an OSM extract as JSON.
 *
 * Usage: npx tsx scripts/export-graph.ts <osm_file> <output_json> [--bbox=minLat,minLon,maxLat,maxLon] [--download]
 */
import { runCli } from "../src/cli.js";

process.exitCode = await runCli(process.argv.slice(2));
