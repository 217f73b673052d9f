/**
 * Command-line interface.
 *
 * Usage: export-graph <osm_file> <output_json> [--bbox=minLat,minLon,maxLat,maxLon] [--download]
 */

import type { BoundingBox } from "@street-graph/types";
import { DEFAULT_BBOX } from "./config.js";
import { InputError } from "./errors.js";
import { exportGraph } from "./pipeline.js";

export const USAGE =
  "Usage: export-graph <osm_file> <output_json> [--bbox=minLat,minLon,maxLat,maxLon] [--download]";

export interface CliArgs {
  osmFile: string;
  outputJson: string;
  bbox: BoundingBox;
  download: boolean;
}

/**
 * Parse a `minLat,minLon,maxLat,maxLon` string.
 *
 * @throws InputError unless the value is exactly four finite numbers
 */
export function parseBbox(value: string): BoundingBox {
  const numbers = value.split(",").map((part) => (part.trim() === "" ? NaN : Number(part)));
  const [minLat, minLng, maxLat, maxLng] = numbers;

  if (
    numbers.length !== 4 ||
    minLat === undefined ||
    minLng === undefined ||
    maxLat === undefined ||
    maxLng === undefined ||
    !numbers.every((n) => Number.isFinite(n))
  ) {
    throw new InputError(
      `Invalid bbox "${value}": expected 4 comma-separated numbers (minLat,minLon,maxLat,maxLon)`
    );
  }

  return { minLat, minLng, maxLat, maxLng };
}

/**
 * Parse command-line arguments (without the node and script paths).
 *
 * Accepts `--bbox=value` and `--bbox value`.
 *
 * @throws InputError for missing positionals, unknown options or a bad bbox
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let bboxValue: string | undefined;
  let download = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === "--download") {
      download = true;
    } else if (arg.startsWith("--bbox=")) {
      bboxValue = arg.slice("--bbox=".length);
    } else if (arg === "--bbox") {
      bboxValue = argv[i + 1];
      if (bboxValue === undefined) throw new InputError("--bbox needs a value");
      i++;
    } else if (arg.startsWith("--")) {
      throw new InputError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [osmFile, outputJson] = positional;
  if (osmFile === undefined || outputJson === undefined || positional.length > 2) {
    throw new InputError(USAGE);
  }

  return {
    osmFile,
    outputJson,
    bbox: bboxValue === undefined ? DEFAULT_BBOX : parseBbox(bboxValue),
    download,
  };
}

/**
 * Run the exporter.
 *
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  try {
    const args = parseArgs(argv);
    await exportGraph({
      inputPath: args.osmFile,
      outputPath: args.outputJson,
      bbox: args.bbox,
      download: args.download,
    });
    return 0;
  } catch (err) {
    if (err instanceof InputError) {
      console.error(`[cli] ${err.message}`);
    } else if (err instanceof Error) {
      console.error(`[cli] Export failed: ${err.stack ?? err.message}`);
    } else {
      console.error(`[cli] Export failed: ${String(err)}`);
    }
    return 1;
  }
}
