/**
 * Reading export documents back, for consumers of the JSON file.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { GraphExportDocument } from "@street-graph/types";
import { GraphExportFormatError } from "../errors.js";

const ExportNodeSchema = z.object({
  id: z.string(),
  lat: z.number(),
  lon: z.number(),
});

const ExportSegmentSchema = z.object({
  id: z.string(),
  startNodeId: z.string(),
  endNodeId: z.string(),
  lengthMeters: z.number().nonnegative(),
  name: z.string().nullable(),
  osmWayIds: z.array(z.number()),
  geometry: z.array(z.tuple([z.number(), z.number()])),
  oneway: z.boolean(),
});

const FullGraphEdgeSchema = z.object({
  u: z.string(),
  v: z.string(),
  length: z.number().nonnegative(),
});

export const GraphExportDocumentSchema = z.object({
  nodes: z.array(ExportNodeSchema),
  segments: z.array(ExportSegmentSchema),
  startingLocation: ExportNodeSchema.nullable(),
  fullGraphNodes: z.array(ExportNodeSchema),
  fullGraphEdges: z.array(FullGraphEdgeSchema),
});

/**
 * Parse and validate an export document.
 *
 * @throws GraphExportFormatError if the text is not JSON or not a valid document
 */
export function parseGraphExport(json: string): GraphExportDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new GraphExportFormatError("Invalid graph export: not valid JSON", { cause: err });
  }

  const result = GraphExportDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new GraphExportFormatError(
      `Invalid graph export${where}: ${issue?.message ?? "unexpected shape"}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/** Read and validate an export document from disk */
export async function readGraphExport(path: string): Promise<GraphExportDocument> {
  return parseGraphExport(await readFile(path, "utf-8"));
}
