/**
 * @street-graph/types
 *
 * Shared domain types for the street graph export.
 *
 * - Geo: coordinates and bounding boxes
 * - Graph: directed multigraph yielded by graph sources
 * - Export: the JSON document handed to routing consumers
 */

export * from "./geo.js";
export * from "./graph.js";
export * from "./export.js";
