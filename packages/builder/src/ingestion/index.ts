/**
 * Data ingestion module.
 *
 * Pipeline:
 * OSM XML / PBF / saved Overpass JSON -> full MultiDiGraph -> simplified MultiDiGraph
 */

export {
  XmlGraphSource,
  PbfGraphSource,
  OverpassGraphSource,
  selectGraphSource,
  type GraphSource,
} from "./sources.js";
