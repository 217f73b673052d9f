import { describe, it, expect } from "vitest";
import { canonicalEdgeKey, canonicalizeSegments } from "./segments.js";
import type { MultiDiGraph, MultiEdge, NodeAttributes } from "@street-graph/types";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeGraph(
  nodes: [string, NodeAttributes][],
  edges: MultiEdge[]
): MultiDiGraph {
  return { nodes: new Map(nodes), edges };
}

const triangleNodes: [string, NodeAttributes][] = [
  ["1", { lat: 0, lon: 0 }],
  ["2", { lat: 0, lon: 2 }],
  ["3", { lat: 2, lon: 0 }],
];

describe("canonicalEdgeKey", () => {
  it("is the same for both directions", () => {
    expect(canonicalEdgeKey({ u: "1", v: "2", key: 0 })).toBe(
      canonicalEdgeKey({ u: "2", v: "1", key: 0 })
    );
  });

  it("differs by parallel-edge key", () => {
    expect(canonicalEdgeKey({ u: "1", v: "2", key: 0 })).not.toBe(
      canonicalEdgeKey({ u: "1", v: "2", key: 1 })
    );
  });
});

describe("canonicalizeSegments", () => {
  it("emits one segment for a link stored in both directions", () => {
    const graph = makeGraph(triangleNodes, [
      { u: "1", v: "2", key: 0, attributes: { length: 10, osmid: 100 } },
      { u: "2", v: "1", key: 0, attributes: { length: 10, osmid: 100 } },
    ]);

    const segments = canonicalizeSegments(graph);

    expect(segments).toEqual([
      {
        id: "seg_1_2_0",
        startNodeId: "node_1",
        endNodeId: "node_2",
        lengthMeters: 10,
        name: null,
        osmWayIds: [100],
        geometry: [
          [0, 0],
          [0, 2],
        ],
        oneway: false,
      },
    ]);
  });

  it("keeps the direction of the first edge visited", () => {
    const graph = makeGraph(triangleNodes, [
      { u: "2", v: "1", key: 0, attributes: { length: 10 } },
      { u: "1", v: "2", key: 0, attributes: { length: 10 } },
    ]);

    const [segment] = canonicalizeSegments(graph);

    expect(segment?.id).toBe("seg_2_1_0");
    expect(segment?.geometry).toEqual([
      [0, 2],
      [0, 0],
    ]);
  });

  it("keeps parallel edges with different keys", () => {
    const graph = makeGraph(triangleNodes, [
      { u: "1", v: "2", key: 0, attributes: { length: 10 } },
      { u: "1", v: "2", key: 1, attributes: { length: 12 } },
      { u: "2", v: "1", key: 1, attributes: { length: 12 } },
    ]);

    const segments = canonicalizeSegments(graph);

    expect(segments.map((s) => s.id)).toEqual(["seg_1_2_0", "seg_1_2_1"]);
  });

  it("never repeats a canonical key", () => {
    const edges: MultiEdge[] = [];
    for (const [u, v] of [
      ["1", "2"],
      ["2", "1"],
      ["2", "3"],
      ["3", "2"],
      ["3", "1"],
      ["1", "3"],
      ["1", "2"],
    ] as const) {
      edges.push({ u, v, key: 0, attributes: {} });
    }

    const segments = canonicalizeSegments(makeGraph(triangleNodes, edges));

    const keys = segments.map((s) =>
      canonicalEdgeKey({ u: s.startNodeId.slice(5), v: s.endNodeId.slice(5), key: 0 })
    );
    expect(segments).toHaveLength(3);
    expect(new Set(keys).size).toBe(3);
  });

  it("normalizes merged attributes", () => {
    const graph = makeGraph(triangleNodes, [
      {
        u: "1",
        v: "3",
        key: 0,
        attributes: {
          length: 250.5,
          name: ["Skolas iela", "Tallinas iela"],
          osmid: [100, "101"],
          oneway: ["no", "yes"],
          highway: ["residential", "tertiary"],
          geometry: [
            [0, 0],
            [0.5, 1],
            [0, 2],
          ],
        },
      },
    ]);

    const [segment] = canonicalizeSegments(graph);

    expect(segment).toEqual({
      id: "seg_1_3_0",
      startNodeId: "node_1",
      endNodeId: "node_3",
      lengthMeters: 250.5,
      name: "Skolas iela",
      osmWayIds: [100, 101],
      geometry: [
        [0, 0],
        [1, 0.5],
        [2, 0],
      ],
      oneway: true,
    });
  });

  it("matches synthesized geometry to the endpoint coordinates", () => {
    const graph = makeGraph(triangleNodes, [
      { u: "2", v: "3", key: 0, attributes: { length: 5 } },
    ]);

    const [segment] = canonicalizeSegments(graph);

    expect(segment?.geometry[0]).toEqual([0, 2]);
    expect(segment?.geometry[segment.geometry.length - 1]).toEqual([2, 0]);
  });

  it("returns no segments for an empty graph", () => {
    expect(canonicalizeSegments(makeGraph([], []))).toEqual([]);
  });
});
