import { describe, it, expect, vi, beforeEach } from "vitest";
import type { OsmNode, OsmWay } from "./types.js";

const { fileItems } = vi.hoisted(() => {
  const items: unknown[] = [];
  return { fileItems: items };
});

vi.mock("osm-pbf-parser-node", () => ({
  createOSMStream: vi.fn(async function* () {
    yield* fileItems;
  }),
}));

import { createOSMStream } from "osm-pbf-parser-node";
import { parseOsmPbf } from "./pbf-parser.js";

async function collect(path: string): Promise<(OsmNode | OsmWay)[]> {
  const elements: (OsmNode | OsmWay)[] = [];
  for await (const element of parseOsmPbf(path)) {
    elements.push(element);
  }
  return elements;
}

describe("parseOsmPbf", () => {
  beforeEach(() => {
    vi.mocked(createOSMStream).mockClear();
    fileItems.length = 0;
    fileItems.push(
      { type: "header" },
      { type: "node", id: 1, lat: 56.95, lon: 24.1 },
      { type: "node", id: 2, lat: 56.951, lon: 24.1, tags: { highway: "traffic_signals" } },
      { type: "node", id: 3, lat: 56.952, lon: 24.1 },
      // referenced but without coordinates
      { type: "node", id: 4 },
      // only referenced by a footway
      { type: "node", id: 9, lat: 56.96, lon: 24.1 },
      { type: "way", id: 100, refs: [1, 2, 4, 3], tags: { highway: "residential" } },
      { type: "way", id: 200, refs: [3, 9], tags: { highway: "footway" } },
      { type: "relation", id: 300, tags: { type: "route" } }
    );
  });

  it("reads the file twice with tags", async () => {
    await collect("extract.osm.pbf");

    expect(createOSMStream).toHaveBeenCalledTimes(2);
    expect(createOSMStream).toHaveBeenCalledWith("extract.osm.pbf", { withTags: true });
  });

  it("yields referenced nodes before the drivable ways", async () => {
    const elements = await collect("extract.osm.pbf");

    expect(elements.map((e) => `${e.type}/${e.id}`)).toEqual([
      "node/1",
      "node/2",
      "node/3",
      "way/100",
    ]);
  });

  it("keeps coordinates and tags", async () => {
    const elements = await collect("extract.osm.pbf");

    expect(elements[1]).toEqual({
      type: "node",
      id: 2,
      lat: 56.951,
      lon: 24.1,
      tags: { highway: "traffic_signals" },
    });
    expect(elements[3]).toEqual({
      type: "way",
      id: 100,
      refs: [1, 2, 4, 3],
      tags: { highway: "residential" },
    });
  });

  it("yields nothing without drivable ways", async () => {
    fileItems.splice(6, 1);

    expect(await collect("extract.osm.pbf")).toEqual([]);
  });
});
