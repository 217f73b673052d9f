import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { buildOverpassQuery, downloadOverpassExtract, fetchOverpassData } from "./query.js";
import { DRIVABLE_HIGHWAYS } from "../osm/types.js";
import { OVERPASS_ENDPOINT, OVERPASS_TIMEOUT_SECONDS } from "../../config.js";

vi.mock("overpass-ts", () => ({
  overpassJson: vi.fn(),
}));

import { overpassJson } from "overpass-ts";

const bbox = { minLat: 56.9, maxLat: 57.0, minLng: 24.0, maxLng: 24.2 };

describe("buildOverpassQuery", () => {
  it("includes all drivable highway types in regex", () => {
    const query = buildOverpassQuery(bbox);

    for (const highway of DRIVABLE_HIGHWAYS) {
      expect(query).toContain(highway);
    }
  });

  it("formats bbox as south,west,north,east", () => {
    expect(buildOverpassQuery(bbox)).toContain("(56.9,24,57,24.2)");
  });

  it("requests JSON output with inline geometry", () => {
    const query = buildOverpassQuery(bbox);
    expect(query).toContain("[out:json]");
    expect(query).toContain("out body geom;");
  });

  it("excludes area ways", () => {
    expect(buildOverpassQuery(bbox)).toContain('["area"!="yes"]');
  });

  it("respects custom timeout", () => {
    expect(buildOverpassQuery(bbox, 120)).toContain("[timeout:120]");
  });

  it("uses the configured default timeout", () => {
    expect(buildOverpassQuery(bbox)).toContain(`[timeout:${OVERPASS_TIMEOUT_SECONDS}]`);
  });
});

describe("fetchOverpassData", () => {
  const mockedOverpassJson = vi.mocked(overpassJson);
  const mockResponse = {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements: [],
  };
  let outDir: string;

  beforeEach(() => {
    outDir = mkdtempSync(join(tmpdir(), "overpass-query-test-"));
    mockedOverpassJson.mockReset();
    mockedOverpassJson.mockResolvedValue(mockResponse);
  });

  afterEach(() => {
    rmSync(outDir, { recursive: true, force: true });
  });

  it("sends the query to the configured endpoint", async () => {
    await fetchOverpassData(bbox);

    expect(mockedOverpassJson).toHaveBeenCalledTimes(1);
    const call = mockedOverpassJson.mock.calls[0];
    expect(call?.[0]).toBe(buildOverpassQuery(bbox));
    expect(call?.[1]?.endpoint).toBe(OVERPASS_ENDPOINT);
  });

  it("passes a custom endpoint and user agent", async () => {
    await fetchOverpassData(bbox, {
      endpoint: "http://localhost:12345/api/interpreter",
      userAgent: "test-agent",
    });

    const opts = mockedOverpassJson.mock.calls[0]?.[1];
    expect(opts?.endpoint).toBe("http://localhost:12345/api/interpreter");
    expect(opts?.userAgent).toBe("test-agent");
  });

  it("saves the downloaded response to disk", async () => {
    const outputPath = join(outDir, "extract.json");

    const count = await downloadOverpassExtract(bbox, outputPath);

    expect(count).toBe(0);
    expect(JSON.parse(readFileSync(outputPath, "utf-8"))).toEqual(mockResponse);
  });

  it("propagates API errors", async () => {
    mockedOverpassJson.mockRejectedValueOnce(new Error("Overpass API error: 429"));
    await expect(fetchOverpassData(bbox)).rejects.toThrow("Overpass API error: 429");
  });
});
