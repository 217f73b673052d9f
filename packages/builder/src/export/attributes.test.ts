import { describe, it, expect } from "vitest";
import {
  extractGeometry,
  normalizeCoordinate,
  normalizeLength,
  normalizeName,
  normalizeOneWay,
  normalizeWayIds,
} from "./attributes.js";

describe("normalizeOneWay", () => {
  it("treats a merged list as one-way if any element is", () => {
    expect(normalizeOneWay([true, false])).toBe(true);
    expect(normalizeOneWay(["no", "yes"])).toBe(true);
  });

  it("treats a list without one-way elements as two-way", () => {
    expect(normalizeOneWay([false, false])).toBe(false);
    expect(normalizeOneWay([])).toBe(false);
  });

  it("recognizes the one-way tag vocabulary", () => {
    expect(normalizeOneWay("yes")).toBe(true);
    expect(normalizeOneWay("true")).toBe(true);
    expect(normalizeOneWay("1")).toBe(true);
    expect(normalizeOneWay("-1")).toBe(true);
  });

  it("ignores case", () => {
    expect(normalizeOneWay("YES")).toBe(true);
    expect(normalizeOneWay("True")).toBe(true);
  });

  it("treats other strings as two-way", () => {
    expect(normalizeOneWay("no")).toBe(false);
    expect(normalizeOneWay("reversible")).toBe(false);
    expect(normalizeOneWay("")).toBe(false);
  });

  it("handles booleans", () => {
    expect(normalizeOneWay(true)).toBe(true);
    expect(normalizeOneWay(false)).toBe(false);
  });

  it("defaults absent and unexpected values to two-way", () => {
    expect(normalizeOneWay(undefined)).toBe(false);
    expect(normalizeOneWay(null)).toBe(false);
    expect(normalizeOneWay(1)).toBe(false);
    expect(normalizeOneWay({ oneway: "yes" })).toBe(false);
  });
});

describe("normalizeName", () => {
  it("returns a plain string as-is", () => {
    expect(normalizeName("Brivibas iela")).toBe("Brivibas iela");
  });

  it("takes the first name of a merged list", () => {
    expect(normalizeName(["Brivibas iela", "Brivibas gatve"])).toBe("Brivibas iela");
  });

  it("returns null when the list does not start with a string", () => {
    expect(normalizeName([42, "Brivibas iela"])).toBeNull();
    expect(normalizeName([])).toBeNull();
  });

  it("returns null for absent and unexpected values", () => {
    expect(normalizeName(undefined)).toBeNull();
    expect(normalizeName(7)).toBeNull();
  });
});

describe("normalizeWayIds", () => {
  it("wraps a single id in a list", () => {
    expect(normalizeWayIds(100)).toEqual([100]);
  });

  it("keeps merged ids in order", () => {
    expect(normalizeWayIds([100, 101, 102])).toEqual([100, 101, 102]);
  });

  it("converts numeric strings", () => {
    expect(normalizeWayIds(["100", 101])).toEqual([100, 101]);
    expect(normalizeWayIds("205")).toEqual([205]);
  });

  it("drops values that are not ids", () => {
    expect(normalizeWayIds([100, "abc", null, Number.NaN, 101])).toEqual([100, 101]);
  });

  it("falls back to the id attribute", () => {
    expect(normalizeWayIds(undefined, [7, 8])).toEqual([7, 8]);
  });

  it("prefers osmid over id", () => {
    expect(normalizeWayIds(1, 2)).toEqual([1]);
  });

  it("returns an empty list when both are absent", () => {
    expect(normalizeWayIds(undefined, undefined)).toEqual([]);
  });
});

describe("normalizeLength", () => {
  it("keeps finite non-negative lengths", () => {
    expect(normalizeLength(123.4)).toBe(123.4);
    expect(normalizeLength(0)).toBe(0);
  });

  it("defaults everything else to 0", () => {
    expect(normalizeLength(-5)).toBe(0);
    expect(normalizeLength(Number.POSITIVE_INFINITY)).toBe(0);
    expect(normalizeLength("12")).toBe(0);
    expect(normalizeLength(undefined)).toBe(0);
  });
});

describe("normalizeCoordinate", () => {
  it("defaults missing coordinates to 0", () => {
    expect(normalizeCoordinate(56.95)).toBe(56.95);
    expect(normalizeCoordinate(undefined)).toBe(0);
    expect(normalizeCoordinate(Number.NaN)).toBe(0);
  });
});

describe("extractGeometry", () => {
  const start = { lat: 56.95, lon: 24.1 };
  const end = { lat: 56.952, lon: 24.102 };

  it("flips stored [lon, lat] pairs to [lat, lon]", () => {
    const geometry = [
      [24.1, 56.95],
      [24.101, 56.951],
      [24.102, 56.952],
    ];

    expect(extractGeometry(geometry, start, end)).toEqual([
      [56.95, 24.1],
      [56.951, 24.101],
      [56.952, 24.102],
    ]);
  });

  it("synthesizes a straight line when geometry is absent", () => {
    expect(extractGeometry(undefined, start, end)).toEqual([
      [56.95, 24.1],
      [56.952, 24.102],
    ]);
  });

  it("synthesizes a straight line for empty or malformed geometry", () => {
    const line = [
      [56.95, 24.1],
      [56.952, 24.102],
    ];
    expect(extractGeometry([], start, end)).toEqual(line);
    expect(extractGeometry([[24.1, 56.95], "oops"], start, end)).toEqual(line);
    expect(extractGeometry("LINESTRING", start, end)).toEqual(line);
  });

  it("uses 0 for missing node coordinates", () => {
    expect(extractGeometry(undefined, undefined, { lat: 1 })).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });
});
