import { describe, expect, test } from "vitest";
import {
  formatValue,
  isConfigMapping,
  isConfigScalar,
  isConfigSequence,
  isDeepEqual,
  joinPath,
  scalarEquals,
  selectPath,
  shapeOf,
} from "../values.js";

describe("type guards", () => {
  test("classify each kind of value", () => {
    expect(isConfigMapping({ a: 1 })).toBe(true);
    expect(isConfigMapping([1])).toBe(false);
    expect(isConfigMapping(null)).toBe(false);
    expect(isConfigSequence([])).toBe(true);
    expect(isConfigScalar(null)).toBe(true);
    expect(isConfigScalar("x")).toBe(true);
    expect(isConfigScalar({})).toBe(false);
  });

  test("shapeOf names scalars by their type", () => {
    expect(shapeOf(null)).toBe("null");
    expect(shapeOf(3)).toBe("number");
    expect(shapeOf(false)).toBe("boolean");
    expect(shapeOf([])).toBe("sequence");
    expect(shapeOf({})).toBe("mapping");
  });
});

describe("isDeepEqual", () => {
  test("ignores mapping key order", () => {
    expect(isDeepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
  });

  test("respects sequence order and length", () => {
    expect(isDeepEqual([1, 2], [2, 1])).toBe(false);
    expect(isDeepEqual([1], [1, 1])).toBe(false);
  });

  test("distinguishes mappings with different key sets", () => {
    expect(isDeepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(isDeepEqual({ a: 1, c: 2 }, { a: 1, b: 2 })).toBe(false);
  });

  test("matches NaN with NaN", () => {
    expect(isDeepEqual([NaN], [NaN])).toBe(true);
    expect(scalarEquals(NaN, NaN)).toBe(true);
    expect(scalarEquals(NaN, "NaN")).toBe(false);
  });

  test("compares scalars strictly", () => {
    expect(isDeepEqual(1, "1")).toBe(false);
    expect(isDeepEqual(null, null)).toBe(true);
    expect(isDeepEqual([], {})).toBe(false);
  });
});

describe("joinPath", () => {
  test("omits the separator at the root", () => {
    expect(joinPath("", "a")).toBe("a");
    expect(joinPath("a", "b")).toBe("a.b");
  });
});

describe("formatValue", () => {
  test("prints strings verbatim and structures as JSON", () => {
    expect(formatValue("plain text")).toBe("plain text");
    expect(formatValue(true)).toBe("true");
    expect(formatValue(null)).toBe("null");
    expect(formatValue(["a", 1])).toBe('["a",1]');
  });
});

describe("selectPath", () => {
  const tree = { pipeline: { stages: [{ stage: { name: "build" } }] } };

  test("returns the whole tree for an empty path", () => {
    expect(selectPath(tree, "")).toBe(tree);
  });

  test("walks mappings and indexes sequences", () => {
    expect(selectPath(tree, "pipeline.stages.0.stage.name")).toBe("build");
  });

  test("returns undefined for unresolved segments", () => {
    expect(selectPath(tree, "pipeline.missing")).toBeUndefined();
    expect(selectPath(tree, "pipeline.stages.first")).toBeUndefined();
    expect(selectPath(tree, "pipeline.stages.3")).toBeUndefined();
  });
});
