import { describe, expect, test } from "vitest";
import { ConfigComparator, compare } from "../comparator.js";
import type { ConfigValue } from "../types.js";

describe("compare", () => {
  test("identical trees produce no mismatches", () => {
    const tree: ConfigValue = {
      stage: {
        name: "build",
        retries: 2,
        enabled: true,
        notes: null,
        tags: ["a", "b"],
        owners: [{ name: "x" }],
      },
    };

    expect(compare(tree, tree)).toEqual([]);
  });

  test("extra keys in the actual tree are ignored", () => {
    expect(compare({ a: { b: 1 } }, { a: { b: 1, c: 2 }, d: 3 })).toEqual([]);
  });

  test("reports a missing nested key without an actual value", () => {
    const report = compare({ a: { b: 1 } }, { a: {} });

    expect(report).toEqual([
      {
        path: "a.b",
        expected: 1,
        missing: true,
        message: "configuration key 'a.b' not found.",
      },
    ]);
    expect(report[0]).not.toHaveProperty("actual");
  });

  test("checks list membership regardless of position", () => {
    const report = compare({ tags: ["x", "y"] }, { tags: ["y", "z"] });

    expect(report).toEqual([
      {
        path: "tags",
        expected: "x",
        missing: true,
        message: "expected list item 'x' not found at 'tags'.",
      },
    ]);
  });

  test("matches list items by deep equality, not by subset", () => {
    const report = compare(
      { owners: [{ name: "x", role: "admin" }] },
      { owners: [{ role: "admin", name: "x", team: "ops" }] }
    );

    expect(report).toHaveLength(1);
    expect(report[0]?.message).toBe(
      `expected list item '{"name":"x","role":"admin"}' not found at 'owners'.`
    );
  });

  test("accepts a mapping list item with keys in another order", () => {
    expect(
      compare(
        { owners: [{ name: "x", role: "admin" }] },
        { owners: [{ role: "admin", name: "x" }] }
      )
    ).toEqual([]);
  });

  test("coerces a boolean string when the actual value is a boolean", () => {
    expect(compare({ enabled: "true" }, { enabled: true })).toEqual([]);
    expect(compare({ enabled: "FALSE" }, { enabled: false })).toEqual([]);
    expect(compare({ enabled: "Yes" }, { enabled: true })).toEqual([]);
  });

  test("reports the coerced expected value on a boolean mismatch", () => {
    expect(compare({ enabled: "true" }, { enabled: false })).toEqual([
      {
        path: "enabled",
        expected: true,
        actual: false,
        missing: false,
        message: "mismatch at 'enabled': expected 'true', found 'false'.",
      },
    ]);
  });

  test("leaves unrecognized strings uncoerced against booleans", () => {
    const report = compare({ enabled: "maybe" }, { enabled: true });

    expect(report).toHaveLength(1);
    expect(report[0]?.expected).toBe("maybe");
    expect(report[0]?.message).toBe(
      "mismatch at 'enabled': expected 'maybe', found 'true'."
    );
  });

  test("does not coerce a boolean expectation against a string", () => {
    const report = compare({ enabled: true }, { enabled: "true" });

    expect(report).toHaveLength(1);
    expect(report[0]?.actual).toBe("true");
  });

  test("does not coerce numbers and numeric strings", () => {
    const report = compare({ a: 1 }, { a: "1" });

    expect(report).toHaveLength(1);
    expect(report[0]?.message).toBe(
      "mismatch at 'a': expected '1', found '1'."
    );
  });

  test("reports mismatches in the expected tree's key order", () => {
    const report = compare({ z: 1, a: 2, m: 3 }, { m: 0, a: 0, z: 0 });

    expect(report.map((mismatch) => mismatch.path)).toEqual(["z", "a", "m"]);
  });

  test("walks nested mappings depth first", () => {
    const report = compare(
      { a: { x: 1, y: 2 }, b: 3 },
      { b: 0, a: { y: 0, x: 0 } }
    );

    expect(report.map((mismatch) => mismatch.path)).toEqual([
      "a.x",
      "a.y",
      "b",
    ]);
  });

  test("names both shapes when a mapping is expected", () => {
    const report = compare(
      { server: { port: 80, host: "h" } },
      { server: "disabled" }
    );

    expect(report.map((mismatch) => mismatch.message)).toEqual([
      "configuration key 'server.port' not found " +
        "(expected a mapping at 'server', found string).",
      "configuration key 'server.host' not found " +
        "(expected a mapping at 'server', found string).",
    ]);
    expect(report.every((mismatch) => mismatch.missing)).toBe(true);
  });

  test("names both shapes when a sequence is expected", () => {
    expect(compare({ tags: ["x"] }, { tags: { x: true } })).toEqual([
      {
        path: "tags",
        expected: "x",
        missing: true,
        message:
          "expected list item 'x' not found at 'tags' " +
          "(expected a sequence, found mapping).",
      },
    ]);
  });

  test("renders a structured actual value in a scalar mismatch", () => {
    expect(compare({ a: "x" }, { a: { b: 1 } })).toEqual([
      {
        path: "a",
        expected: "x",
        actual: { b: 1 },
        missing: false,
        message: `mismatch at 'a': expected 'x', found '{"b":1}'.`,
      },
    ]);
  });

  test("treats a present null as a value, not as missing", () => {
    expect(compare({ a: null }, { a: null })).toEqual([]);

    const report = compare({ a: null }, { a: 0 });
    expect(report[0]?.missing).toBe(false);
    expect(report[0]?.actual).toBe(0);
  });

  test("treats NaN leaves as equal to themselves", () => {
    const tree = { a: NaN, l: [NaN] };

    expect(compare(tree, tree)).toEqual([]);
    expect(compare({ a: NaN }, { a: 0 })).toHaveLength(1);
  });

  test("prefixes paths with the starting path", () => {
    expect(compare({ b: 1 }, { b: 2 }, "root")[0]?.path).toBe("root.b");
  });

  test("never mutates its inputs", () => {
    const expected = { a: { b: ["x"] }, c: "true" };
    const actual = { a: { b: ["y"] }, c: true, d: 1 };
    const before = JSON.stringify([expected, actual]);

    compare(expected, actual);

    expect(JSON.stringify([expected, actual])).toBe(before);
  });

  test("returns frozen mismatches", () => {
    const [mismatch] = new ConfigComparator().compare({ a: 1 }, { a: 2 });

    expect(Object.isFrozen(mismatch)).toBe(true);
  });
});
