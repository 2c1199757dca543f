import { describe, expect, test } from "vitest";
import { formatArgs, formatValue } from "./format.ts";
import { Path } from "./path.ts";

describe("formatValue", () => {
  test("strings are verbatim", () => {
    expect(formatValue("hello")).toBe("hello");
    expect(formatValue("")).toBe("");
    expect(formatValue('has "quotes"')).toBe('has "quotes"');
  });

  test("primitives", () => {
    expect(formatValue(42)).toBe("42");
    expect(formatValue(true)).toBe("true");
    expect(formatValue(null)).toBe("null");
    expect(formatValue(undefined)).toBe("undefined");
    expect(formatValue(10n)).toBe("10");
  });

  test("arrays", () => {
    expect(formatValue(["a", ".", "b"])).toBe("[a, ., b]");
    expect(formatValue([])).toBe("[]");
    expect(formatValue([1, ["x", null]])).toBe("[1, [x, null]]");
  });

  test("plain objects", () => {
    expect(formatValue({ a: 1, b: [true, null] })).toBe("{a=1, b=[true, null]}");
    expect(formatValue(Object.create(null))).toBe("{}");
  });

  test("paths use their canonical string", () => {
    expect(formatValue(new Path("/a/b/"))).toBe("/a/b/");
    expect(formatValue([new Path("a"), new Path("")])).toBe("[a, ]");
  });

  test("circular references", () => {
    const list: unknown[] = ["a"];
    list.push(list);
    expect(formatValue(list)).toBe("[a, [Circular]]");
  });

  test("repeated, non-circular references", () => {
    const shared = ["x"];
    expect(formatValue([shared, shared])).toBe("[[x], [x]]");
  });
});

describe("formatArgs", () => {
  test("renders key=value pairs in insertion order", () => {
    expect(formatArgs({ left: new Path("/a"), right: new Path("a/b") })).toBe(
      "{left=/a, right=a/b}",
    );
  });

  test("empty record", () => {
    expect(formatArgs({})).toBe("{}");
  });
});
