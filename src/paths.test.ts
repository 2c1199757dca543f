import { expect, test } from "vitest";
import { path } from "./paths.ts";
import { Path } from "./path.ts";
import { IllegalCharacterError, IllegalSegmentError } from "./errors.ts";

test("single segment", () => {
  expect(path("").toString()).toBe("");
  expect(path("/").toString()).toBe("/");
  expect(path("a").toString()).toBe("a");
  expect(path("/a").toString()).toBe("/a");
  expect(path("/a/").toString()).toBe("/a/");
  expect(path("/a//b//c").equals(new Path("/a/b/c"))).toBe(true);
  expect(path("//a//b//c").normalize().equals(path("/a/b/c"))).toBe(true);
});

test("no segments is the empty path", () => {
  const p = path();
  expect(p.toString()).toBe("");
  expect(p.isAbsolute()).toBe(false);
});

test("drops null, undefined and empty entries", () => {
  expect(path("a", "").toString()).toBe("a");
  expect(path("a", null).toString()).toBe("a");
  expect(path("a", "", "b").toString()).toBe("a/b");
  expect(path("a", null, "b").toString()).toBe("a/b");
  expect(path("a", undefined, "b").toString()).toBe("a/b");
  expect(path("", "b").toString()).toBe("b");
  expect(path("", "", "b").toString()).toBe("b");
});

test("absolute iff the first non-empty entry starts with a separator", () => {
  expect(path("", "", "/b").toString()).toBe("/b");
  expect(path("", "", "/", "b").toString()).toBe("/b");
  expect(path(null, "/a", "b").isAbsolute()).toBe(true);
  expect(path("a", "/b").isAbsolute()).toBe(false);
});

test("multiple segments", () => {
  expect(path("a", "b").toString()).toBe("a/b");
  expect(path("a", "/").toString()).toBe("a/");
  expect(path("/a", "b").toString()).toBe("/a/b");
  expect(path("/a", "b", "c", "d").toString()).toBe("/a/b/c/d");
  expect(path("/a", "/b", "/c", "/d", "/").toString()).toBe("/a/b/c/d/");
  expect(path("/a", "/b", "//", "/c").toString()).toBe("/a/b/c");
});

test("validates the joined string", () => {
  expect(() => path("a", "b\u0000")).toThrow(IllegalCharacterError);
  expect(() => path("a", "b\u0000")).toThrow(
    "Path contains illegal characters: {path=a/b\u0000}",
  );
  expect(() => path("a", ".", "b")).toThrow(IllegalSegmentError);
});

test("keeps backwards segments", () => {
  expect(path("a", "..", "b").toString()).toBe("a/../b");
});
