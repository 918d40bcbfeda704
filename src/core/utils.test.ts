import path from "node:path";

import { describe, expect, it } from "vitest";

import { ignoreNestedRoot, toPosixRelative, truncateTail } from "./utils.js";

describe("ignoreNestedRoot", () => {
  it("ignores a directory strictly inside the walked root", () => {
    expect(ignoreNestedRoot("/data/src", "/data/src/build/pdf")).toEqual([
      "build/pdf",
      "build/pdf/**",
    ]);
  });

  it("ignores nothing for siblings, parents or the root itself", () => {
    expect(ignoreNestedRoot("/data/src", "/data/out")).toEqual([]);
    expect(ignoreNestedRoot("/data/src", "/data")).toEqual([]);
    expect(ignoreNestedRoot("/data/src", "/data/src")).toEqual([]);
  });

  it("keeps a sibling whose name starts with two dots", () => {
    expect(ignoreNestedRoot("/data/src", path.join("/data/src", "..out"))).toEqual([
      "..out",
      "..out/**",
    ]);
  });
});

describe("toPosixRelative", () => {
  it("returns a dot for the root itself", () => {
    expect(toPosixRelative("/data/src", "/data/src")).toBe(".");
    expect(toPosixRelative("/data/src", "/data/src/fig/deep")).toBe("fig/deep");
  });
});

describe("truncateTail", () => {
  it("keeps the last lines", () => {
    expect(truncateTail("a\nb\nc\n", 2)).toBe("b\nc");
    expect(truncateTail("a\n", 5)).toBe("a");
  });
});
