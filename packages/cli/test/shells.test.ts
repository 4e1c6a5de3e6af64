import { describe, expect, it } from "vitest";
import { isShellOrder, listShellPoints, summarizeShells } from "../src/index.js";

describe("summarizeShells", () => {
  it("lists the shells of an expanding traversal", () => {
    expect(summarizeShells(4, "expand")).toEqual({
      size: 4,
      order: "expand",
      centerPoints: 8,
      shells: [{ positive: 3, negative: 0, points: 56 }],
      total: 64
    });
  });

  it("lists the shells of a shrinking traversal outermost first", () => {
    expect(summarizeShells(5, "shrink")).toEqual({
      size: 5,
      order: "shrink",
      centerPoints: 1,
      shells: [
        { positive: 4, negative: 0, points: 98 },
        { positive: 3, negative: 1, points: 26 }
      ],
      total: 125
    });
  });
});

describe("listShellPoints", () => {
  it("prints points in visiting order", () => {
    const lines = listShellPoints(3, "shrink");
    expect(lines).toHaveLength(27);
    expect(lines[0]).toBe("0,0,0");
    expect(lines[26]).toBe("1,1,1");
    expect(listShellPoints(3, "expand")[0]).toBe("1,1,1");
  });
});

describe("isShellOrder", () => {
  it("accepts only the two orders", () => {
    expect(isShellOrder("expand")).toBe(true);
    expect(isShellOrder("shrink")).toBe(true);
    expect(isShellOrder("spiral")).toBe(false);
  });
});
