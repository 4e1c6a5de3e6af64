import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { indexToPos, posToIndex, volumeOf } from "../src/index.js";

describe("posToIndex", () => {
  it("lays voxels out x fastest, then y, then z", () => {
    expect(posToIndex(0, 0, 0, 16, 256)).toBe(0);
    expect(posToIndex(1, 0, 0, 16, 256)).toBe(1);
    expect(posToIndex(0, 1, 0, 16, 256)).toBe(16);
    expect(posToIndex(0, 0, 1, 16, 256)).toBe(256);
    expect(posToIndex(1, 2, 3, 16, 256)).toBe(801);
  });

  it("is injective over a whole volume", () => {
    const [sx, sy, sz] = [5, 3, 4];
    const seen = new Set<number>();
    for (let z = 0; z < sz; z++) {
      for (let y = 0; y < sy; y++) {
        for (let x = 0; x < sx; x++) {
          seen.add(posToIndex(x, y, z, sx, sx * sy));
        }
      }
    }
    expect(seen.size).toBe(volumeOf(sx, sy, sz));
    expect(Math.min(...seen)).toBe(0);
    expect(Math.max(...seen)).toBe(59);
  });
});

describe("indexToPos", () => {
  it("splits an index back into coordinates", () => {
    expect(indexToPos(801, 16, 256)).toEqual({ x: 1, y: 2, z: 3 });
  });

  it("writes into the given target", () => {
    const out = { x: -1, y: -1, z: -1 };
    const result = indexToPos(59, 5, 15, out);
    expect(result).toBe(out);
    expect(out).toEqual({ x: 4, y: 2, z: 3 });
  });

  it("property: inverts posToIndex for every valid position", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 255 }),
        fc.integer({ min: 1, max: 255 }),
        fc.integer({ min: 1, max: 255 }),
        fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }),
        fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }),
        fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }),
        (sx, sy, sz, fx, fy, fz) => {
          const x = Math.floor(fx * sx);
          const y = Math.floor(fy * sy);
          const z = Math.floor(fz * sz);
          const index = posToIndex(x, y, z, sx, sx * sy);
          const pos = indexToPos(index, sx, sx * sy);
          return index >= 0 && index < sx * sy * sz && pos.x === x && pos.y === y && pos.z === z;
        }
      )
    );
  });
});
