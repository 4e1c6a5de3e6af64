import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { AssertionError, Chunk, type Extent3 } from "@voxgrid/core";
import { FaceCluster, type FaceSlot } from "../src/index.js";

const SIZE: Extent3 = { x: 4, y: 5, z: 6 };

function buildCluster(): { cluster: FaceCluster; chunks: Record<FaceSlot, Chunk> } {
  const chunks: Record<FaceSlot, Chunk> = {
    c: new Chunk(SIZE, "u8", 10),
    nx: new Chunk(SIZE, "u8", 11),
    px: new Chunk(SIZE, "u8", 12),
    ny: new Chunk(SIZE, "u8", 13),
    py: new Chunk(SIZE, "u8", 14),
    nz: new Chunk(SIZE, "u8", 15),
    pz: new Chunk(SIZE, "u8", 16)
  };
  return { cluster: new FaceCluster(SIZE, chunks), chunks };
}

describe("FaceCluster", () => {
  it("is complete only with all seven chunks", () => {
    const { cluster } = buildCluster();
    expect(cluster.isComplete()).toBe(true);
    cluster.pz = null;
    expect(cluster.isComplete()).toBe(false);
    expect(new FaceCluster(SIZE).isComplete()).toBe(false);
  });

  it("reads in-bounds positions from the center chunk", () => {
    const { cluster, chunks } = buildCluster();
    chunks.c.set(3, 4, 5, 99);
    expect(cluster.get(0, 0, 0)).toBe(10);
    expect(cluster.get(3, 4, 5)).toBe(99);
  });

  it("redirects a single-axis overflow to the face neighbour", () => {
    const { cluster, chunks } = buildCluster();
    chunks.nx.set(3, 1, 2, 50);
    chunks.px.set(0, 1, 2, 51);
    chunks.ny.set(1, 4, 2, 52);
    chunks.py.set(1, 0, 2, 53);
    chunks.nz.set(1, 2, 5, 54);
    chunks.pz.set(1, 2, 0, 55);

    expect(cluster.get(-1, 1, 2)).toBe(50);
    expect(cluster.get(4, 1, 2)).toBe(51);
    expect(cluster.get(1, -1, 2)).toBe(52);
    expect(cluster.get(1, 5, 2)).toBe(53);
    expect(cluster.get(1, 2, -1)).toBe(54);
    expect(cluster.get(1, 2, 6)).toBe(55);
  });

  it("property: x = -1 reads the last column of nx", () => {
    const { cluster, chunks } = buildCluster();
    fc.assert(
      fc.property(
        fc.uint8Array({ minLength: 120, maxLength: 120 }),
        fc.integer({ min: 0, max: 4 }),
        fc.integer({ min: 0, max: 5 }),
        (data, y, z) => {
          chunks.nx.copy(data);
          return cluster.get(-1, y, z) === chunks.nx.get(SIZE.x - 1, y, z);
        }
      )
    );
  });

  it("writes through to the neighbour", () => {
    const { cluster, chunks } = buildCluster();
    cluster.set(-1, 0, 0, 77);
    cluster.set(2, 2, 6, 78);
    expect(chunks.nx.get(3, 0, 0)).toBe(77);
    expect(chunks.pz.get(2, 2, 0)).toBe(78);
    expect(chunks.c.countOf(77)).toBe(0);
  });

  it("asserts completeness in the unchecked accessors", () => {
    const cluster = new FaceCluster(SIZE, { c: new Chunk(SIZE, "u8") });
    expect(() => cluster.get(0, 0, 0)).toThrow(AssertionError);
    expect(() => cluster.set(0, 0, 0, 1)).toThrow("Face cluster is incomplete");
  });

  it("fails the checked accessors on missing neighbours", () => {
    const c = new Chunk(SIZE, "u8", 4);
    const cluster = new FaceCluster(SIZE, { c });
    expect(cluster.tryGet(-1, 0, 0)).toBeUndefined();
    expect(cluster.trySet(0, 5, 0, 9)).toBe(false);
    expect(cluster.tryGet(1, 1, 1)).toBe(4);
    expect(cluster.trySet(1, 1, 1, 9)).toBe(true);
    expect(c.get(1, 1, 1)).toBe(9);
  });

  it("fails the checked accessors on multi-axis overflow", () => {
    const { cluster, chunks } = buildCluster();
    expect(cluster.tryGet(-1, -1, 0)).toBeUndefined();
    expect(cluster.trySet(4, 0, 6, 1)).toBe(false);
    expect(chunks.px.countOf(1)).toBe(0);
  });

  it("rejects chunks whose extents differ from the cluster's", () => {
    const wide = new Chunk({ x: 8, y: 8, z: 8 }, "u8");
    expect(() => new FaceCluster({ x: 4, y: 4, z: 4 }, { c: wide })).toThrow(
      "Chunk 8x8x8 does not match cluster chunk size 4x4x4"
    );
    const { cluster, chunks } = buildCluster();
    expect(() => {
      cluster.px = wide;
    }).toThrow("Chunk 8x8x8 does not match cluster chunk size 4x5x6");
    expect(cluster.px).toBe(chunks.px);
  });

  it("refuses voxels the neighbour's storage cannot hold", () => {
    const { cluster, chunks } = buildCluster();
    expect(cluster.trySet(-1, 0, 0, 300)).toBe(false);
    expect(chunks.nx.get(3, 0, 0)).toBe(11);
  });

  it("resolves positions to the owning chunk", () => {
    const { cluster, chunks } = buildCluster();
    expect(cluster.resolveVoxel(4, 0, 0)).toEqual({ chunk: chunks.px, x: 0, y: 0, z: 0 });
    expect(cluster.resolveVoxel(0, -5, 3)).toEqual({ chunk: chunks.ny, x: 0, y: 0, z: 3 });
    expect(cluster.resolveVoxel(0, -6, 3)).toBeNull();
    cluster.nz = null;
    expect(cluster.resolveVoxel(0, 0, -1)).toBeNull();
  });
});
