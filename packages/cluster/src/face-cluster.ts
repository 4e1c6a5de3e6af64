import { NULL_VOXEL, debugAssert, type Chunk, type Extent3, type Vec3, type VoxelId } from "@voxgrid/core";
import { assertChunkExtent } from "./extent.js";
import type { ResolvedVoxel, VoxelResolver } from "./types.js";

export type FaceSlot = "c" | "nx" | "px" | "ny" | "py" | "nz" | "pz";

export const FACE_SLOTS: readonly FaceSlot[] = ["c", "nx", "px", "ny", "py", "nz", "pz"];

export type FaceClusterRefs = Partial<Record<FaceSlot, Chunk | null>>;

/** Side chunks including the center. */
export const FACE_CLUSTER_SIZE = 7;

/**
 * A center chunk and its six face neighbours. Positions may overflow the
 * center on a single axis only; overflowing two axes at once is not supported.
 * The cluster never owns the chunks it references.
 */
export class FaceCluster implements VoxelResolver {
  public readonly chunkSize: Extent3;

  private readonly slots: Record<FaceSlot, Chunk | null>;
  private readonly local: Vec3 = { x: 0, y: 0, z: 0 };

  public constructor(chunkSize: Extent3, refs: FaceClusterRefs = {}) {
    this.chunkSize = { x: chunkSize.x, y: chunkSize.y, z: chunkSize.z };
    this.slots = { c: null, nx: null, px: null, ny: null, py: null, nz: null, pz: null };
    for (const slot of FACE_SLOTS) {
      this.bind(slot, refs[slot] ?? null);
    }
  }

  public get c(): Chunk | null {
    return this.slots.c;
  }

  public set c(chunk: Chunk | null) {
    this.bind("c", chunk);
  }

  public get nx(): Chunk | null {
    return this.slots.nx;
  }

  public set nx(chunk: Chunk | null) {
    this.bind("nx", chunk);
  }

  public get px(): Chunk | null {
    return this.slots.px;
  }

  public set px(chunk: Chunk | null) {
    this.bind("px", chunk);
  }

  public get ny(): Chunk | null {
    return this.slots.ny;
  }

  public set ny(chunk: Chunk | null) {
    this.bind("ny", chunk);
  }

  public get py(): Chunk | null {
    return this.slots.py;
  }

  public set py(chunk: Chunk | null) {
    this.bind("py", chunk);
  }

  public get nz(): Chunk | null {
    return this.slots.nz;
  }

  public set nz(chunk: Chunk | null) {
    this.bind("nz", chunk);
  }

  public get pz(): Chunk | null {
    return this.slots.pz;
  }

  public set pz(chunk: Chunk | null) {
    this.bind("pz", chunk);
  }

  public isComplete(): boolean {
    return (
      this.c !== null &&
      this.nx !== null &&
      this.px !== null &&
      this.ny !== null &&
      this.py !== null &&
      this.nz !== null &&
      this.pz !== null
    );
  }

  public get(x: number, y: number, z: number): VoxelId {
    debugAssert(this.isComplete(), () => "Face cluster is incomplete");
    const chunk = this.locate(x, y, z);
    const p = this.local;
    return chunk ? chunk.get(p.x, p.y, p.z) : NULL_VOXEL;
  }

  public set(x: number, y: number, z: number, voxel: VoxelId): void {
    debugAssert(this.isComplete(), () => "Face cluster is incomplete");
    const chunk = this.locate(x, y, z);
    const p = this.local;
    if (chunk) chunk.set(p.x, p.y, p.z, voxel);
  }

  public tryGet(x: number, y: number, z: number): VoxelId | undefined {
    const chunk = this.locate(x, y, z);
    const p = this.local;
    return chunk ? chunk.tryGet(p.x, p.y, p.z) : undefined;
  }

  public trySet(x: number, y: number, z: number, voxel: VoxelId): boolean {
    const chunk = this.locate(x, y, z);
    const p = this.local;
    return chunk ? chunk.trySet(p.x, p.y, p.z, voxel) : false;
  }

  public resolveVoxel(x: number, y: number, z: number): ResolvedVoxel | null {
    const chunk = this.locate(x, y, z);
    const p = this.local;
    if (!chunk || !chunk.isInBounds(p.x, p.y, p.z)) return null;
    return { chunk, x: p.x, y: p.y, z: p.z };
  }

  private bind(slot: FaceSlot, chunk: Chunk | null): void {
    assertChunkExtent(this.chunkSize, chunk);
    this.slots[slot] = chunk;
  }

  // Axes are tested x, then y, then z; the first overflowing one wins.
  private locate(x: number, y: number, z: number): Chunk | null {
    const size = this.chunkSize;
    const p = this.local;
    p.x = x;
    p.y = y;
    p.z = z;

    if (x < 0) {
      p.x = x + size.x;
      return this.nx;
    }
    if (x >= size.x) {
      p.x = x - size.x;
      return this.px;
    }
    if (y < 0) {
      p.y = y + size.y;
      return this.ny;
    }
    if (y >= size.y) {
      p.y = y - size.y;
      return this.py;
    }
    if (z < 0) {
      p.z = z + size.z;
      return this.nz;
    }
    if (z >= size.z) {
      p.z = z - size.z;
      return this.pz;
    }
    return this.c;
  }
}
