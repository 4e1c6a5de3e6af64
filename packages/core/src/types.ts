export type VoxelId = number;

/** Element type of a chunk's backing array. */
export type VoxelFormat = "u8" | "u16" | "u32";

export type VoxelArray = Uint8Array | Uint16Array | Uint32Array;

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Extent3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Rectangular sub-volume copied by `Chunk.copy`. Offsets default to the origin.
 */
export interface CopyRegion {
  sourceSize: Extent3;
  count: Extent3;
  sourceOffset?: Extent3;
  targetOffset?: Extent3;
}
