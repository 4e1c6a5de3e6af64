import type { VoxelArray, VoxelFormat, VoxelId } from "./types.js";

/** Empty (air) voxel. */
export const NULL_VOXEL: VoxelId = 0;
/** Missing or placeholder voxel. */
export const UNKNOWN_VOXEL: VoxelId = 1;
export const DEBUG_VOXEL: VoxelId = 2;
/** First caller-defined voxel ID. */
export const PREDEFINED_VOXEL_COUNT = 3;

export const VOXEL_FORMATS: readonly VoxelFormat[] = ["u8", "u16", "u32"];

export function isPredefinedVoxel(voxel: VoxelId): boolean {
  return voxel >= 0 && voxel < PREDEFINED_VOXEL_COUNT;
}

export function isVoxelFormat(value: unknown): value is VoxelFormat {
  return typeof value === "string" && (VOXEL_FORMATS as readonly string[]).includes(value);
}

export function bytesPerVoxel(format: VoxelFormat): number {
  switch (format) {
    case "u8":
      return 1;
    case "u16":
      return 2;
    case "u32":
      return 4;
  }
}

export function maxVoxelFor(format: VoxelFormat): VoxelId {
  return 2 ** (bytesPerVoxel(format) * 8) - 1;
}

export function isVoxelInRange(voxel: VoxelId, format: VoxelFormat): boolean {
  return Number.isInteger(voxel) && voxel >= 0 && voxel <= maxVoxelFor(format);
}

export function voxelArrayFor(format: VoxelFormat, length: number): VoxelArray {
  switch (format) {
    case "u8":
      return new Uint8Array(length);
    case "u16":
      return new Uint16Array(length);
    case "u32":
      return new Uint32Array(length);
  }
}

export function isVoxelArray(value: unknown): value is VoxelArray {
  return value instanceof Uint8Array || value instanceof Uint16Array || value instanceof Uint32Array;
}
