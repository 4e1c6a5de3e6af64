import type { Chunk, Extent3, VoxelId } from "@voxgrid/core";

export interface ResolvedVoxel {
  chunk: Chunk;
  x: number;
  y: number;
  z: number;
}

/**
 * Common contract of the cluster topologies: map a position relative to the
 * center chunk onto the chunk that owns it.
 */
export interface VoxelResolver {
  readonly chunkSize: Extent3;
  isComplete(): boolean;
  /** Owning chunk and local position, or null when no populated chunk holds the position. */
  resolveVoxel(x: number, y: number, z: number): ResolvedVoxel | null;
  tryGet(x: number, y: number, z: number): VoxelId | undefined;
  trySet(x: number, y: number, z: number, voxel: VoxelId): boolean;
}
