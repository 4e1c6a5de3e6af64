import type { Chunk, Extent3 } from "@voxgrid/core";

/** Throws when a chunk bound into a cluster does not have the cluster's chunk extents. */
export function assertChunkExtent(chunkSize: Extent3, chunk: Chunk | null): void {
  if (!chunk) return;
  if (chunk.sizeX !== chunkSize.x || chunk.sizeY !== chunkSize.y || chunk.sizeZ !== chunkSize.z) {
    throw new Error(
      `Chunk ${chunk.sizeX}x${chunk.sizeY}x${chunk.sizeZ} does not match cluster chunk size ` +
        `${chunkSize.x}x${chunkSize.y}x${chunkSize.z}`
    );
  }
}
