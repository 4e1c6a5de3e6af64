import {
  NULL_VOXEL,
  debugAssert,
  indexToPos,
  posToIndex,
  type Chunk,
  type Extent3,
  type Vec3,
  type VoxelId
} from "@voxgrid/core";
import { assertChunkExtent } from "./extent.js";
import type { ResolvedVoxel, VoxelResolver } from "./types.js";

export const CUBE_CLUSTER_LENGTH = 3;
export const CUBE_CLUSTER_LAYER_SIZE = CUBE_CLUSTER_LENGTH * CUBE_CLUSTER_LENGTH;
export const CUBE_CLUSTER_SIZE = CUBE_CLUSTER_LAYER_SIZE * CUBE_CLUSTER_LENGTH;
export const CUBE_CLUSTER_CENTER = posToIndex(1, 1, 1, CUBE_CLUSTER_LENGTH, CUBE_CLUSTER_LAYER_SIZE);

/** Neighbour offset (-1, 0 or 1 per axis) of every cluster slot. */
export const CUBE_CLUSTER_OFFSETS: readonly Readonly<Vec3>[] = Object.freeze(
  Array.from({ length: CUBE_CLUSTER_SIZE }, (_, index) => {
    const slot = indexToPos(index, CUBE_CLUSTER_LENGTH, CUBE_CLUSTER_LAYER_SIZE);
    return Object.freeze({ x: slot.x - 1, y: slot.y - 1, z: slot.z - 1 });
  })
);

function isSlotInRange(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < CUBE_CLUSTER_LENGTH;
}

function isExtendedInRange(value: number, length: number): boolean {
  return Number.isInteger(value) && value >= -length && value < length * 2;
}

/**
 * 3x3x3 block of chunk references centered on slot (1, 1, 1), diagonals
 * included. Voxel positions are given relative to the center chunk and may
 * reach one chunk length beyond it on every axis.
 */
export class CubeCluster implements VoxelResolver {
  public readonly chunkSize: Extent3;

  private readonly chunks: (Chunk | null)[];
  private readonly scratch: Vec3 = { x: 0, y: 0, z: 0 };

  public constructor(chunkSize: Extent3, chunks: readonly (Chunk | null)[] = []) {
    if (chunks.length > CUBE_CLUSTER_SIZE) {
      throw new Error(`Cube cluster holds ${CUBE_CLUSTER_SIZE} chunks, got ${chunks.length}`);
    }
    this.chunkSize = { x: chunkSize.x, y: chunkSize.y, z: chunkSize.z };
    this.chunks = Array.from({ length: CUBE_CLUSTER_SIZE }, (_, index) => {
      const chunk = chunks[index] ?? null;
      assertChunkExtent(this.chunkSize, chunk);
      return chunk;
    });
  }

  public static slotIndex(x: number, y: number, z: number): number {
    return posToIndex(x, y, z, CUBE_CLUSTER_LENGTH, CUBE_CLUSTER_LAYER_SIZE);
  }

  public get center(): Chunk | null {
    return this.chunks[CUBE_CLUSTER_CENTER];
  }

  /** True when all 27 slots are populated. */
  public isComplete(): boolean {
    return this.chunks.every((chunk) => chunk !== null);
  }

  public isEmpty(): boolean {
    return this.chunks.every((chunk) => chunk === null);
  }

  public getChunk(x: number, y: number, z: number): Chunk | null {
    debugAssert(
      isSlotInRange(x) && isSlotInRange(y) && isSlotInRange(z),
      () => `Cluster slot (${x}, ${y}, ${z}) is outside 3x3x3`
    );
    return this.chunks[CubeCluster.slotIndex(x, y, z)];
  }

  public getChunkAt(index: number): Chunk | null {
    debugAssert(this.isSlotIndex(index), () => `Cluster slot ${index} is outside [0, ${CUBE_CLUSTER_SIZE})`);
    return this.chunks[index];
  }

  public tryGetChunk(x: number, y: number, z: number): Chunk | null {
    if (!isSlotInRange(x) || !isSlotInRange(y) || !isSlotInRange(z)) return null;
    return this.chunks[CubeCluster.slotIndex(x, y, z)];
  }

  public tryGetChunkAt(index: number): Chunk | null {
    if (!this.isSlotIndex(index)) return null;
    return this.chunks[index];
  }

  public unsafeGetChunk(x: number, y: number, z: number): Chunk | null {
    return this.chunks[CubeCluster.slotIndex(x, y, z)];
  }

  public unsafeGetChunkAt(index: number): Chunk | null {
    return this.chunks[index];
  }

  public setChunk(x: number, y: number, z: number, chunk: Chunk | null): void {
    debugAssert(
      isSlotInRange(x) && isSlotInRange(y) && isSlotInRange(z),
      () => `Cluster slot (${x}, ${y}, ${z}) is outside 3x3x3`
    );
    assertChunkExtent(this.chunkSize, chunk);
    this.chunks[CubeCluster.slotIndex(x, y, z)] = chunk;
  }

  public setChunkAt(index: number, chunk: Chunk | null): void {
    debugAssert(this.isSlotIndex(index), () => `Cluster slot ${index} is outside [0, ${CUBE_CLUSTER_SIZE})`);
    assertChunkExtent(this.chunkSize, chunk);
    this.chunks[index] = chunk;
  }

  public isExtendedInBounds(x: number, y: number, z: number): boolean {
    const size = this.chunkSize;
    return isExtendedInRange(x, size.x) && isExtendedInRange(y, size.y) && isExtendedInRange(z, size.z);
  }

  /**
   * Resolves the chunk owning `pos` and rewrites `pos` in place to be local
   * to that chunk. Returns null when the owning slot is empty.
   */
  public getVoxelChunk(pos: Vec3): Chunk | null {
    debugAssert(
      this.isExtendedInBounds(pos.x, pos.y, pos.z),
      () => `Voxel position (${pos.x}, ${pos.y}, ${pos.z}) is outside the cluster`
    );
    return this.fold(pos);
  }

  public getVoxel(x: number, y: number, z: number, sentinel: VoxelId = NULL_VOXEL): VoxelId {
    const pos = this.at(x, y, z);
    const chunk = this.getVoxelChunk(pos);
    return chunk ? chunk.get(pos.x, pos.y, pos.z) : sentinel;
  }

  public setVoxel(x: number, y: number, z: number, voxel: VoxelId): void {
    const pos = this.at(x, y, z);
    const chunk = this.getVoxelChunk(pos);
    debugAssert(chunk !== null, () => `No chunk holds voxel position (${x}, ${y}, ${z})`);
    if (chunk) chunk.set(pos.x, pos.y, pos.z, voxel);
  }

  public tryGetVoxel(x: number, y: number, z: number): VoxelId | undefined {
    if (!this.isExtendedInBounds(x, y, z)) return undefined;
    const pos = this.at(x, y, z);
    const chunk = this.fold(pos);
    return chunk ? chunk.tryGet(pos.x, pos.y, pos.z) : undefined;
  }

  public trySetVoxel(x: number, y: number, z: number, voxel: VoxelId): boolean {
    if (!this.isExtendedInBounds(x, y, z)) return false;
    const pos = this.at(x, y, z);
    const chunk = this.fold(pos);
    return chunk ? chunk.trySet(pos.x, pos.y, pos.z, voxel) : false;
  }

  public unsafeGetVoxel(x: number, y: number, z: number, sentinel: VoxelId = NULL_VOXEL): VoxelId {
    const pos = this.at(x, y, z);
    const chunk = this.fold(pos);
    return chunk ? chunk.unsafeGet(pos.x, pos.y, pos.z) : sentinel;
  }

  public tryGet(x: number, y: number, z: number): VoxelId | undefined {
    return this.tryGetVoxel(x, y, z);
  }

  public trySet(x: number, y: number, z: number, voxel: VoxelId): boolean {
    return this.trySetVoxel(x, y, z, voxel);
  }

  public resolveVoxel(x: number, y: number, z: number): ResolvedVoxel | null {
    if (!this.isExtendedInBounds(x, y, z)) return null;
    const pos = { x, y, z };
    const chunk = this.fold(pos);
    if (!chunk || !chunk.isInBounds(pos.x, pos.y, pos.z)) return null;
    return { chunk, x: pos.x, y: pos.y, z: pos.z };
  }

  private isSlotIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < CUBE_CLUSTER_SIZE;
  }

  private at(x: number, y: number, z: number): Vec3 {
    const pos = this.scratch;
    pos.x = x;
    pos.y = y;
    pos.z = z;
    return pos;
  }

  // Math.floor, not truncation: slot 0 covers [-length, -1].
  private fold(pos: Vec3): Chunk | null {
    const size = this.chunkSize;
    const slotX = Math.floor((pos.x + size.x) / size.x);
    const slotY = Math.floor((pos.y + size.y) / size.y);
    const slotZ = Math.floor((pos.z + size.z) / size.z);
    pos.x -= (slotX - 1) * size.x;
    pos.y -= (slotY - 1) * size.y;
    pos.z -= (slotZ - 1) * size.z;
    return this.chunks[CubeCluster.slotIndex(slotX, slotY, slotZ)] ?? null;
  }
}
