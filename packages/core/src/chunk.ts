import type { CopyRegion, Extent3, Vec3, VoxelArray, VoxelFormat, VoxelId } from "./types.js";
import { debugAssert } from "./debug.js";
import { indexToPos, posToIndex } from "./indexing.js";
import { NULL_VOXEL, isVoxelArray, isVoxelInRange, voxelArrayFor } from "./voxel.js";

export const MAX_CHUNK_EXTENT = 255;

const ORIGIN: Extent3 = { x: 0, y: 0, z: 0 };

function assertExtent(axis: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_CHUNK_EXTENT) {
    throw new Error(`Chunk ${axis} extent must be an integer in [1, ${MAX_CHUNK_EXTENT}], got ${String(value)}`);
  }
}

function isInRange(value: number, extent: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < extent;
}

/**
 * Dense 3D array of voxel IDs with fixed extents.
 *
 * Accessors come in three tiers:
 * - `get`/`set`: trusted; contract violations only raise while debug checks are on.
 * - `tryGet`/`trySet`: bounds-checked, never touch memory outside the volume;
 *   `trySet` also refuses voxels the storage format cannot hold.
 * - `unsafeGet`/`unsafeSet`: never checked.
 *
 * Each tier has an `*At` form addressed by linear index.
 */
export class Chunk {
  public readonly sizeX: number;
  public readonly sizeY: number;
  public readonly sizeZ: number;
  public readonly layerSize: number;
  public readonly size: number;
  public readonly format: VoxelFormat;
  public readonly voxels: VoxelArray;

  public constructor(extent: Extent3, format: VoxelFormat = "u32", voxel: VoxelId = NULL_VOXEL) {
    assertExtent("x", extent.x);
    assertExtent("y", extent.y);
    assertExtent("z", extent.z);
    this.sizeX = extent.x;
    this.sizeY = extent.y;
    this.sizeZ = extent.z;
    this.layerSize = extent.x * extent.y;
    this.size = this.layerSize * extent.z;
    this.format = format;
    this.voxels = voxelArrayFor(format, this.size);
    if (voxel !== NULL_VOXEL) {
      this.fill(voxel);
    }
  }

  public static filled(extent: Extent3, format: VoxelFormat, voxel: VoxelId): Chunk {
    return new Chunk(extent, format, voxel);
  }

  public static fromRegion(
    extent: Extent3,
    format: VoxelFormat,
    source: ArrayLike<VoxelId>,
    region: CopyRegion
  ): Chunk {
    const chunk = new Chunk(extent, format);
    chunk.copy(source, region);
    return chunk;
  }

  public get extent(): Extent3 {
    return { x: this.sizeX, y: this.sizeY, z: this.sizeZ };
  }

  public isInBounds(x: number, y: number, z: number): boolean {
    return isInRange(x, this.sizeX) && isInRange(y, this.sizeY) && isInRange(z, this.sizeZ);
  }

  public isIndexInBounds(index: number): boolean {
    return isInRange(index, this.size);
  }

  public indexOf(x: number, y: number, z: number): number {
    return posToIndex(x, y, z, this.sizeX, this.layerSize);
  }

  public positionOf(index: number, out?: Vec3): Vec3 {
    return indexToPos(index, this.sizeX, this.layerSize, out);
  }

  public get(x: number, y: number, z: number): VoxelId {
    this.assertPosition(x, y, z);
    return this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)];
  }

  public set(x: number, y: number, z: number, voxel: VoxelId): void {
    this.assertPosition(x, y, z);
    this.assertVoxel(voxel);
    this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)] = voxel;
  }

  public getAt(index: number): VoxelId {
    this.assertIndex(index);
    return this.voxels[index];
  }

  public setAt(index: number, voxel: VoxelId): void {
    this.assertIndex(index);
    this.assertVoxel(voxel);
    this.voxels[index] = voxel;
  }

  public tryGet(x: number, y: number, z: number): VoxelId | undefined {
    if (!this.isInBounds(x, y, z)) return undefined;
    return this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)];
  }

  public trySet(x: number, y: number, z: number, voxel: VoxelId): boolean {
    if (!this.isInBounds(x, y, z) || !isVoxelInRange(voxel, this.format)) return false;
    this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)] = voxel;
    return true;
  }

  public tryGetAt(index: number): VoxelId | undefined {
    if (!this.isIndexInBounds(index)) return undefined;
    return this.voxels[index];
  }

  public trySetAt(index: number, voxel: VoxelId): boolean {
    if (!this.isIndexInBounds(index) || !isVoxelInRange(voxel, this.format)) return false;
    this.voxels[index] = voxel;
    return true;
  }

  public unsafeGet(x: number, y: number, z: number): VoxelId {
    return this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)];
  }

  public unsafeSet(x: number, y: number, z: number, voxel: VoxelId): void {
    this.voxels[posToIndex(x, y, z, this.sizeX, this.layerSize)] = voxel;
  }

  public unsafeGetAt(index: number): VoxelId {
    return this.voxels[index];
  }

  public unsafeSetAt(index: number, voxel: VoxelId): void {
    this.voxels[index] = voxel;
  }

  /** `fill(NULL_VOXEL)` zero-fills the backing array. */
  public fill(voxel: VoxelId): void {
    this.assertVoxel(voxel);
    this.voxels.fill(voxel);
  }

  /**
   * Overwrites the whole chunk from `source`, or with `region` only the
   * sub-volume `count` read from `source` (a volume of `sourceSize`).
   */
  public copy(source: ArrayLike<VoxelId>, region?: CopyRegion): void {
    if (!region) {
      debugAssert(source.length === this.size, () => `Copy source holds ${source.length} voxels, chunk holds ${this.size}`);
      this.voxels.set(source);
      return;
    }

    const { sourceSize, count } = region;
    const sourceOffset = region.sourceOffset ?? ORIGIN;
    const targetOffset = region.targetOffset ?? ORIGIN;
    const sourceLayerSize = sourceSize.x * sourceSize.y;

    debugAssert(
      count.x + targetOffset.x <= this.sizeX && count.y + targetOffset.y <= this.sizeY && count.z + targetOffset.z <= this.sizeZ,
      () => `Copy target region exceeds chunk ${this.sizeX}x${this.sizeY}x${this.sizeZ}`
    );
    debugAssert(
      count.x + sourceOffset.x <= sourceSize.x &&
        count.y + sourceOffset.y <= sourceSize.y &&
        count.z + sourceOffset.z <= sourceSize.z,
      () => `Copy source region exceeds source ${sourceSize.x}x${sourceSize.y}x${sourceSize.z}`
    );
    debugAssert(
      source.length >= sourceLayerSize * sourceSize.z,
      () => `Copy source holds ${source.length} voxels, expected ${sourceLayerSize * sourceSize.z}`
    );

    if (
      count.x === this.sizeX &&
      count.y === this.sizeY &&
      count.z === this.sizeZ &&
      sourceSize.x === this.sizeX &&
      sourceSize.y === this.sizeY &&
      sourceOffset.z === 0
    ) {
      // Contiguous: the x/y offsets must be zero for the counts above to fit.
      const length = this.size;
      if (isVoxelArray(source)) {
        this.voxels.set(source.subarray(0, length));
      } else {
        for (let i = 0; i < length; i++) this.voxels[i] = source[i];
      }
      return;
    }

    const rowLength = count.x;
    for (let z = 0; z < count.z; z++) {
      for (let y = 0; y < count.y; y++) {
        const from = posToIndex(sourceOffset.x, sourceOffset.y + y, sourceOffset.z + z, sourceSize.x, sourceLayerSize);
        const to = posToIndex(targetOffset.x, targetOffset.y + y, targetOffset.z + z, this.sizeX, this.layerSize);
        if (isVoxelArray(source)) {
          this.voxels.set(source.subarray(from, from + rowLength), to);
        } else {
          for (let x = 0; x < rowLength; x++) this.voxels[to + x] = source[from + x];
        }
      }
    }
  }

  public countOf(voxel: VoxelId): number {
    let count = 0;
    for (let i = 0; i < this.size; i++) {
      if (this.voxels[i] === voxel) count++;
    }
    return count;
  }

  public clone(): Chunk {
    const chunk = new Chunk(this.extent, this.format);
    chunk.voxels.set(this.voxels);
    return chunk;
  }

  public equals(other: Chunk): boolean {
    if (
      other.sizeX !== this.sizeX ||
      other.sizeY !== this.sizeY ||
      other.sizeZ !== this.sizeZ ||
      other.format !== this.format
    ) {
      return false;
    }
    for (let i = 0; i < this.size; i++) {
      if (other.voxels[i] !== this.voxels[i]) return false;
    }
    return true;
  }

  private assertPosition(x: number, y: number, z: number): void {
    debugAssert(
      this.isInBounds(x, y, z),
      () => `Voxel position (${x}, ${y}, ${z}) is outside chunk ${this.sizeX}x${this.sizeY}x${this.sizeZ}`
    );
  }

  private assertIndex(index: number): void {
    debugAssert(this.isIndexInBounds(index), () => `Voxel index ${index} is outside chunk of ${this.size} voxels`);
  }

  private assertVoxel(voxel: VoxelId): void {
    debugAssert(isVoxelInRange(voxel, this.format), () => `Voxel ${voxel} does not fit ${this.format} storage`);
  }
}
