import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import {
  MAX_CHUNK_EXTENT,
  VOXEL_FORMATS,
  bytesPerVoxel,
  isVoxelFormat,
  maxVoxelFor,
  type Extent3,
  type VoxelFormat
} from "@voxgrid/core";

export interface LayoutConfig {
  chunk: Extent3;
  format: VoxelFormat;
  debugChecks: boolean;
}

export interface LayoutSummary {
  sizeX: number;
  sizeY: number;
  sizeZ: number;
  layerSize: number;
  size: number;
  format: VoxelFormat;
  bytesPerVoxel: number;
  totalBytes: number;
  maxVoxel: number;
  debugChecks: boolean;
}

export const DEFAULT_LAYOUT: LayoutConfig = {
  chunk: { x: 16, y: 16, z: 16 },
  format: "u8",
  debugChecks: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readExtent(chunk: Record<string, unknown>, key: string, fallback: number): number {
  const value = chunk[key] ?? fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > MAX_CHUNK_EXTENT) {
    throw new Error(`Invalid layout config: chunk.${key} must be an integer in [1, ${MAX_CHUNK_EXTENT}]`);
  }
  return value;
}

export function parseLayoutConfig(raw: unknown): LayoutConfig {
  if (!isRecord(raw)) {
    return { ...DEFAULT_LAYOUT, chunk: { ...DEFAULT_LAYOUT.chunk } };
  }

  const chunk = raw.chunk ?? {};
  if (!isRecord(chunk)) {
    throw new Error("Invalid layout config: chunk must be a mapping");
  }

  const format = raw.format ?? DEFAULT_LAYOUT.format;
  if (!isVoxelFormat(format)) {
    throw new Error(`Invalid layout config: format must be one of ${VOXEL_FORMATS.join(", ")}`);
  }

  const debugChecks = raw.debugChecks ?? DEFAULT_LAYOUT.debugChecks;
  if (typeof debugChecks !== "boolean") {
    throw new Error("Invalid layout config: debugChecks must be a boolean");
  }

  return {
    chunk: {
      x: readExtent(chunk, "sizeX", DEFAULT_LAYOUT.chunk.x),
      y: readExtent(chunk, "sizeY", DEFAULT_LAYOUT.chunk.y),
      z: readExtent(chunk, "sizeZ", DEFAULT_LAYOUT.chunk.z)
    },
    format,
    debugChecks
  };
}

export function readLayoutFromYaml(path: string): LayoutConfig {
  const raw = readFileSync(path, "utf8");
  return parseLayoutConfig(YAML.load(raw));
}

export function describeLayout(layout: LayoutConfig): LayoutSummary {
  const { x, y, z } = layout.chunk;
  const size = x * y * z;
  return {
    sizeX: x,
    sizeY: y,
    sizeZ: z,
    layerSize: x * y,
    size,
    format: layout.format,
    bytesPerVoxel: bytesPerVoxel(layout.format),
    totalBytes: size * bytesPerVoxel(layout.format),
    maxVoxel: maxVoxelFor(layout.format),
    debugChecks: layout.debugChecks
  };
}
