import type { Vec3 } from "./types.js";

// Row-major, x fastest: index = z * layerSize + y * length + x.

export function posToIndex(x: number, y: number, z: number, length: number, layerSize: number): number {
  return z * layerSize + y * length + x;
}

export function indexToPos(index: number, length: number, layerSize: number, out: Vec3 = { x: 0, y: 0, z: 0 }): Vec3 {
  const rem = index % layerSize;
  out.z = Math.floor(index / layerSize);
  out.y = Math.floor(rem / length);
  out.x = rem % length;
  return out;
}

export function volumeOf(x: number, y: number, z: number): number {
  return x * y * z;
}
