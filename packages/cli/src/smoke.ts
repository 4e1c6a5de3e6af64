import { CUBE_CLUSTER_OFFSETS, CUBE_CLUSTER_SIZE, CubeCluster, FaceCluster } from "@voxgrid/cluster";
import { Chunk, DEBUG_VOXEL, PREDEFINED_VOXEL_COUNT, maxVoxelFor, setDebugChecks } from "@voxgrid/core";
import { expandShells, shrinkShells } from "@voxgrid/iterator";
import { describeLayout, type LayoutConfig, type LayoutSummary } from "./config.js";

export interface SmokeSummary {
  layout: LayoutSummary;
  checks: number;
  failures: string[];
}

/**
 * Builds a full 27-chunk cluster from the layout and checks cross-boundary
 * reads and writes, the face cluster view of the same chunks, region copies
 * and both shell traversals.
 */
export function runSmoke(layout: LayoutConfig): SmokeSummary {
  setDebugChecks(layout.debugChecks);

  const { x: sx, y: sy, z: sz } = layout.chunk;
  const failures: string[] = [];
  let checks = 0;
  const check = (name: string, ok: boolean): void => {
    checks++;
    if (!ok) failures.push(name);
  };

  if (PREDEFINED_VOXEL_COUNT + CUBE_CLUSTER_SIZE > maxVoxelFor(layout.format)) {
    throw new Error(`Voxel format ${layout.format} cannot label ${CUBE_CLUSTER_SIZE} chunks`);
  }
  const chunks = Array.from(
    { length: CUBE_CLUSTER_SIZE },
    (_, slot) => new Chunk(layout.chunk, layout.format, PREDEFINED_VOXEL_COUNT + slot)
  );
  const cube = new CubeCluster(layout.chunk, chunks);
  check("cube cluster is complete", cube.isComplete());

  CUBE_CLUSTER_OFFSETS.forEach((offset, slot) => {
    const expected = PREDEFINED_VOXEL_COUNT + slot;
    const x = offset.x * sx;
    const y = offset.y * sy;
    const z = offset.z * sz;
    check(`slot ${slot} origin`, cube.getVoxel(x, y, z) === expected);
    check(`slot ${slot} far corner`, cube.getVoxel(x + sx - 1, y + sy - 1, z + sz - 1) === expected);
  });

  cube.setVoxel(-1, -1, -1, DEBUG_VOXEL);
  check("write below the center corner", chunks[0].get(sx - 1, sy - 1, sz - 1) === DEBUG_VOXEL);
  cube.setVoxel(sx, sy, sz, DEBUG_VOXEL);
  check("write above the center corner", chunks[26].get(0, 0, 0) === DEBUG_VOXEL);

  const face = new FaceCluster(layout.chunk, {
    c: cube.getChunk(1, 1, 1),
    nx: cube.getChunk(0, 1, 1),
    px: cube.getChunk(2, 1, 1),
    ny: cube.getChunk(1, 0, 1),
    py: cube.getChunk(1, 2, 1),
    nz: cube.getChunk(1, 1, 0),
    pz: cube.getChunk(1, 1, 2)
  });
  check("face cluster is complete", face.isComplete());
  const probes: [number, number, number][] = [
    [0, 0, 0],
    [-1, 0, 0],
    [sx, 0, 0],
    [0, -1, 0],
    [0, sy, 0],
    [0, 0, -1],
    [0, 0, sz]
  ];
  for (const [x, y, z] of probes) {
    check(`face read (${x}, ${y}, ${z})`, face.get(x, y, z) === cube.getVoxel(x, y, z));
  }

  const copy = new Chunk(layout.chunk, layout.format);
  copy.copy(chunks[13].voxels, { sourceSize: layout.chunk, count: layout.chunk });
  check("full region copy", copy.equals(chunks[13]));

  const n = Math.min(sx, sy, sz);
  let expanded = 0;
  expandShells(() => expanded++, n);
  check("expanding traversal covers the volume", expanded === n ** 3);

  let shrunk = 0;
  let last = "";
  shrinkShells((x, y, z) => {
    shrunk++;
    last = `${x},${y},${z}`;
  }, n);
  check("shrinking traversal covers the volume", shrunk === n ** 3);
  if (n % 2 === 1) {
    const c = (n - 1) / 2;
    check("shrinking traversal ends at the center", last === `${c},${c},${c}`);
  }

  return { layout: describeLayout(layout), checks, failures };
}
