import type { Bounds, GridDims, Voxel } from "./types.js";

export function emptyBounds(): Bounds {
  return {
    minX: 0,
    minY: 0,
    minZ: 0,
    maxX: -1,
    maxY: -1,
    maxZ: -1,
    dx: 0,
    dy: 0,
    dz: 0
  };
}

export function computeBounds(voxels: readonly Voxel[]): Bounds {
  if (voxels.length === 0) {
    return emptyBounds();
  }

  const first = voxels[0];
  let minX = first.x;
  let minY = first.y;
  let minZ = first.z;
  let maxX = first.x;
  let maxY = first.y;
  let maxZ = first.z;

  for (let i = 1; i < voxels.length; i++) {
    const v = voxels[i];
    if (v.x < minX) minX = v.x;
    if (v.y < minY) minY = v.y;
    if (v.z < minZ) minZ = v.z;
    if (v.x > maxX) maxX = v.x;
    if (v.y > maxY) maxY = v.y;
    if (v.z > maxZ) maxZ = v.z;
  }

  return {
    minX,
    minY,
    minZ,
    maxX,
    maxY,
    maxZ,
    dx: maxX - minX + 1,
    dy: maxY - minY + 1,
    dz: maxZ - minZ + 1
  };
}

export function isWithinDims(dims: GridDims, x: number, y: number, z: number): boolean {
  return x >= 0 && y >= 0 && z >= 0 && x < dims.x && y < dims.y && z < dims.z;
}

export function assertIntegerCoords(x: number, y: number, z: number): void {
  if (!Number.isInteger(x) || !Number.isInteger(y) || !Number.isInteger(z)) {
    throw new Error(`Non-integer voxel coordinate detected: ${JSON.stringify({ x, y, z })}`);
  }
}

export function assertPositiveDims(dims: GridDims): void {
  for (const axis of ["x", "y", "z"] as const) {
    const n = dims[axis];
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error(`GRID_DIMS_INVALID ${axis}=${n}`);
    }
  }
  // slots must stay exact doubles or distinct voxels would share one
  if (dims.x * dims.y * dims.z > Number.MAX_SAFE_INTEGER) {
    throw new Error(`GRID_DIMS_INVALID ${dims.x}x${dims.y}x${dims.z} exceeds ${Number.MAX_SAFE_INTEGER} cells`);
  }
}

export function voxelSlot(dims: GridDims, x: number, y: number, z: number): number {
  return (z * dims.y + y) * dims.x + x;
}
