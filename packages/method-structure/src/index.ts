import { VoxelGridBuilder, type BinnedImage, type Rgb, type VoxelGrid } from "@pixelvox/core";

export interface StructureOptions {
  /** Sobel magnitude at or above which a cell is an edge. A hard 0->255 step measures 1020. */
  edgeThreshold: number;
  depthLevels: number;
  /** Voxels of height per cell of distance from the nearest edge. */
  distanceScale: number;
  shadeByDepth: boolean;
}

const SOBEL_X = [
  [-1, 0, 1],
  [-2, 0, 2],
  [-1, 0, 1]
];
const SOBEL_Y = [
  [-1, -2, -1],
  [0, 0, 0],
  [1, 2, 1]
];

const FAR = 1e20;

export function sobelMagnitude(binned: BinnedImage): Float64Array {
  const n = binned.resolution;
  const out = new Float64Array(n * n);
  const clamp = (v: number): number => Math.max(0, Math.min(n - 1, v));

  for (let y = 0; y < n; y++) {
    for (let x = 0; x < n; x++) {
      let gx = 0;
      let gy = 0;
      for (let ky = -1; ky <= 1; ky++) {
        for (let kx = -1; kx <= 1; kx++) {
          const g = binned.grayAt(clamp(x + kx), clamp(y + ky));
          gx += g * SOBEL_X[ky + 1][kx + 1];
          gy += g * SOBEL_Y[ky + 1][kx + 1];
        }
      }
      out[y * n + x] = Math.sqrt(gx * gx + gy * gy);
    }
  }

  return out;
}

export function detectEdges(binned: BinnedImage, threshold: number): Uint8Array {
  const magnitude = sobelMagnitude(binned);
  const edges = new Uint8Array(magnitude.length);
  for (let i = 0; i < magnitude.length; i++) {
    edges[i] = magnitude[i] >= threshold ? 1 : 0;
  }
  return edges;
}

// Squared distance along one row/column to the lower envelope of parabolas rooted at f.
function transform1d(f: Float64Array): Float64Array {
  const n = f.length;
  const d = new Float64Array(n);
  const v = new Int32Array(n);
  const z = new Float64Array(n + 1);
  let k = 0;
  v[0] = 0;
  z[0] = -Infinity;
  z[1] = Infinity;

  for (let q = 1; q < n; q++) {
    let s = (f[q] + q * q - (f[v[k]] + v[k] * v[k])) / (2 * q - 2 * v[k]);
    while (s <= z[k]) {
      k--;
      s = (f[q] + q * q - (f[v[k]] + v[k] * v[k])) / (2 * q - 2 * v[k]);
    }
    k++;
    v[k] = q;
    z[k] = s;
    z[k + 1] = Infinity;
  }

  k = 0;
  for (let q = 0; q < n; q++) {
    while (z[k + 1] < q) k++;
    const dq = q - v[k];
    d[q] = dq * dq + f[v[k]];
  }
  return d;
}

/**
 * Exact Euclidean distance from every cell to the nearest edge cell (edge cells are 0).
 * Returns null when there are no edge cells at all.
 */
export function distanceTransform(edges: Uint8Array, n: number): Float64Array | null {
  if (!edges.includes(1)) {
    return null;
  }

  const grid = new Float64Array(n * n);
  for (let i = 0; i < grid.length; i++) {
    grid[i] = edges[i] === 1 ? 0 : FAR;
  }

  const column = new Float64Array(n);
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) column[y] = grid[y * n + x];
    const d = transform1d(column);
    for (let y = 0; y < n; y++) grid[y * n + x] = d[y];
  }

  const row = new Float64Array(n);
  for (let y = 0; y < n; y++) {
    for (let x = 0; x < n; x++) row[x] = grid[y * n + x];
    const d = transform1d(row);
    for (let x = 0; x < n; x++) grid[y * n + x] = Math.sqrt(d[x]);
  }

  return grid;
}

export function structureTop(distance: number, options: Pick<StructureOptions, "depthLevels" | "distanceScale">): number {
  return Math.min(options.depthLevels - 1, Math.round(options.distanceScale * distance));
}

function shade(color: Rgb, z: number, depthLevels: number): Rgb {
  const factor = 1 - (z / depthLevels) * 0.5;
  return {
    r: Math.floor(color.r * factor),
    g: Math.floor(color.g * factor),
    b: Math.floor(color.b * factor)
  };
}

export function buildStructure(binned: BinnedImage, options: StructureOptions): VoxelGrid {
  const n = binned.resolution;
  const builder = new VoxelGridBuilder({
    method: "structure",
    dims: { x: n, y: n, z: options.depthLevels },
    source: { width: binned.sourceWidth, height: binned.sourceHeight }
  });

  const edges = detectEdges(binned, options.edgeThreshold);
  const distances = distanceTransform(edges, n);
  if (!distances) {
    // no boundary anywhere: nothing has a finite distance, so nothing is solid
    return builder.build();
  }

  for (let y = 0; y < n; y++) {
    for (let x = 0; x < n; x++) {
      const d = distances[y * n + x];
      if (d <= 0) continue;
      const top = structureTop(d, options);
      const color = binned.rgbAt(x, y);
      for (let z = 0; z <= top; z++) {
        builder.add(x, y, z, options.shadeByDepth ? shade(color, z, options.depthLevels) : color);
      }
    }
  }

  return builder.build();
}
