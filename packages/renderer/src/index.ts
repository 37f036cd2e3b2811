import { PNG } from "pngjs";
import { Matrix4, PerspectiveCamera, Vector3 } from "three";
import type { Rgb, Voxel, VoxelGrid } from "@pixelvox/core";

export interface Background {
  r: number;
  g: number;
  b: number;
  a?: number;
}

export interface PreviewOptions {
  width?: number;
  height?: number;
  background?: Background;
  yawDeg?: number;
  pitchDeg?: number;
  fovDeg?: number;
  /** Larger grids are drawn from an evenly strided subset. */
  maxPoints?: number;
  pointSize?: number;
}

export interface SliceOptions {
  z: number;
  scale?: number;
  background?: Background;
}

interface ScreenPoint {
  x: number;
  y: number;
  depth: number;
  color: Rgb;
}

const DEFAULT_BACKGROUND: Background = { r: 238, g: 241, b: 246, a: 255 };

function createCanvas(width: number, height: number, bg: Background): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const idx = i * 4;
    pixels[idx] = bg.r;
    pixels[idx + 1] = bg.g;
    pixels[idx + 2] = bg.b;
    pixels[idx + 3] = bg.a ?? 255;
  }
  return pixels;
}

function fillRect(
  pixels: Uint8Array,
  width: number,
  height: number,
  x0: number,
  y0: number,
  size: number,
  color: Rgb
): void {
  const minX = Math.max(0, x0);
  const minY = Math.max(0, y0);
  const maxX = Math.min(width, x0 + size);
  const maxY = Math.min(height, y0 + size);
  for (let y = minY; y < maxY; y++) {
    for (let x = minX; x < maxX; x++) {
      const idx = (y * width + x) * 4;
      pixels[idx] = color.r;
      pixels[idx + 1] = color.g;
      pixels[idx + 2] = color.b;
      pixels[idx + 3] = 255;
    }
  }
}

function encodePng(pixels: Uint8Array, width: number, height: number): Buffer {
  const png = new PNG({ width, height });
  png.data = Buffer.from(pixels);
  return PNG.sync.write(png);
}

export function sampleVoxels(grid: VoxelGrid, maxPoints: number): Voxel[] {
  if (grid.size <= maxPoints) {
    return [...grid.voxels];
  }
  const stride = Math.ceil(grid.size / maxPoints);
  const out: Voxel[] = [];
  for (let i = 0; i < grid.size; i += stride) {
    out.push(grid.voxels[i]);
  }
  return out;
}

export function renderPreviewPng(grid: VoxelGrid, options: PreviewOptions = {}): Buffer {
  const width = options.width ?? 256;
  const height = options.height ?? 256;
  const pixels = createCanvas(width, height, options.background ?? DEFAULT_BACKGROUND);

  const points = sampleVoxels(grid, options.maxPoints ?? 8000);
  if (points.length === 0) {
    return encodePng(pixels, width, height);
  }

  // voxel z is "up", which is world y for the camera
  const dims = grid.dims;
  const center = new Vector3(dims.x / 2, dims.z / 2, dims.y / 2);
  const maxDim = Math.max(dims.x, dims.y, dims.z);
  const yaw = ((options.yawDeg ?? 45) * Math.PI) / 180;
  const pitch = ((options.pitchDeg ?? 35.26438968) * Math.PI) / 180;
  const fov = options.fovDeg ?? 35;
  const radius = maxDim * 2.8 + 6;
  const pointSize = options.pointSize ?? Math.max(1, Math.round(Math.min(width, height) / (maxDim * 1.5)));

  const camera = new PerspectiveCamera(fov, width / height, 0.1, 10000);
  const dir = new Vector3(
    Math.cos(pitch) * Math.cos(yaw),
    Math.sin(pitch),
    Math.cos(pitch) * Math.sin(yaw)
  ).normalize();
  camera.position.copy(center.clone().addScaledVector(dir, radius));
  camera.up.set(0, 1, 0);
  camera.lookAt(center);
  camera.updateMatrixWorld(true);
  camera.updateProjectionMatrix();

  const worldToCamera = new Matrix4().copy(camera.matrixWorldInverse);
  const screen: ScreenPoint[] = [];
  for (const v of points) {
    const world = new Vector3(v.x + 0.5, v.z + 0.5, v.y + 0.5);
    const ndc = world.clone().project(camera);
    if (ndc.z < -1 || ndc.z > 1) continue;
    screen.push({
      x: Math.round((ndc.x * 0.5 + 0.5) * (width - 1)),
      y: Math.round((1 - (ndc.y * 0.5 + 0.5)) * (height - 1)),
      depth: world.applyMatrix4(worldToCamera).z,
      color: v.color
    });
  }

  screen.sort((a, b) => a.depth - b.depth);
  const half = Math.floor(pointSize / 2);
  for (const p of screen) {
    fillRect(pixels, width, height, p.x - half, p.y - half, pointSize, p.color);
  }

  return encodePng(pixels, width, height);
}

export function renderSlicePng(grid: VoxelGrid, options: SliceOptions): Buffer {
  const { z } = options;
  if (!Number.isInteger(z) || z < 0 || z >= grid.dims.z) {
    throw new RangeError(`SLICE_OUT_OF_RANGE z=${z} outside [0, ${grid.dims.z})`);
  }
  const scale = Math.max(1, Math.floor(options.scale ?? 4));
  const width = grid.dims.x * scale;
  const height = grid.dims.y * scale;
  const pixels = createCanvas(width, height, options.background ?? DEFAULT_BACKGROUND);

  for (const v of grid.voxels) {
    if (v.z !== z) continue;
    fillRect(pixels, width, height, v.x * scale, v.y * scale, scale, v.color);
  }

  return encodePng(pixels, width, height);
}
