export type ConversionMethod = "height" | "color" | "structure";

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Hsv {
  h: number;
  s: number;
  v: number;
}

export interface Pixel {
  x: number;
  y: number;
  rgb: Rgb;
  gray: number;
  hue: number;
  saturation: number;
  value: number;
}

export interface ImageSource {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): Rgb;
}

export interface Voxel {
  x: number;
  y: number;
  z: number;
  color: Rgb;
}

export interface GridDims {
  x: number;
  y: number;
  z: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
  dx: number;
  dy: number;
  dz: number;
}

export interface SourceInfo {
  width: number;
  height: number;
}

export interface VoxelGridRecord {
  method: ConversionMethod;
  dims: GridDims;
  source: SourceInfo;
  positions: Uint32Array;
  colors: Uint8Array;
}

export interface BinnedImageRecord {
  resolution: number;
  sourceWidth: number;
  sourceHeight: number;
  rgb: Uint8Array;
}

export interface VoxelGridHashResult {
  sha256: string;
  bytes: Uint8Array;
}

export interface VoxelArrays {
  method: ConversionMethod;
  dims: GridDims;
  source: SourceInfo;
  positions: Array<[number, number, number]>;
  colors: Array<[number, number, number]>;
}
