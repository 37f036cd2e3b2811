import { InvalidConfigurationError } from "@pixelvox/core";
import type { ColumnMode } from "@pixelvox/method-height";

export interface ConversionOptions {
  /** Cells per side of the binned grid (x/y extent). */
  voxelResolution: number;
  maxHeight: number;
  column: ColumnMode;
  layers: number;
  saturationThreshold: number;
  valueThreshold: number;
  achromaticLayer: number;
  edgeThreshold: number;
  depthLevels: number;
  distanceScale: number;
  shadeByDepth: boolean;
}

export type ConversionOptionsInput = Partial<ConversionOptions>;

export const DEFAULT_OPTIONS: Readonly<ConversionOptions> = Object.freeze({
  voxelResolution: 64,
  maxHeight: 32,
  column: "solid",
  layers: 16,
  saturationThreshold: 30 / 255,
  valueThreshold: 30 / 255,
  achromaticLayer: 0,
  edgeThreshold: 100,
  depthLevels: 24,
  distanceScale: 1,
  shadeByDepth: false
});

/** Upper bound for every grid extent option: resolution, height, layers, depth levels. */
export const MAX_GRID_EXTENT = 4096;

function positiveInteger(option: keyof ConversionOptions, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0 || value > MAX_GRID_EXTENT) {
    throw new InvalidConfigurationError(
      option,
      `expected an integer in [1, ${MAX_GRID_EXTENT}], got ${JSON.stringify(value)}`
    );
  }
  return value;
}

function positiveFinite(option: keyof ConversionOptions, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(option, `expected a positive number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function unitInterval(option: keyof ConversionOptions, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfigurationError(option, `expected a number in [0, 1], got ${JSON.stringify(value)}`);
  }
  return value;
}

function columnMode(value: unknown): ColumnMode {
  if (value !== "solid" && value !== "shell") {
    throw new InvalidConfigurationError("column", `expected "solid" or "shell", got ${JSON.stringify(value)}`);
  }
  return value;
}

function flag(option: keyof ConversionOptions, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new InvalidConfigurationError(option, `expected a boolean, got ${JSON.stringify(value)}`);
  }
  return value;
}

export function resolveOptions(input: ConversionOptionsInput = {}): ConversionOptions {
  const merged: Record<string, unknown> = { ...DEFAULT_OPTIONS };
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) merged[key] = value;
  }

  const layers = positiveInteger("layers", merged.layers);
  const achromaticLayer = merged.achromaticLayer;
  if (typeof achromaticLayer !== "number" || !Number.isInteger(achromaticLayer) || achromaticLayer < 0 || achromaticLayer >= layers) {
    throw new InvalidConfigurationError(
      "achromaticLayer",
      `expected an integer in [0, ${layers}), got ${JSON.stringify(achromaticLayer)}`
    );
  }

  return {
    voxelResolution: positiveInteger("voxelResolution", merged.voxelResolution),
    maxHeight: positiveInteger("maxHeight", merged.maxHeight),
    column: columnMode(merged.column),
    layers,
    saturationThreshold: unitInterval("saturationThreshold", merged.saturationThreshold),
    valueThreshold: unitInterval("valueThreshold", merged.valueThreshold),
    achromaticLayer,
    edgeThreshold: positiveFinite("edgeThreshold", merged.edgeThreshold),
    depthLevels: positiveInteger("depthLevels", merged.depthLevels),
    distanceScale: positiveFinite("distanceScale", merged.distanceScale),
    shadeByDepth: flag("shadeByDepth", merged.shadeByDepth)
  };
}
