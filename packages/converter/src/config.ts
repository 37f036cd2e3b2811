import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import { InvalidConfigurationError } from "@pixelvox/core";
import type { ConversionOptions, ConversionOptionsInput } from "./options.js";

type OptionKey = keyof ConversionOptions;

const OPTION_KEYS = new Map<string, OptionKey>(
  Object.entries({
    voxelResolution: "voxelResolution",
    voxel_resolution: "voxelResolution",
    resolution: "voxelResolution",
    maxHeight: "maxHeight",
    max_height: "maxHeight",
    column: "column",
    layers: "layers",
    saturationThreshold: "saturationThreshold",
    saturation_threshold: "saturationThreshold",
    valueThreshold: "valueThreshold",
    value_threshold: "valueThreshold",
    achromaticLayer: "achromaticLayer",
    achromatic_layer: "achromaticLayer",
    edgeThreshold: "edgeThreshold",
    edge_threshold: "edgeThreshold",
    depthLevels: "depthLevels",
    depth_levels: "depthLevels",
    distanceScale: "distanceScale",
    distance_scale: "distanceScale",
    shadeByDepth: "shadeByDepth",
    shade_by_depth: "shadeByDepth"
  } satisfies Record<string, OptionKey>)
);

function assign(out: ConversionOptionsInput, key: OptionKey, value: unknown, source: string): void {
  switch (key) {
    case "column":
      if (value !== "solid" && value !== "shell") {
        throw new InvalidConfigurationError(key, `${source}: expected "solid" or "shell"`);
      }
      out.column = value;
      return;
    case "shadeByDepth":
      if (typeof value !== "boolean") {
        throw new InvalidConfigurationError(key, `${source}: expected a boolean`);
      }
      out.shadeByDepth = value;
      return;
    default:
      if (typeof value !== "number") {
        throw new InvalidConfigurationError(key, `${source}: expected a number, got ${JSON.stringify(value)}`);
      }
      out[key] = value;
  }
}

export function parseConfig(raw: string, source = "config"): ConversionOptionsInput {
  let parsed: unknown;
  try {
    parsed = YAML.load(raw);
  } catch (error) {
    throw new InvalidConfigurationError(source, `invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InvalidConfigurationError(source, "expected a mapping of option names to values");
  }

  const out: ConversionOptionsInput = {};
  for (const [rawKey, value] of Object.entries(parsed)) {
    const key = OPTION_KEYS.get(rawKey);
    if (!key) continue;
    assign(out, key, value, source);
  }
  return out;
}

export function readConfigFromYaml(path: string): ConversionOptionsInput {
  return parseConfig(readFileSync(path, "utf8"), path);
}
