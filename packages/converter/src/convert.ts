import {
  InvalidMethodError,
  assertImageSource,
  binImage,
  type BinnedImage,
  type ConversionMethod,
  type ImageSource,
  type VoxelGrid
} from "@pixelvox/core";
import { layerColors } from "@pixelvox/method-color";
import { mapHeights } from "@pixelvox/method-height";
import { buildStructure } from "@pixelvox/method-structure";
import { resolveOptions, type ConversionOptions, type ConversionOptionsInput } from "./options.js";

export type MethodSelector = ConversionMethod | "all";

export type ConversionResultMap = Record<ConversionMethod, VoxelGrid>;

export const CONVERSION_METHODS: readonly ConversionMethod[] = Object.freeze(["height", "color", "structure"]);

const METHOD_SELECTORS: readonly MethodSelector[] = [...CONVERSION_METHODS, "all"];

type MethodHandler = (binned: BinnedImage, options: ConversionOptions) => VoxelGrid;

const HANDLERS = {
  height: (binned, options) => mapHeights(binned, { maxHeight: options.maxHeight, column: options.column }),
  color: (binned, options) =>
    layerColors(binned, {
      layers: options.layers,
      saturationThreshold: options.saturationThreshold,
      valueThreshold: options.valueThreshold,
      achromaticLayer: options.achromaticLayer
    }),
  structure: (binned, options) =>
    buildStructure(binned, {
      edgeThreshold: options.edgeThreshold,
      depthLevels: options.depthLevels,
      distanceScale: options.distanceScale,
      shadeByDepth: options.shadeByDepth
    })
} satisfies Record<ConversionMethod, MethodHandler>;

export function isMethodSelector(value: unknown): value is MethodSelector {
  return typeof value === "string" && (METHOD_SELECTORS as readonly string[]).includes(value);
}

export function parseMethod(value: unknown): MethodSelector {
  if (!isMethodSelector(value)) {
    throw new InvalidMethodError(String(value));
  }
  return value;
}

export function convertBinned(binned: BinnedImage, method: ConversionMethod, options: ConversionOptions): VoxelGrid {
  const handler: MethodHandler = HANDLERS[method];
  return handler(binned, options);
}

export function convertAllBinned(binned: BinnedImage, options: ConversionOptions): ConversionResultMap {
  return {
    height: convertBinned(binned, "height", options),
    color: convertBinned(binned, "color", options),
    structure: convertBinned(binned, "structure", options)
  };
}

export interface PreparedConversion {
  method: MethodSelector;
  options: ConversionOptions;
  binned: BinnedImage;
}

/** Validates everything up front and bins the image once; no algorithm has run yet. */
export function prepareConversion(image: ImageSource, method: string, options: ConversionOptionsInput = {}): PreparedConversion {
  const selector = parseMethod(method);
  assertImageSource(image);
  const resolved = resolveOptions(options);
  return {
    method: selector,
    options: resolved,
    binned: binImage(image, resolved.voxelResolution)
  };
}

export function convert(image: ImageSource, method: "all", options?: ConversionOptionsInput): ConversionResultMap;
export function convert(image: ImageSource, method: ConversionMethod, options?: ConversionOptionsInput): VoxelGrid;
export function convert(
  image: ImageSource,
  method: string,
  options?: ConversionOptionsInput
): VoxelGrid | ConversionResultMap;
export function convert(
  image: ImageSource,
  method: string,
  options: ConversionOptionsInput = {}
): VoxelGrid | ConversionResultMap {
  const prepared = prepareConversion(image, method, options);
  if (prepared.method === "all") {
    return convertAllBinned(prepared.binned, prepared.options);
  }
  return convertBinned(prepared.binned, prepared.method, prepared.options);
}

export function isResultMap(result: VoxelGrid | ConversionResultMap): result is ConversionResultMap {
  return !("voxels" in result);
}
