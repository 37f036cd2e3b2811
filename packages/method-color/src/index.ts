import { VoxelGridBuilder, type BinnedImage, type Hsv, type VoxelGrid } from "@pixelvox/core";

export interface ColorLayerOptions {
  layers: number;
  /** s at or below this counts as achromatic (0..1) */
  saturationThreshold: number;
  /** v at or below this counts as achromatic (0..1) */
  valueThreshold: number;
  /** Layer for achromatic cells, whose hue is meaningless. */
  achromaticLayer: number;
}

export function isAchromatic(hsv: Hsv, options: Pick<ColorLayerOptions, "saturationThreshold" | "valueThreshold">): boolean {
  return hsv.s <= options.saturationThreshold || hsv.v <= options.valueThreshold;
}

export function hueLayer(hue: number, layers: number): number {
  const layer = Math.floor((hue / 360) * layers);
  return Math.max(0, Math.min(layers - 1, layer));
}

export function layerForCell(hsv: Hsv, options: ColorLayerOptions): number {
  if (isAchromatic(hsv, options)) {
    return options.achromaticLayer;
  }
  return hueLayer(hsv.h, options.layers);
}

export function layerColors(binned: BinnedImage, options: ColorLayerOptions): VoxelGrid {
  const n = binned.resolution;
  const builder = new VoxelGridBuilder({
    method: "color",
    dims: { x: n, y: n, z: options.layers },
    source: { width: binned.sourceWidth, height: binned.sourceHeight }
  });

  for (let y = 0; y < n; y++) {
    for (let x = 0; x < n; x++) {
      const layer = layerForCell(binned.hsvAt(x, y), options);
      builder.add(x, y, layer, binned.rgbAt(x, y));
    }
  }

  return builder.build();
}
