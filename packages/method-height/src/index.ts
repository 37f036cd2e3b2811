import { VoxelGridBuilder, type BinnedImage, type VoxelGrid } from "@pixelvox/core";

export type ColumnMode = "solid" | "shell";

export interface HeightOptions {
  maxHeight: number;
  column: ColumnMode;
}

export function heightForIntensity(intensity: number, maxHeight: number): number {
  const i = Math.max(0, Math.min(255, intensity));
  return Math.round((i / 255) * maxHeight);
}

export function mapHeights(binned: BinnedImage, options: HeightOptions): VoxelGrid {
  const n = binned.resolution;
  const builder = new VoxelGridBuilder({
    method: "height",
    dims: { x: n, y: n, z: options.maxHeight + 1 },
    source: { width: binned.sourceWidth, height: binned.sourceHeight }
  });

  for (let y = 0; y < n; y++) {
    for (let x = 0; x < n; x++) {
      const top = heightForIntensity(binned.grayAt(x, y), options.maxHeight);
      const color = binned.rgbAt(x, y);
      // black cells still get a z=0 voxel: zero height, not a missing column
      const bottom = options.column === "solid" ? 0 : top;
      for (let z = bottom; z <= top; z++) {
        builder.add(x, y, z, color);
      }
    }
  }

  return builder.build();
}
