import { createHash } from "node:crypto";
import { encodeVoxelGrid } from "./codec.js";
import type { VoxelGrid } from "./grid.js";
import type { VoxelGridHashResult } from "./types.js";

export function hashVoxelGrid(grid: VoxelGrid): VoxelGridHashResult {
  const bytes = encodeVoxelGrid(grid);
  const sha256 = createHash("sha256").update(bytes).digest("hex");
  return { sha256, bytes };
}
