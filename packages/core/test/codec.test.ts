import { describe, expect, it } from "vitest";
import {
  VoxelGridBuilder,
  decodeVoxelGrid,
  decodeVoxelGridCompressed,
  encodeVoxelGrid,
  encodeVoxelGridCompressed,
  hashVoxelGrid,
  toVoxelArrays
} from "../src/index.js";

function sampleGrid() {
  return new VoxelGridBuilder({ method: "color", dims: { x: 2, y: 2, z: 16 }, source: { width: 20, height: 10 } })
    .add(1, 0, 5, { r: 0, g: 255, b: 0 })
    .add(0, 1, 0, { r: 12, g: 34, b: 56 })
    .build();
}

describe("encodeVoxelGrid", () => {
  it("starts with the magic and little-endian marker", () => {
    const bytes = encodeVoxelGrid(sampleGrid());
    expect([...bytes.subarray(0, 5)]).toEqual([0x50, 0x56, 0x58, 0x31, 0x01]);
  });

  it("decodes back to the same voxels and metadata", () => {
    const grid = sampleGrid();
    const decoded = decodeVoxelGrid(encodeVoxelGrid(grid));
    expect(decoded.method).toBe("color");
    expect(decoded.dims).toEqual({ x: 2, y: 2, z: 16 });
    expect(decoded.source).toEqual({ width: 20, height: 10 });
    expect(decoded.voxels).toEqual(grid.voxels);
  });

  it("decodes the gzip wrapper", () => {
    const grid = sampleGrid();
    expect(decodeVoxelGridCompressed(encodeVoxelGridCompressed(grid)).voxels).toEqual(grid.voxels);
  });

  it("rejects foreign and truncated input", () => {
    expect(() => decodeVoxelGrid(Uint8Array.from([0, 0, 0, 0, 1]))).toThrow(/PVX_BAD_MAGIC/);
    const bytes = encodeVoxelGrid(sampleGrid());
    expect(() => decodeVoxelGrid(bytes.subarray(0, bytes.length - 1))).toThrow(/PVX_TRUNCATED/);
  });
});

describe("hashVoxelGrid", () => {
  it("is stable for identical grids and sensitive to color", () => {
    const a = hashVoxelGrid(sampleGrid()).sha256;
    const b = hashVoxelGrid(sampleGrid()).sha256;
    const c = hashVoxelGrid(
      new VoxelGridBuilder({ method: "color", dims: { x: 2, y: 2, z: 16 }, source: { width: 20, height: 10 } })
        .add(1, 0, 5, { r: 0, g: 254, b: 0 })
        .add(0, 1, 0, { r: 12, g: 34, b: 56 })
        .build()
    ).sha256;
    expect(a).toBe(b);
    expect(a).not.toBe(c);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("toVoxelArrays", () => {
  it("splits positions and colors in arena order", () => {
    const arrays = toVoxelArrays(sampleGrid());
    expect(arrays.positions).toEqual([
      [1, 0, 5],
      [0, 1, 0]
    ]);
    expect(arrays.colors).toEqual([
      [0, 255, 0],
      [12, 34, 56]
    ]);
    expect(arrays.method).toBe("color");
  });
});
