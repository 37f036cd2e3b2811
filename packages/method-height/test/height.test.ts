import { describe, expect, it } from "vitest";
import { RasterImage, binImage, type Rgb } from "@pixelvox/core";
import { heightForIntensity, mapHeights } from "../src/index.js";

function uniform(n: number, color: Rgb) {
  return binImage(RasterImage.fromFunction(n, n, () => color), n);
}

describe("heightForIntensity", () => {
  it("scales and rounds brightness into [0, maxHeight]", () => {
    expect(heightForIntensity(0, 32)).toBe(0);
    expect(heightForIntensity(127.5, 32)).toBe(16);
    expect(heightForIntensity(255, 32)).toBe(32);
    expect(heightForIntensity(300, 32)).toBe(32);
    expect(heightForIntensity(-4, 32)).toBe(0);
  });
});

describe("mapHeights", () => {
  it("fills solid columns for a white image", () => {
    const white = { r: 255, g: 255, b: 255 };
    const grid = mapHeights(uniform(4, white), { maxHeight: 3, column: "solid" });
    expect(grid.size).toBe(4 * 4 * (3 + 1));
    expect(grid.dims).toEqual({ x: 4, y: 4, z: 4 });
    expect(grid.voxels.every((v) => v.color.r === 255 && v.color.g === 255 && v.color.b === 255)).toBe(true);
  });

  it("keeps one voxel at z=0 per black cell", () => {
    const grid = mapHeights(uniform(5, { r: 0, g: 0, b: 0 }), { maxHeight: 8, column: "solid" });
    expect(grid.size).toBe(25);
    expect(grid.voxels.every((v) => v.z === 0)).toBe(true);
  });

  it("emits only the top voxel in shell mode", () => {
    const grid = mapHeights(uniform(4, { r: 255, g: 255, b: 255 }), { maxHeight: 3, column: "shell" });
    expect(grid.size).toBe(16);
    expect(new Set(grid.voxels.map((v) => v.z))).toEqual(new Set([3]));
  });

  it("builds equal columns for a uniform mid-gray image", () => {
    const grid = mapHeights(uniform(2, { r: 128, g: 128, b: 128 }), { maxHeight: 4, column: "solid" });
    expect(grid.size).toBe(2 * 2 * 3);
    expect(grid.has(1, 1, 2)).toBe(true);
    expect(grid.has(1, 1, 3)).toBe(false);
  });

  it("maps x to columns and y to rows", () => {
    const image = RasterImage.fromFunction(2, 2, (x, y) => (x === 1 && y === 0 ? { r: 255, g: 255, b: 255 } : { r: 0, g: 0, b: 0 }));
    const grid = mapHeights(binImage(image, 2), { maxHeight: 2, column: "shell" });
    expect(grid.get(1, 0, 2)?.color).toEqual({ r: 255, g: 255, b: 255 });
    expect(grid.get(0, 1, 0)?.color).toEqual({ r: 0, g: 0, b: 0 });
  });
});
