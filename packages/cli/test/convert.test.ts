import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PNG } from "pngjs";
import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, InvalidImageError, InvalidMethodError, hashVoxelGrid } from "@pixelvox/core";
import { decodePng, sniffPng } from "../src/decode.js";
import { readGridFile } from "../src/export.js";
import { runConvert, type ConvertCommandOptions } from "../src/run.js";

function writeHalfPng(dir: string): string {
  const png = new PNG({ width: 4, height: 4 });
  for (let y = 0; y < 4; y++) {
    for (let x = 0; x < 4; x++) {
      const idx = (y * 4 + x) * 4;
      const v = x < 2 ? 0 : 255;
      png.data[idx] = v;
      png.data[idx + 1] = v;
      png.data[idx + 2] = v;
      png.data[idx + 3] = 255;
    }
  }
  const path = join(dir, "half.png");
  writeFileSync(path, PNG.sync.write(png));
  return path;
}

describe("decodePng", () => {
  it("rejects bytes that are not a PNG", () => {
    const garbage = new Uint8Array([0x00, 0xff, 0x13, 0x37, 0x88]);
    expect(sniffPng(garbage)).toBe(false);
    expect(() => decodePng(garbage)).toThrow(InvalidImageError);
  });

  it("reads pixel data", () => {
    const dir = mkdtempSync(join(tmpdir(), "pv-decode-"));
    const image = decodePng(new Uint8Array(readFileSync(writeHalfPng(dir))));
    expect([image.width, image.height]).toEqual([4, 4]);
    expect(image.getPixel(3, 0)).toEqual({ r: 255, g: 255, b: 255 });
  });
});

describe("runConvert", () => {
  it("converts with every method and writes grids and reports", async () => {
    const dir = mkdtempSync(join(tmpdir(), "pv-convert-"));
    const input = writeHalfPng(dir);
    const outDir = join(dir, "out");
    const lines: string[] = [];

    const summary = await runConvert({
      input,
      method: "all",
      outDir,
      format: "pvx",
      conversion: { voxelResolution: 4, maxHeight: 2 },
      preview: false,
      slice: 2,
      workers: 1,
      log: (line) => lines.push(line)
    });

    expect(lines[0]).toBe("[pixelvox] Processing image: 4 x 4");
    expect(lines).toContain("[pixelvox] Running height method...");
    expect(lines).toContain("[pixelvox] Created 32 voxels using height method");
    expect(lines).toContain("[pixelvox] Created 16 voxels using color method");
    expect(lines).toContain("[pixelvox] Created 16 voxels using structure method");
    expect(lines[lines.length - 1]).toBe(`[pixelvox] Conversion complete! Results saved to ${outDir}`);

    expect(summary.results.map((r) => r.method)).toEqual(["height", "color", "structure"]);
    const height = summary.results[0];
    expect(height.gridPath).toBe(join(outDir, "height_voxels.pvx"));
    expect(height.slicePath).toBe(join(outDir, "height_slice_2.png"));
    expect(summary.results[2].slicePath).toBe(join(outDir, "structure_slice_2.png"));

    const grid = readGridFile(height.gridPath);
    expect(grid.size).toBe(32);
    expect(grid.dims).toEqual({ x: 4, y: 4, z: 3 });
    expect(hashVoxelGrid(grid).sha256).toBe(height.sha256);

    const report: unknown = JSON.parse(readFileSync(height.reportPath, "utf8"));
    expect(report).toMatchObject({
      method: "height",
      sha256: height.sha256,
      stats: { voxelCount: 32, sourceWidth: 4, sourceHeight: 4 }
    });
  });

  it("rejects an unknown method without writing anything", async () => {
    const dir = mkdtempSync(join(tmpdir(), "pv-convert-"));
    await expect(
      runConvert({
        input: writeHalfPng(dir),
        method: "mosaic",
        outDir: join(dir, "out"),
        format: "pvx.gz",
        conversion: {},
        preview: false,
        workers: 1,
        log: () => undefined
      })
    ).rejects.toThrow(InvalidMethodError);
  });

  it.each([2, 3])("gives the same grids on %i worker threads as in process", async (workers) => {
    const dir = mkdtempSync(join(tmpdir(), "pv-convert-"));
    const base: ConvertCommandOptions = {
      input: writeHalfPng(dir),
      method: "all",
      outDir: join(dir, "serial"),
      format: "pvx",
      conversion: { voxelResolution: 4, maxHeight: 2 },
      preview: false,
      workers: 1,
      log: () => undefined
    };
    const serial = await runConvert(base);

    const lines: string[] = [];
    const parallel = await runConvert({
      ...base,
      outDir: join(dir, "parallel"),
      workers,
      log: (line) => lines.push(line)
    });

    expect(lines.filter((line) => line.includes("Worker"))).toEqual([]);
    expect(lines).toContain("[pixelvox] Running structure method...");
    expect(parallel.results.map((r) => [r.method, r.sha256])).toEqual(serial.results.map((r) => [r.method, r.sha256]));
    expect(existsSync(join(dir, "parallel", "color_report.json"))).toBe(true);
  });

  it.each([-1, 1.5])("rejects slice %s before writing any output", async (slice) => {
    const dir = mkdtempSync(join(tmpdir(), "pv-convert-"));
    const outDir = join(dir, "out");
    await expect(
      runConvert({
        input: writeHalfPng(dir),
        method: "all",
        outDir,
        format: "pvx",
        conversion: {},
        preview: false,
        slice,
        workers: 1,
        log: () => undefined
      })
    ).rejects.toThrow(InvalidConfigurationError);
    expect(existsSync(outDir)).toBe(false);
  });

  it("rejects a worker count that is not a whole number", async () => {
    const dir = mkdtempSync(join(tmpdir(), "pv-convert-"));
    await expect(
      runConvert({
        input: writeHalfPng(dir),
        method: "all",
        outDir: join(dir, "out"),
        format: "pvx",
        conversion: {},
        preview: false,
        workers: Number.NaN,
        log: () => undefined
      })
    ).rejects.toThrow(/workers: expected a non-negative integer/);
  });
});
