import { existsSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  decodeVoxelGrid,
  decodeVoxelGridCompressed,
  encodeVoxelGrid,
  encodeVoxelGridCompressed,
  hashVoxelGrid,
  toVoxelArrays,
  type VoxelGrid
} from "@pixelvox/core";
import type { ConversionOptions } from "@pixelvox/converter";
import { renderPreviewPng, renderSlicePng } from "@pixelvox/renderer";
import { ensureDir, readBytes } from "./fs.js";
import type { ConversionReport, ExportResult, ExportTask, OutputFormat } from "./types.js";

export const TOOL_VERSION = "0.1.0";

function encodeForFormat(grid: VoxelGrid, format: OutputFormat): Uint8Array | string {
  switch (format) {
    case "pvx":
      return encodeVoxelGrid(grid);
    case "pvx.gz":
      return encodeVoxelGridCompressed(grid);
    case "json":
      return JSON.stringify(toVoxelArrays(grid));
  }
}

export function exportGrid(
  grid: VoxelGrid,
  source: string,
  options: ConversionOptions,
  task: ExportTask
): ExportResult {
  const t0 = Date.now();
  ensureDir(task.outDir);

  const encodeStart = Date.now();
  const { sha256 } = hashVoxelGrid(grid);
  const gridPath = resolve(task.outDir, `${grid.method}_voxels.${task.format}`);
  writeFileSync(gridPath, encodeForFormat(grid, task.format));
  const encodeMs = Date.now() - encodeStart;

  const renderStart = Date.now();
  let previewPath: string | null = null;
  if (task.preview) {
    previewPath = resolve(task.outDir, `${grid.method}_preview.png`);
    writeFileSync(previewPath, renderPreviewPng(grid));
  }
  let slicePath: string | null = null;
  if (task.slice !== undefined) {
    // z extents differ per method: no slice file where z is past the top
    if (task.slice < grid.dims.z) {
      slicePath = resolve(task.outDir, `${grid.method}_slice_${task.slice}.png`);
      writeFileSync(slicePath, renderSlicePng(grid, { z: task.slice }));
    }
  }
  const renderMs = Date.now() - renderStart;

  const report: ConversionReport = {
    source,
    method: grid.method,
    sha256,
    stats: {
      voxelCount: grid.size,
      dims: { ...grid.dims },
      bounds: { ...grid.bounds },
      sourceWidth: grid.source.width,
      sourceHeight: grid.source.height
    },
    options,
    outputs: {
      grid: gridPath,
      preview: previewPath,
      slice: slicePath
    },
    timingMs: {
      convert: task.convertMs,
      encode: encodeMs,
      render: renderMs,
      total: task.convertMs + (Date.now() - t0)
    },
    toolVersions: {
      pixelvox: TOOL_VERSION,
      node: process.version
    }
  };

  const reportPath = resolve(task.outDir, `${grid.method}_report.json`);
  writeFileSync(reportPath, JSON.stringify(report, null, 2), "utf8");

  return {
    method: grid.method,
    voxelCount: grid.size,
    gridPath,
    reportPath,
    previewPath,
    slicePath,
    sha256
  };
}

export function readGridFile(path: string): VoxelGrid {
  if (!existsSync(path)) {
    throw new Error(`File not found: ${path}`);
  }
  const bytes = readBytes(path);
  if (path.toLowerCase().endsWith(".gz")) {
    return decodeVoxelGridCompressed(bytes);
  }
  return decodeVoxelGrid(bytes);
}
