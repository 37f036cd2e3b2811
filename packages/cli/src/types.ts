import type { BinnedImageRecord, Bounds, ConversionMethod, GridDims, VoxelGridRecord } from "@pixelvox/core";
import type { ConversionOptions } from "@pixelvox/converter";

export type OutputFormat = "pvx" | "pvx.gz" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["pvx", "pvx.gz", "json"];

export interface ConvertTask {
  method: ConversionMethod;
  binned: BinnedImageRecord;
  options: ConversionOptions;
}

export type WorkerReply = { ok: true; grid: VoxelGridRecord } | { ok: false; error: string };

export interface ExportTask {
  outDir: string;
  format: OutputFormat;
  preview: boolean;
  slice?: number;
  convertMs: number;
}

export interface ExportResult {
  method: ConversionMethod;
  voxelCount: number;
  gridPath: string;
  reportPath: string;
  previewPath: string | null;
  slicePath: string | null;
  sha256: string;
}

export interface ConversionReport {
  source: string;
  method: ConversionMethod;
  sha256: string;
  stats: {
    voxelCount: number;
    dims: GridDims;
    bounds: Bounds;
    sourceWidth: number;
    sourceHeight: number;
  };
  options: ConversionOptions;
  outputs: {
    grid: string;
    preview: string | null;
    slice: string | null;
  };
  timingMs: {
    convert: number;
    encode: number;
    render: number;
    total: number;
  };
  toolVersions: Record<string, string>;
}
