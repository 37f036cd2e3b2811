import { cpus } from "node:os";
import { resolve } from "node:path";
import { InvalidConfigurationError, VoxelGrid, type ConversionMethod } from "@pixelvox/core";
import {
  CONVERSION_METHODS,
  convertBinned,
  prepareConversion,
  type ConversionOptionsInput,
  type PreparedConversion
} from "@pixelvox/converter";
import { decodePng } from "./decode.js";
import { exportGrid } from "./export.js";
import { readBytes } from "./fs.js";
import type { ExportResult, OutputFormat } from "./types.js";
import { ConversionWorkerPool } from "./worker-pool.js";

export interface ConvertCommandOptions {
  input: string;
  method: string;
  outDir: string;
  format: OutputFormat;
  conversion: ConversionOptionsInput;
  preview: boolean;
  slice?: number;
  workers: number;
  log?: (line: string) => void;
}

export interface ConvertSummary {
  input: string;
  width: number;
  height: number;
  results: ExportResult[];
}

interface TimedGrid {
  grid: VoxelGrid;
  convertMs: number;
}

function convertTimed(prepared: PreparedConversion, method: ConversionMethod): TimedGrid {
  const start = Date.now();
  const grid = convertBinned(prepared.binned, method, prepared.options);
  return { grid, convertMs: Date.now() - start };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function convertInPool(
  prepared: PreparedConversion,
  methods: readonly ConversionMethod[],
  workers: number,
  log: (line: string) => void
): Promise<TimedGrid[]> {
  let pool: ConversionWorkerPool | null = null;
  try {
    pool = new ConversionWorkerPool(Math.min(workers, methods.length));
    const active = pool;
    const binned = prepared.binned.toRecord();
    return await Promise.all(
      methods.map(async (method) => {
        const start = Date.now();
        try {
          const record = await active.run({ method, binned, options: prepared.options });
          return { grid: VoxelGrid.fromRecord(record), convertMs: Date.now() - start };
        } catch (error) {
          log(`[pixelvox] Worker failed on ${method} method, retrying in process: ${describe(error)}`);
          return convertTimed(prepared, method);
        }
      })
    );
  } catch (error) {
    log(`[pixelvox] Worker pool unavailable, converting in process: ${describe(error)}`);
    return methods.map((method) => convertTimed(prepared, method));
  } finally {
    if (pool) {
      await pool.close();
    }
  }
}

function assertRunOptions(options: ConvertCommandOptions): void {
  const { slice, workers } = options;
  if (slice !== undefined && (!Number.isInteger(slice) || slice < 0)) {
    throw new InvalidConfigurationError("slice", `expected a non-negative integer, got ${JSON.stringify(slice)}`);
  }
  if (!Number.isInteger(workers) || workers < 0) {
    throw new InvalidConfigurationError("workers", `expected a non-negative integer, got ${JSON.stringify(workers)}`);
  }
}

export async function runConvert(options: ConvertCommandOptions): Promise<ConvertSummary> {
  const log = options.log ?? ((line: string) => console.log(line));
  assertRunOptions(options);
  const input = resolve(options.input);
  const image = decodePng(readBytes(input));
  const prepared = prepareConversion(image, options.method, options.conversion);
  log(`[pixelvox] Processing image: ${image.width} x ${image.height}`);

  const methods = prepared.method === "all" ? CONVERSION_METHODS : [prepared.method];
  const workerCount = options.workers > 0 ? options.workers : Math.max(1, cpus().length - 1);

  for (const method of methods) {
    log(`[pixelvox] Running ${method} method...`);
  }
  const grids =
    methods.length > 1 && workerCount > 1
      ? await convertInPool(prepared, methods, workerCount, log)
      : methods.map((method) => convertTimed(prepared, method));

  const results: ExportResult[] = [];
  for (const { grid, convertMs } of grids) {
    log(`[pixelvox] Created ${grid.size} voxels using ${grid.method} method`);
    results.push(
      exportGrid(grid, input, prepared.options, {
        outDir: resolve(options.outDir),
        format: options.format,
        preview: options.preview,
        slice: options.slice,
        convertMs
      })
    );
  }

  log(`[pixelvox] Conversion complete! Results saved to ${resolve(options.outDir)}`);
  return {
    input,
    width: image.width,
    height: image.height,
    results
  };
}
