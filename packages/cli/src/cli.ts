#!/usr/bin/env -S node --import tsx
import minimist from "minimist";
import { resolve } from "node:path";
import { InvalidConfigurationError, isConversionError, toVoxelArrays } from "@pixelvox/core";
import { readConfigFromYaml, type ConversionOptionsInput } from "@pixelvox/converter";
import { readGridFile } from "./export.js";
import { runConvert } from "./run.js";
import { OUTPUT_FORMATS, type OutputFormat } from "./types.js";

function printHelp(): void {
  console.log(`pixelvox

Usage:
  pixelvox convert <image.png> --method all --out output
  pixelvox inspect <file.pvx|file.pvx.gz>

Options:
  --method <name>          height | color | structure | all (default: all)
  --out <dir>              Output directory (default: output)
  --format <fmt>           pvx | pvx.gz | json (default: pvx.gz)
  --config <file>          YAML conversion options
  --resolution <n>         Voxel grid size along x/y (default: 64)
  --max-height <n>         Height method z extent (default: 32)
  --column <mode>          solid | shell (default: solid)
  --layers <n>             Color method layer count (default: 16)
  --achromatic-layer <n>   Layer for grayscale cells (default: 0)
  --depth-levels <n>       Structure method z extent (default: 24)
  --distance-scale <x>     Structure height per cell of edge distance (default: 1)
  --edge-threshold <x>     Sobel magnitude that marks an edge (default: 100)
  --shade                  Darken structure voxels with height
  --preview                Render <method>_preview.png
  --slice <z>              Render <method>_slice_<z>.png cross-section
  --workers <n>            Worker threads for --method all (default: 1, 0 = CPU-1)
`);
}

function numberFlag(argv: minimist.ParsedArgs, flag: string): number | undefined {
  const raw: unknown = argv[flag];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(flag, `expected a number, got ${JSON.stringify(raw)}`);
  }
  return value;
}

function columnFlag(raw: unknown): "solid" | "shell" | undefined {
  if (raw === undefined) return undefined;
  if (raw === "solid" || raw === "shell") return raw;
  throw new InvalidConfigurationError("column", `expected "solid" or "shell", got ${JSON.stringify(raw)}`);
}

function parseFormat(raw: unknown): OutputFormat {
  const match = OUTPUT_FORMATS.find((f) => f === raw);
  if (!match) {
    throw new InvalidConfigurationError("format", `expected one of ${OUTPUT_FORMATS.join(", ")}, got ${JSON.stringify(raw)}`);
  }
  return match;
}

function conversionFromFlags(argv: minimist.ParsedArgs): ConversionOptionsInput {
  const fromFile: ConversionOptionsInput = typeof argv.config === "string" ? readConfigFromYaml(resolve(argv.config)) : {};
  const fromFlags: ConversionOptionsInput = {
    voxelResolution: numberFlag(argv, "resolution"),
    maxHeight: numberFlag(argv, "max-height"),
    column: columnFlag(argv.column),
    layers: numberFlag(argv, "layers"),
    achromaticLayer: numberFlag(argv, "achromatic-layer"),
    depthLevels: numberFlag(argv, "depth-levels"),
    distanceScale: numberFlag(argv, "distance-scale"),
    edgeThreshold: numberFlag(argv, "edge-threshold"),
    shadeByDepth: argv.shade === true ? true : undefined
  };
  const merged: ConversionOptionsInput = { ...fromFile };
  for (const [key, value] of Object.entries(fromFlags)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}

async function run(): Promise<void> {
  const argv = minimist(process.argv.slice(2), {
    boolean: ["preview", "shade"],
    string: ["out", "format", "method", "config", "column"],
    default: {
      out: "output",
      format: "pvx.gz",
      method: "all"
    }
  });

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "inspect") {
    const file = argv._[1];
    if (!file) {
      throw new Error("Missing file argument.");
    }
    const grid = readGridFile(resolve(String(file)));
    const { positions, colors, ...summary } = toVoxelArrays(grid);
    console.log(
      JSON.stringify({ ...summary, voxelCount: positions.length, distinctColors: new Set(colors.map((c) => c.join(","))).size, bounds: grid.bounds }, null, 2)
    );
    return;
  }

  if (command !== "convert") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const input = argv._[1];
  if (!input) {
    throw new Error("Missing image argument.");
  }

  const summary = await runConvert({
    input: String(input),
    method: String(argv.method),
    outDir: String(argv.out),
    format: parseFormat(argv.format),
    conversion: conversionFromFlags(argv),
    preview: Boolean(argv.preview),
    slice: numberFlag(argv, "slice"),
    workers: numberFlag(argv, "workers") ?? 1
  });

  console.log(JSON.stringify(summary, null, 2));
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[pixelvox] ${message}`);
  if (!isConversionError(error) && error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
