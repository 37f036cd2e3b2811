import { mkdirSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { PNG } from "pngjs";
import { runConvert } from "../packages/cli/src/run.js";

function writeSampleImage(path: string, size: number): void {
  const png = new PNG({ width: size, height: size });
  const c = size / 2;
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const idx = (y * size + x) * 4;
      const inside = Math.hypot(x - c, y - c) < size / 3;
      png.data[idx] = inside ? 220 : Math.round((x / size) * 255);
      png.data[idx + 1] = inside ? 60 : Math.round((y / size) * 255);
      png.data[idx + 2] = inside ? 40 : 180;
      png.data[idx + 3] = 255;
    }
  }
  writeFileSync(path, PNG.sync.write(png));
}

async function main(): Promise<void> {
  const outDir = resolve("data/smoke");
  mkdirSync(outDir, { recursive: true });
  const input = resolve(outDir, "sample.png");
  writeSampleImage(input, 96);

  const summary = await runConvert({
    input,
    method: "all",
    outDir,
    format: "pvx.gz",
    conversion: { voxelResolution: 32, maxHeight: 16 },
    preview: true,
    slice: 0,
    workers: process.argv.includes("--workers") ? 0 : 1
  });
  console.log("[smoke] conversion summary:");
  console.log(JSON.stringify(summary, null, 2));
  console.log("[smoke] inspect a grid with:");
  console.log(`npm run pixelvox -- inspect ${resolve(outDir, "height_voxels.pvx.gz")}`);
}

main().catch((error: unknown) => {
  console.error(`[smoke] failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
