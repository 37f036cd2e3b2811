import { parentPort } from "node:worker_threads";
import { BinnedImage } from "@pixelvox/core";
import { convertBinned } from "@pixelvox/converter";
import type { ConvertTask, WorkerReply } from "../types.js";

if (!parentPort) {
  throw new Error("convert-worker must run in worker context");
}

parentPort.on("message", (task: ConvertTask) => {
  let reply: WorkerReply;
  try {
    const grid = convertBinned(BinnedImage.fromRecord(task.binned), task.method, task.options);
    reply = { ok: true, grid: grid.toRecord() };
  } catch (error) {
    reply = { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  parentPort?.postMessage(reply);
});
