import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { VoxelGridRecord } from "@pixelvox/core";
import type { ConvertTask, WorkerReply } from "./types.js";

interface QueuedTask {
  task: ConvertTask;
  resolve: (grid: VoxelGridRecord) => void;
  reject: (error: Error) => void;
}

interface PoolWorker {
  worker: Worker;
  current: QueuedTask | null;
}

export interface WorkerPoolOptions {
  /** Module the worker threads run; defaults to the bundled convert worker. */
  entry?: URL;
}

function defaultEntry(): URL {
  const compiled = fileURLToPath(import.meta.url).endsWith(".js");
  return new URL(compiled ? "./workers/convert-worker.js" : "./workers/convert-worker.ts", import.meta.url);
}

function spawnWorker(entry: URL): Worker {
  if (!fileURLToPath(entry).endsWith(".ts")) {
    return new Worker(entry);
  }
  // worker threads do not inherit the tsx loader, so each one registers it first
  return new Worker(new URL("./workers/bootstrap.mjs", import.meta.url), {
    workerData: { entry: entry.href }
  });
}

/**
 * Fixed-size set of conversion threads. A thread that errors or exits leaves
 * the pool for good; once none are left, queued and future tasks reject.
 */
export class ConversionWorkerPool {
  private readonly live = new Set<PoolWorker>();
  private readonly queue: QueuedTask[] = [];
  private closing = false;

  public constructor(size: number, options: WorkerPoolOptions = {}) {
    const entry = options.entry ?? defaultEntry();
    for (let i = 0; i < Math.max(1, size); i++) {
      this.attach(spawnWorker(entry));
    }
  }

  public get liveWorkers(): number {
    return this.live.size;
  }

  public run(task: ConvertTask): Promise<VoxelGridRecord> {
    return new Promise<VoxelGridRecord>((resolve, reject) => {
      if (this.closing || this.live.size === 0) {
        reject(new Error("WORKER_POOL_EMPTY no live conversion workers"));
        return;
      }
      this.queue.push({ task, resolve, reject });
      this.dispatch();
    });
  }

  public async close(): Promise<void> {
    this.closing = true;
    const workers = [...this.live].map((entry) => entry.worker);
    this.live.clear();
    this.drain(new Error("WORKER_POOL_CLOSED pool was closed"));
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private attach(worker: Worker): void {
    const entry: PoolWorker = { worker, current: null };
    this.live.add(entry);

    worker.on("message", (reply: WorkerReply) => {
      const task = entry.current;
      entry.current = null;
      if (task) {
        if (reply.ok) task.resolve(reply.grid);
        else task.reject(new Error(reply.error));
      }
      this.dispatch();
    });
    worker.on("error", (error) => this.retire(entry, error));
    worker.on("exit", (code) => this.retire(entry, new Error(`WORKER_EXITED code=${code}`)));
  }

  private retire(entry: PoolWorker, error: Error): void {
    if (!this.live.delete(entry)) return;
    entry.current?.reject(error);
    entry.current = null;
    if (this.live.size === 0) {
      this.drain(error);
    } else {
      this.dispatch();
    }
  }

  private drain(error: Error): void {
    for (const task of this.queue.splice(0)) {
      task.reject(error);
    }
  }

  private dispatch(): void {
    for (const entry of this.live) {
      if (this.queue.length === 0) return;
      if (entry.current) continue;
      const next = this.queue.shift();
      if (!next) return;
      entry.current = next;
      entry.worker.postMessage(next.task);
    }
  }
}
