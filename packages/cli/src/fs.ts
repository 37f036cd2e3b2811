import { mkdirSync, readFileSync } from "node:fs";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readBytes(path: string): Uint8Array {
  return new Uint8Array(readFileSync(path));
}
