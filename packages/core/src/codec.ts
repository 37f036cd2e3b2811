import { Buffer } from "node:buffer";
import { gunzipSync, gzipSync } from "node:zlib";
import { VoxelGrid, VoxelGridBuilder } from "./grid.js";
import type { ConversionMethod, VoxelArrays } from "./types.js";

const MAGIC = [0x50, 0x56, 0x58, 0x31]; // "PVX1"
const LITTLE_ENDIAN = 0x01;
const METHODS: readonly ConversionMethod[] = ["height", "color", "structure"];

type MetadataValue = string | number;

function encodeString(target: number[], value: string): void {
  const utf8 = Buffer.from(value, "utf8");
  writeU32LE(target, utf8.length);
  for (const byte of utf8) {
    target.push(byte);
  }
}

function writeU32LE(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

export function encodeVoxelGrid(grid: VoxelGrid): Uint8Array {
  const bytes: number[] = [...MAGIC, LITTLE_ENDIAN];

  const metadata: Record<string, MetadataValue> = {
    method: grid.method,
    sourceHeight: grid.source.height,
    sourceWidth: grid.source.width
  };
  const entries = Object.entries(metadata)
    .map(([key, value]) => [key, JSON.stringify(value)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  writeU32LE(bytes, entries.length);
  for (const [key, value] of entries) {
    encodeString(bytes, key);
    encodeString(bytes, value);
  }

  writeU32LE(bytes, grid.dims.x);
  writeU32LE(bytes, grid.dims.y);
  writeU32LE(bytes, grid.dims.z);

  writeU32LE(bytes, grid.size);
  for (const v of grid.voxels) {
    writeU32LE(bytes, v.x);
    writeU32LE(bytes, v.y);
    writeU32LE(bytes, v.z);
    bytes.push(v.color.r, v.color.g, v.color.b);
  }

  return Uint8Array.from(bytes);
}

class Cursor {
  public offset = 0;
  private readonly view: DataView;

  public constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public ensure(size: number): void {
    if (this.offset + size > this.view.byteLength) {
      throw new Error(`PVX_TRUNCATED at offset=${this.offset}`);
    }
  }

  public u8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  public u32(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  public string(): string {
    const len = this.u32();
    this.ensure(len);
    const out = Buffer.from(this.bytes.subarray(this.offset, this.offset + len)).toString("utf8");
    this.offset += len;
    return out;
  }
}

function parseMetadataValue(key: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`PVX_BAD_METADATA ${key}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function isMethod(value: unknown): value is ConversionMethod {
  return typeof value === "string" && (METHODS as readonly string[]).includes(value);
}

function requireInteger(metadata: Map<string, unknown>, key: string): number {
  const value = metadata.get(key);
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`PVX_BAD_METADATA ${key} must be an integer`);
  }
  return value;
}

export function decodeVoxelGrid(bytes: Uint8Array): VoxelGrid {
  const c = new Cursor(bytes);
  for (const expected of MAGIC) {
    if (c.u8() !== expected) {
      throw new Error("PVX_BAD_MAGIC not a pixelvox grid");
    }
  }
  if (c.u8() !== LITTLE_ENDIAN) {
    throw new Error("PVX_BAD_MAGIC unsupported endianness marker");
  }

  const metadata = new Map<string, unknown>();
  const entryCount = c.u32();
  for (let i = 0; i < entryCount; i++) {
    const key = c.string();
    metadata.set(key, parseMetadataValue(key, c.string()));
  }

  const method = metadata.get("method");
  if (!isMethod(method)) {
    throw new Error(`PVX_BAD_METADATA method ${JSON.stringify(method)}`);
  }

  const dims = { x: c.u32(), y: c.u32(), z: c.u32() };
  const builder = new VoxelGridBuilder({
    method,
    dims,
    source: {
      width: requireInteger(metadata, "sourceWidth"),
      height: requireInteger(metadata, "sourceHeight")
    }
  });

  const count = c.u32();
  for (let i = 0; i < count; i++) {
    const x = c.u32();
    const y = c.u32();
    const z = c.u32();
    builder.add(x, y, z, { r: c.u8(), g: c.u8(), b: c.u8() });
  }

  if (c.offset !== bytes.byteLength) {
    throw new Error(`PVX_TRAILING_BYTES ${bytes.byteLength - c.offset}`);
  }
  return builder.build();
}

export function encodeVoxelGridCompressed(grid: VoxelGrid): Uint8Array {
  return new Uint8Array(gzipSync(encodeVoxelGrid(grid)));
}

export function decodeVoxelGridCompressed(bytes: Uint8Array): VoxelGrid {
  return decodeVoxelGrid(new Uint8Array(gunzipSync(bytes)));
}

export function toVoxelArrays(grid: VoxelGrid): VoxelArrays {
  return {
    method: grid.method,
    dims: { ...grid.dims },
    source: { ...grid.source },
    positions: grid.voxels.map((v) => [v.x, v.y, v.z]),
    colors: grid.voxels.map((v) => [v.color.r, v.color.g, v.color.b])
  };
}
