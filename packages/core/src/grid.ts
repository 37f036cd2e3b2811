import { assertIntegerCoords, assertPositiveDims, computeBounds, isWithinDims, voxelSlot } from "./bounds.js";
import type { Bounds, ConversionMethod, GridDims, Rgb, SourceInfo, Voxel, VoxelGridRecord } from "./types.js";

export interface VoxelGridInit {
  method: ConversionMethod;
  dims: GridDims;
  source: SourceInfo;
}

/**
 * Sparse voxel result of one conversion. Voxels live in a flat arena in emission
 * order; `get`/`has` go through a coordinate index into that arena.
 */
export class VoxelGrid implements Iterable<Voxel> {
  public readonly method: ConversionMethod;
  public readonly dims: Readonly<GridDims>;
  public readonly source: Readonly<SourceInfo>;
  public readonly bounds: Readonly<Bounds>;
  public readonly voxels: readonly Voxel[];
  private readonly index: ReadonlyMap<number, number>;

  /** @internal use {@link VoxelGridBuilder} or {@link VoxelGrid.fromRecord} */
  public constructor(init: VoxelGridInit, voxels: Voxel[], index: Map<number, number>) {
    this.method = init.method;
    this.dims = Object.freeze({ ...init.dims });
    this.source = Object.freeze({ ...init.source });
    this.voxels = Object.freeze(voxels);
    this.bounds = Object.freeze(computeBounds(voxels));
    this.index = index;
    Object.freeze(this);
  }

  public get size(): number {
    return this.voxels.length;
  }

  public [Symbol.iterator](): Iterator<Voxel> {
    return this.voxels[Symbol.iterator]();
  }

  public get(x: number, y: number, z: number): Voxel | undefined {
    if (!isWithinDims(this.dims, x, y, z)) return undefined;
    const slot = this.index.get(voxelSlot(this.dims, x, y, z));
    return slot === undefined ? undefined : this.voxels[slot];
  }

  public has(x: number, y: number, z: number): boolean {
    return this.get(x, y, z) !== undefined;
  }

  public toRecord(): VoxelGridRecord {
    const positions = new Uint32Array(this.voxels.length * 3);
    const colors = new Uint8Array(this.voxels.length * 3);
    this.voxels.forEach((v, i) => {
      positions[i * 3] = v.x;
      positions[i * 3 + 1] = v.y;
      positions[i * 3 + 2] = v.z;
      colors[i * 3] = v.color.r;
      colors[i * 3 + 1] = v.color.g;
      colors[i * 3 + 2] = v.color.b;
    });
    return {
      method: this.method,
      dims: { ...this.dims },
      source: { ...this.source },
      positions,
      colors
    };
  }

  public static fromRecord(record: VoxelGridRecord): VoxelGrid {
    if (record.positions.length !== record.colors.length || record.positions.length % 3 !== 0) {
      throw new Error("GRID_RECORD_MISMATCH positions and colors must hold the same number of triples");
    }
    const builder = new VoxelGridBuilder(record);
    for (let i = 0; i < record.positions.length; i += 3) {
      builder.add(record.positions[i], record.positions[i + 1], record.positions[i + 2], {
        r: record.colors[i],
        g: record.colors[i + 1],
        b: record.colors[i + 2]
      });
    }
    return builder.build();
  }
}

export class VoxelGridBuilder {
  private readonly init: VoxelGridInit;
  private readonly voxels: Voxel[] = [];
  private readonly index = new Map<number, number>();
  private built = false;

  public constructor(init: VoxelGridInit) {
    assertPositiveDims(init.dims);
    this.init = {
      method: init.method,
      dims: { ...init.dims },
      source: { ...init.source }
    };
  }

  public get size(): number {
    return this.voxels.length;
  }

  public add(x: number, y: number, z: number, color: Rgb): this {
    if (this.built) {
      throw new Error("GRID_FROZEN builder was already built");
    }
    assertIntegerCoords(x, y, z);
    const { dims } = this.init;
    if (!isWithinDims(dims, x, y, z)) {
      throw new RangeError(`VOXEL_OUT_OF_RANGE (${x},${y},${z}) outside ${dims.x}x${dims.y}x${dims.z}`);
    }
    const slot = voxelSlot(dims, x, y, z);
    if (this.index.has(slot)) {
      throw new Error(`VOXEL_DUPLICATE (${x},${y},${z}) is already occupied`);
    }
    this.index.set(slot, this.voxels.length);
    this.voxels.push({ x, y, z, color: Object.freeze({ r: color.r, g: color.g, b: color.b }) });
    return this;
  }

  public build(): VoxelGrid {
    if (this.built) {
      throw new Error("GRID_FROZEN builder was already built");
    }
    this.built = true;
    for (const v of this.voxels) Object.freeze(v);
    return new VoxelGrid(this.init, this.voxels, this.index);
  }
}
