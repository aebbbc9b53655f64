import type { VoxelGrid, VoxelModel } from "@pixelschem/core";
import { nbt, writeNbt, type NbtCompound, type NbtTag } from "./nbt.js";

export const SCHEMATIC_ROOT_NAME = "Schematic";
export const SCHEMATIC_VERSION = 2;
export const DEFAULT_DATA_VERSION = 3100;

export interface SchematicMetadata {
  name: string;
  author: string;
  description: string;
  /** Milliseconds since the epoch. */
  date: number;
}

export interface EncodeOptions {
  version?: number;
  dataVersion?: number;
  metadata?: SchematicMetadata;
}

const MAX_SHORT = 0x7fff;

export function encodeVarint(target: number[], value: number): void {
  let n = value >>> 0;
  while ((n & ~0x7f) !== 0) {
    target.push((n & 0x7f) | 0x80);
    n >>>= 7;
  }
  target.push(n);
}

/**
 * Per-voxel palette ids, z outer, y middle, x inner. Ids below 128 take one
 * byte each.
 */
export function encodeBlockData(grid: VoxelGrid): Uint8Array {
  const out: number[] = [];
  for (let z = 0; z < grid.depth; z++) {
    for (let y = 0; y < grid.height; y++) {
      for (let x = 0; x < grid.width; x++) {
        encodeVarint(out, grid.indices[(z * grid.height + y) * grid.width + x] ?? 0);
      }
    }
  }
  return Uint8Array.from(out);
}

function assertShort(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_SHORT) {
    throw new RangeError(`SCHEM_${name}_OUT_OF_RANGE value=${value}`);
  }
}

/**
 * Sponge schematic tag tree for a one-layer grid. The image lies in the X/Z
 * plane: Width is the grid width, Length the grid height and Height the
 * layer count.
 */
export function buildSchematicTree(model: Pick<VoxelModel, "grid" | "palette">, options: EncodeOptions = {}): NbtCompound {
  const { grid, palette } = model;
  assertShort("WIDTH", grid.width);
  assertShort("HEIGHT", grid.depth);
  assertShort("LENGTH", grid.height);

  const tree: NbtCompound = [
    ["Version", nbt.int(options.version ?? SCHEMATIC_VERSION)],
    ["DataVersion", nbt.int(options.dataVersion ?? DEFAULT_DATA_VERSION)],
    ["Width", nbt.short(grid.width)],
    ["Height", nbt.short(grid.depth)],
    ["Length", nbt.short(grid.height)],
    ["Offset", nbt.intArray([0, 0, 0])],
    ["Palette", nbt.compound(palette.map((name, id): [string, NbtTag] => [name, nbt.int(id)]))],
    ["BlockData", nbt.byteArray(encodeBlockData(grid))],
    ["BlockEntities", nbt.list("compound", [])]
  ];

  if (options.metadata) {
    tree.push([
      "Metadata",
      nbt.compound([
        ["Name", nbt.string(options.metadata.name)],
        ["Author", nbt.string(options.metadata.author)],
        ["Date", nbt.long(BigInt(Math.trunc(options.metadata.date)))],
        ["Description", nbt.string(options.metadata.description)]
      ])
    ]);
  }
  return tree;
}

export function encodeSchematic(model: Pick<VoxelModel, "grid" | "palette">, options: EncodeOptions = {}): Uint8Array {
  return writeNbt(SCHEMATIC_ROOT_NAME, buildSchematicTree(model, options));
}
