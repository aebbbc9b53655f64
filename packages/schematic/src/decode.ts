import { gunzipSync } from "node:zlib";
import { nbtField, readNbt, type NbtCompound, type NbtTag } from "./nbt.js";

export interface DecodedSchematic {
  rootName: string;
  version: number;
  dataVersion: number;
  width: number;
  height: number;
  length: number;
  offset: number[];
  /** Block names indexed by palette id. */
  palette: string[];
  /** Palette id per voxel, in file order. */
  blockData: number[];
  blockEntities: NbtTag[];
  metadata?: Record<string, string | number | bigint>;
}

export function isGzip(input: Uint8Array): boolean {
  return input.length >= 2 && input[0] === 0x1f && input[1] === 0x8b;
}

export function maybeGunzip(input: Uint8Array): Uint8Array {
  return isGzip(input) ? gunzipSync(input) : input;
}

function intField(root: NbtCompound, key: string): number | undefined {
  const tag = nbtField(root, key);
  if (tag?.type === "int" || tag?.type === "short" || tag?.type === "byte") return tag.value;
  return undefined;
}

function requireInt(root: NbtCompound, key: string): number {
  const v = intField(root, key);
  if (v === undefined) throw new Error(`SCHEM_FIELD_MISSING ${key}`);
  return v;
}

export function decodeVarints(bytes: Uint8Array, expectedCount: number): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < bytes.length && out.length < expectedCount) {
    let num = 0;
    let shift = 0;
    let steps = 0;
    while (true) {
      if (i >= bytes.length) {
        throw new Error("SCHEM_BLOCKDATA_TRUNCATED");
      }
      const b = bytes[i++] ?? 0;
      num |= (b & 0x7f) << shift;
      shift += 7;
      steps++;
      if ((b & 0x80) === 0) break;
      if (steps >= 5) {
        throw new Error("SCHEM_BLOCKDATA_VARINT_INVALID");
      }
    }
    out.push(num >>> 0);
  }
  if (out.length !== expectedCount) {
    throw new Error(`SCHEM_BLOCKDATA_COUNT_MISMATCH decoded=${out.length} expected=${expectedCount}`);
  }
  return out;
}

function readMetadata(tag: NbtTag | undefined): DecodedSchematic["metadata"] {
  if (tag?.type !== "compound") return undefined;
  const out: Record<string, string | number | bigint> = {};
  for (const [key, value] of tag.value) {
    switch (value.type) {
      case "string":
      case "byte":
      case "short":
      case "int":
      case "long":
        out[key] = value.value;
        break;
      default:
        break;
    }
  }
  return out;
}

/**
 * Reads a Sponge schematic (gzipped or raw) back into plain values. Throws
 * with a SCHEM_* code when a required field is absent or inconsistent.
 */
export function decodeSchematic(input: Uint8Array): DecodedSchematic {
  const { rootName, root } = readNbt(maybeGunzip(input));

  const width = requireInt(root, "Width");
  const height = requireInt(root, "Height");
  const length = requireInt(root, "Length");
  if (width <= 0 || height <= 0 || length <= 0) {
    throw new Error(`SCHEM_DIMENSIONS_INVALID ${width}x${height}x${length}`);
  }

  const paletteTag = nbtField(root, "Palette");
  const blockTag = nbtField(root, "BlockData");
  if (paletteTag?.type !== "compound" || blockTag?.type !== "byteArray") {
    throw new Error("SCHEM_LAYOUT_UNSUPPORTED");
  }

  const byId = new Map<number, string>();
  for (const [blockName, idTag] of paletteTag.value) {
    if (idTag.type !== "int") continue;
    if (byId.has(idTag.value)) {
      throw new Error(`SCHEM_PALETTE_DUPLICATE_ID ${idTag.value}`);
    }
    byId.set(idTag.value, blockName);
  }
  const palette: string[] = [];
  for (let id = 0; id < byId.size; id++) {
    const name = byId.get(id);
    if (name === undefined) throw new Error(`SCHEM_PALETTE_GAP ${id}`);
    palette.push(name);
  }

  const blockData = decodeVarints(blockTag.value, width * height * length);
  const outOfRange = blockData.find((id) => id >= palette.length);
  if (outOfRange !== undefined) {
    throw new Error(`SCHEM_PALETTE_ID_UNKNOWN ${outOfRange}`);
  }

  const offsetTag = nbtField(root, "Offset");
  const entitiesTag = nbtField(root, "BlockEntities");
  const offset = offsetTag?.type === "intArray" ? offsetTag.value : [0, 0, 0];
  const blockEntities = entitiesTag?.type === "list" ? entitiesTag.value : [];

  return {
    rootName,
    version: requireInt(root, "Version"),
    dataVersion: requireInt(root, "DataVersion"),
    width,
    height,
    length,
    offset,
    palette,
    blockData,
    blockEntities,
    metadata: readMetadata(nbtField(root, "Metadata"))
  };
}
