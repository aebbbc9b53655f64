import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { WriteError, type VoxelGrid } from "@pixelschem/core";
import {
  decodeSchematic,
  encodeBlockData,
  encodeSchematic,
  ensureSchematicExtension,
  nbtField,
  readNbt,
  saveSchematic
} from "../src/index.js";

function u16be(v: number): number[] {
  return [(v >>> 8) & 0xff, v & 0xff];
}

function i16be(v: number): number[] {
  const n = v & 0xffff;
  return [(n >>> 8) & 0xff, n & 0xff];
}

function i32be(v: number): number[] {
  const n = v >>> 0;
  return [(n >>> 24) & 0xff, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff];
}

function str(s: string): number[] {
  const b = Buffer.from(s, "utf8");
  return [...u16be(b.length), ...b];
}

function shortTag(name: string, value: number): number[] {
  return [2, ...str(name), ...i16be(value)];
}

function intTag(name: string, value: number): number[] {
  return [3, ...str(name), ...i32be(value)];
}

function byteArrayTag(name: string, value: number[]): number[] {
  return [7, ...str(name), ...i32be(value.length), ...value.map((v) => v & 0xff)];
}

function intArrayTag(name: string, value: number[]): number[] {
  return [11, ...str(name), ...i32be(value.length), ...value.flatMap(i32be)];
}

function emptyCompoundListTag(name: string): number[] {
  return [9, ...str(name), 10, ...i32be(0)];
}

function compoundTag(name: string, payload: number[]): number[] {
  return [10, ...str(name), ...payload, 0];
}

function grid(width: number, height: number, ids: number[]): VoxelGrid {
  return { width, height, depth: 1, indices: Uint32Array.from(ids) };
}

describe("encodeSchematic", () => {
  it("writes the exact Sponge tag layout", () => {
    const bytes = encodeSchematic({ grid: grid(1, 2, [0, 1]), palette: ["red_concrete", "blue_concrete"] });
    const expected = [
      10,
      ...str("Schematic"),
      ...intTag("Version", 2),
      ...intTag("DataVersion", 3100),
      ...shortTag("Width", 1),
      ...shortTag("Height", 1),
      ...shortTag("Length", 2),
      ...intArrayTag("Offset", [0, 0, 0]),
      ...compoundTag("Palette", [...intTag("red_concrete", 0), ...intTag("blue_concrete", 1)]),
      ...byteArrayTag("BlockData", [0, 1]),
      ...emptyCompoundListTag("BlockEntities"),
      0
    ];
    expect([...bytes]).toEqual(expected);
  });

  it("honors version overrides and appends metadata", () => {
    const bytes = encodeSchematic(
      { grid: grid(1, 1, [0]), palette: ["minecraft:stone"] },
      {
        dataVersion: 3465,
        metadata: { name: "tile", author: "tester", description: "one block", date: 1700000000000 }
      }
    );
    const decoded = decodeSchematic(bytes);
    expect(decoded.dataVersion).toBe(3465);
    expect(decoded.version).toBe(2);
    expect(decoded.metadata).toEqual({
      Name: "tile",
      Author: "tester",
      Date: 1700000000000n,
      Description: "one block"
    });
  });

  it("rejects grids that do not fit 16-bit dimensions", () => {
    expect(() => encodeSchematic({ grid: grid(40000, 1, []), palette: [] })).toThrow(RangeError);
  });

  it("round-trips palette ids to the same block names", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 9 }),
        fc.integer({ min: 1, max: 9 }),
        fc.integer({ min: 1, max: 200 }),
        fc.array(fc.nat(), { minLength: 81, maxLength: 81 }),
        (width, height, paletteSize, ids) => {
          const palette = Array.from({ length: paletteSize }, (_, i) => `test:block_${i}`);
          const indices = ids.slice(0, width * height).map((id) => id % paletteSize);
          const decoded = decodeSchematic(encodeSchematic({ grid: grid(width, height, indices), palette }));
          expect(decoded.width).toBe(width);
          expect(decoded.height).toBe(1);
          expect(decoded.length).toBe(height);
          expect(decoded.blockData.map((id) => decoded.palette[id])).toEqual(indices.map((id) => palette[id]));
        }
      )
    );
  });
});

describe("encodeBlockData", () => {
  it("uses one byte per voxel below 128 and varints above", () => {
    expect([...encodeBlockData(grid(3, 1, [0, 127, 5]))]).toEqual([0, 127, 5]);
    expect([...encodeBlockData(grid(2, 1, [128, 300]))]).toEqual([0x80, 0x01, 0xac, 0x02]);
  });
});

describe("decodeSchematic", () => {
  it("reads gzipped files", () => {
    const raw = encodeSchematic({ grid: grid(2, 1, [0, 0]), palette: ["minecraft:sand"] });
    const out = decodeSchematic(gzipSync(raw));
    expect(out.rootName).toBe("Schematic");
    expect(out.offset).toEqual([0, 0, 0]);
    expect(out.blockEntities).toEqual([]);
    expect(out.blockData).toEqual([0, 0]);
  });

  it("reports truncated block data", () => {
    const bytes = Uint8Array.from([
      10,
      ...str("Schematic"),
      ...intTag("Version", 2),
      ...intTag("DataVersion", 3100),
      ...shortTag("Width", 2),
      ...shortTag("Height", 1),
      ...shortTag("Length", 1),
      ...compoundTag("Palette", intTag("minecraft:stone", 0)),
      ...byteArrayTag("BlockData", [0]),
      0
    ]);
    expect(() => decodeSchematic(bytes)).toThrow(/SCHEM_BLOCKDATA_COUNT_MISMATCH/);
  });
});

describe("readNbt", () => {
  it("returns the typed tree the encoder wrote", () => {
    const raw = encodeSchematic({ grid: grid(1, 2, [0, 1]), palette: ["red_concrete", "blue_concrete"] });
    const { rootName, root } = readNbt(raw);
    expect(rootName).toBe("Schematic");
    expect(root.map(([key]) => key)).toEqual([
      "Version",
      "DataVersion",
      "Width",
      "Height",
      "Length",
      "Offset",
      "Palette",
      "BlockData",
      "BlockEntities"
    ]);
    expect(nbtField(root, "Length")).toEqual({ type: "short", value: 2 });
    expect(nbtField(root, "Offset")).toEqual({ type: "intArray", value: [0, 0, 0] });
    expect(nbtField(root, "BlockData")).toEqual({ type: "byteArray", value: Uint8Array.from([0, 1]) });
    expect(nbtField(root, "Palette")).toEqual({
      type: "compound",
      value: [
        ["red_concrete", { type: "int", value: 0 }],
        ["blue_concrete", { type: "int", value: 1 }]
      ]
    });
  });

  it("reads an empty list declared with the end tag", () => {
    const bytes = Uint8Array.from([10, ...str("R"), 9, ...str("L"), 0, ...i32be(0), 0]);
    expect(nbtField(readNbt(bytes).root, "L")).toEqual({ type: "list", elementType: "compound", value: [] });
  });

  it("rejects truncated input and tags a schematic never carries", () => {
    const raw = encodeSchematic({ grid: grid(1, 1, [0]), palette: ["minecraft:sand"] });
    expect(() => readNbt(raw.subarray(0, raw.length - 5))).toThrow(/NBT_TRUNCATED/);
    const withFloat = Uint8Array.from([10, ...str(""), 5, ...str("f"), 0, 0, 0, 0, 0]);
    expect(() => readNbt(withFloat)).toThrow(/NBT_UNSUPPORTED_TAG 5/);
  });
});

describe("saveSchematic", () => {
  it("appends the extension only when missing", () => {
    expect(ensureSchematicExtension("out/art")).toBe("out/art.schem");
    expect(ensureSchematicExtension("out/art.SCHEM")).toBe("out/art.SCHEM");
  });

  it("writes gzipped bytes by default and raw bytes on request", () => {
    const base = mkdtempSync(join(tmpdir(), "pixelschem-save-"));
    const raw = encodeSchematic({ grid: grid(1, 1, [0]), palette: ["minecraft:sand"] });

    const gz = saveSchematic(join(base, "nested", "a"), raw);
    expect(gz).toBe(join(base, "nested", "a.schem"));
    expect([...gunzipSync(readFileSync(gz))]).toEqual([...raw]);

    const plain = saveSchematic(join(base, "b.schem"), raw, { compress: false });
    expect([...readFileSync(plain)]).toEqual([...raw]);
  });

  it("wraps I/O failures in WriteError", () => {
    const base = mkdtempSync(join(tmpdir(), "pixelschem-save-"));
    const blocker = join(base, "file");
    writeFileSync(blocker, "x");
    const raw = encodeSchematic({ grid: grid(1, 1, [0]), palette: ["minecraft:sand"] });
    expect(() => saveSchematic(join(blocker, "inner"), raw)).toThrow(WriteError);
  });
});
