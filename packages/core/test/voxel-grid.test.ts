import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  BlockPaletteBuilder,
  PaletteIndex,
  assembleVoxelModel,
  buildPaletteIndex,
  buildVoxelModel,
  countBlocks,
  pixelGridFromRows,
  type Color,
  type PaletteEntry
} from "../src/index.js";

const RED: Color = { r: 255, g: 0, b: 0 };
const BLUE: Color = { r: 0, g: 0, b: 255 };

const woolIndex = buildPaletteIndex(
  [
    [255, 255, 255, "minecraft:white_wool"],
    [25, 25, 25, "minecraft:black_wool"],
    [160, 40, 35, "minecraft:red_wool"],
    [50, 60, 150, "minecraft:blue_wool"],
    [90, 120, 30, "minecraft:green_wool"],
    [250, 200, 40, "minecraft:yellow_wool"]
  ].map(([r, g, b, blockName]): PaletteEntry => ({
    color: { r: Number(r), g: Number(g), b: Number(b) },
    block: { blockName: String(blockName), blockData: 0 }
  }))
);

const channel = fc.integer({ min: 0, max: 255 });
const colorArb: fc.Arbitrary<Color> = fc.record({ r: channel, g: channel, b: channel });

describe("BlockPaletteBuilder", () => {
  it("assigns ids in first-seen order", () => {
    const palette = new BlockPaletteBuilder();
    expect(palette.idOf("b")).toBe(0);
    expect(palette.idOf("a")).toBe(1);
    expect(palette.idOf("b")).toBe(0);
    expect(palette.toArray()).toEqual(["b", "a"]);
    expect(palette.size).toBe(2);
  });
});

describe("buildVoxelModel", () => {
  it("maps the red/blue example to a two-block palette", () => {
    const index = buildPaletteIndex([
      { color: RED, block: { blockName: "red_concrete", blockData: 0 } },
      { color: BLUE, block: { blockName: "blue_concrete", blockData: 0 } }
    ]);
    const pixels = pixelGridFromRows([
      [RED, RED],
      [BLUE, BLUE]
    ]);
    const model = buildVoxelModel(pixels, 1, 2, index);
    expect(model.palette).toEqual(["red_concrete", "blue_concrete"]);
    expect([...model.grid.indices]).toEqual([0, 1]);
    expect(model.grid).toMatchObject({ width: 1, height: 2, depth: 1 });
    expect(model.unmatched).toBe(0);
  });

  it("orders the palette by first use, not by palette load order", () => {
    const index = buildPaletteIndex([
      { color: RED, block: { blockName: "red_concrete", blockData: 0 } },
      { color: BLUE, block: { blockName: "blue_concrete", blockData: 0 } }
    ]);
    const pixels = pixelGridFromRows([[BLUE, RED, BLUE]]);
    const model = buildVoxelModel(pixels, 3, 1, index);
    expect(model.palette).toEqual(["blue_concrete", "red_concrete"]);
    expect([...model.grid.indices]).toEqual([0, 1, 0]);
  });

  it("keeps the palette free of duplicates and indices in range", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 6 }).chain((w) =>
          fc.array(fc.array(colorArb, { minLength: w, maxLength: w }), { minLength: 1, maxLength: 6 })
        ),
        fc.integer({ min: 0, max: 7 }),
        fc.integer({ min: 0, max: 7 }),
        (rows, tw, th) => {
          const model = buildVoxelModel(pixelGridFromRows(rows), tw, th, woolIndex);
          expect(new Set(model.palette).size).toBe(model.palette.length);
          expect(model.grid.indices.length).toBe(model.grid.width * model.grid.height * model.grid.depth);
          for (const id of model.grid.indices) {
            expect(id).toBeLessThan(model.palette.length);
          }
        }
      )
    );
  });

  it("inserts the fallback block like any other block", () => {
    const pixels = pixelGridFromRows([[RED, BLUE]]);
    const model = buildVoxelModel(pixels, 2, 1, new PaletteIndex());
    expect(model.palette).toEqual(["minecraft:white_concrete"]);
    expect([...model.grid.indices]).toEqual([0, 0]);
    expect(model.unmatched).toBe(2);
  });

  it("counts blocks per palette entry", () => {
    const pixels = pixelGridFromRows([[RED, RED, { r: 255, g: 255, b: 255 }]]);
    const counts = countBlocks(buildVoxelModel(pixels, 3, 1, woolIndex));
    expect([...counts]).toEqual([
      ["minecraft:red_wool", 2],
      ["minecraft:white_wool", 1]
    ]);
  });
});

describe("assembleVoxelModel", () => {
  it("rejects a match count that does not fill the grid", () => {
    expect(() => assembleVoxelModel(2, 2, [])).toThrow(RangeError);
  });
});
