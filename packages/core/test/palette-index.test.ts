import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { EmptyPaletteError, FALLBACK_BLOCK, PaletteIndex, buildPaletteIndex, type PaletteEntry } from "../src/index.js";

function entry(r: number, g: number, b: number, blockName: string, blockData = 0): PaletteEntry {
  return { color: { r, g, b }, block: { blockName, blockData } };
}

const channel = fc.integer({ min: 0, max: 255 });

describe("PaletteIndex", () => {
  it("resolves every color to the only entry", () => {
    const index = buildPaletteIndex([entry(0, 0, 0, "block_a")]);
    fc.assert(
      fc.property(channel, channel, channel, (r, g, b) => {
        const match = index.findClosest({ r, g, b });
        return match.matched && match.block.blockName === "block_a";
      })
    );
  });

  it("picks the nearest color", () => {
    const index = buildPaletteIndex([
      entry(255, 0, 0, "minecraft:red_wool", 14),
      entry(0, 0, 255, "minecraft:blue_wool", 11),
      entry(255, 255, 255, "minecraft:white_wool")
    ]);
    const match = index.findClosest({ r: 200, g: 30, b: 20 });
    expect(match.matched).toBe(true);
    expect(match.block).toEqual({ blockName: "minecraft:red_wool", blockData: 14 });
    expect(match.color).toEqual({ r: 255, g: 0, b: 0 });
  });

  it("keeps the first color inserted when distances tie", () => {
    const forward = buildPaletteIndex([entry(0, 0, 20, "low"), entry(0, 0, 40, "high")]);
    const reversed = buildPaletteIndex([entry(0, 0, 40, "high"), entry(0, 0, 20, "low")]);
    const green = buildPaletteIndex([entry(0, 10, 0, "dark"), entry(0, 30, 0, "light")]);

    expect(green.findClosest({ r: 0, g: 20, b: 0 }).block.blockName).toBe("dark");
    expect(forward.findClosest({ r: 0, g: 0, b: 30 }).block.blockName).toBe("low");
    expect(reversed.findClosest({ r: 0, g: 0, b: 30 }).block.blockName).toBe("high");
  });

  it("lets later entries overwrite a color without moving it", () => {
    const index = buildPaletteIndex([entry(1, 1, 1, "old"), entry(2, 2, 2, "other"), entry(1, 1, 1, "new", 3)]);
    expect(index.size).toBe(2);
    expect(index.entries()).toEqual([entry(1, 1, 1, "new", 3), entry(2, 2, 2, "other")]);
  });

  it("refuses to load an empty palette", () => {
    expect(() => new PaletteIndex().load([])).toThrow(EmptyPaletteError);
  });

  it("falls back to a default block when nothing was loaded", () => {
    const match = new PaletteIndex().findClosest({ r: 12, g: 34, b: 56 });
    expect(match.matched).toBe(false);
    expect(match.block).toEqual(FALLBACK_BLOCK);
    expect(match.color).toBeUndefined();
  });

  it("drops memoized matches when more entries load", () => {
    const index = buildPaletteIndex([entry(0, 0, 0, "black")]);
    expect(index.findClosest({ r: 250, g: 250, b: 250 }).block.blockName).toBe("black");
    index.load([entry(255, 255, 255, "white")]);
    expect(index.findClosest({ r: 250, g: 250, b: 250 }).block.blockName).toBe("white");
  });
});
