import { colorDistance, packColor, unpackColor } from "./color.js";
import { EmptyPaletteError } from "./errors.js";
import type { BlockMapping, ClosestMatch, Color, PaletteEntry } from "./types.js";

export const FALLBACK_BLOCK: Readonly<BlockMapping> = Object.freeze({
  blockName: "minecraft:white_concrete",
  blockData: 0
});

/**
 * Color to block lookup. Iterates colors in the order they were first
 * inserted; overwriting a color keeps its original position.
 */
export class PaletteIndex {
  private readonly mappings = new Map<number, BlockMapping>();
  private readonly memo = new Map<number, ClosestMatch>();

  public get size(): number {
    return this.mappings.size;
  }

  public load(entries: Iterable<PaletteEntry>): this {
    this.memo.clear();
    for (const entry of entries) {
      this.mappings.set(packColor(entry.color), {
        blockName: entry.block.blockName,
        blockData: entry.block.blockData
      });
    }
    if (this.mappings.size === 0) {
      throw new EmptyPaletteError();
    }
    return this;
  }

  public entries(): PaletteEntry[] {
    return [...this.mappings].map(([packed, block]) => ({ color: unpackColor(packed), block }));
  }

  public findClosest(target: Color): ClosestMatch {
    const key = packColor(target);
    const cached = this.memo.get(key);
    if (cached) return cached;

    let best: ClosestMatch = {
      block: FALLBACK_BLOCK,
      color: undefined,
      distance: Number.POSITIVE_INFINITY,
      matched: false
    };
    for (const [packed, block] of this.mappings) {
      const color = unpackColor(packed);
      const distance = colorDistance(target, color);
      // Strict comparison: the first color at the minimum distance wins.
      if (distance < best.distance) {
        best = { block, color, distance, matched: true };
      }
    }
    this.memo.set(key, best);
    return best;
  }
}

export function buildPaletteIndex(entries: Iterable<PaletteEntry>): PaletteIndex {
  return new PaletteIndex().load(entries);
}
