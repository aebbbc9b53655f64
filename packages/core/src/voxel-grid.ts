import { coerceTargetSize, downsample } from "./downsample.js";
import type { PaletteIndex } from "./palette-index.js";
import type { ClosestMatch, DownsampledCell, PixelGrid, VoxelModel } from "./types.js";

export const GRID_DEPTH = 1;

/**
 * Assigns ids to block names in first-seen order.
 */
export class BlockPaletteBuilder {
  private readonly ids = new Map<string, number>();

  public get size(): number {
    return this.ids.size;
  }

  public idOf(blockName: string): number {
    const existing = this.ids.get(blockName);
    if (existing !== undefined) return existing;
    const id = this.ids.size;
    this.ids.set(blockName, id);
    return id;
  }

  public toArray(): string[] {
    return [...this.ids.keys()];
  }
}

export function classifyCells(cells: DownsampledCell[], index: PaletteIndex): ClosestMatch[] {
  return cells.map((cell) => index.findClosest(cell.color));
}

/**
 * Single sequential pass over row-major matches. Palette ids follow first use,
 * so the result does not depend on how the matches were computed.
 */
export function assembleVoxelModel(width: number, height: number, matches: ClosestMatch[]): VoxelModel {
  const expected = width * height * GRID_DEPTH;
  if (matches.length !== expected) {
    throw new RangeError(`Expected ${expected} cell matches, got ${matches.length}`);
  }
  const palette = new BlockPaletteBuilder();
  const indices = new Uint32Array(expected);
  let unmatched = 0;
  for (let i = 0; i < expected; i++) {
    const match = matches[i];
    if (!match) continue;
    if (!match.matched) unmatched++;
    // z = 0 is the only layer, so the row-major cell index is the voxel index.
    indices[i] = palette.idOf(match.block.blockName);
  }
  return {
    grid: { width, height, depth: GRID_DEPTH, indices },
    palette: palette.toArray(),
    matches,
    unmatched
  };
}

export function buildVoxelModel(
  pixels: PixelGrid,
  targetWidth: number,
  targetHeight: number,
  index: PaletteIndex
): VoxelModel {
  const target = coerceTargetSize(targetWidth, targetHeight);
  const cells = downsample(pixels, target.width, target.height);
  return assembleVoxelModel(target.width, target.height, classifyCells(cells, index));
}

export function countBlocks(model: VoxelModel): Map<string, number> {
  const counts = new Map<string, number>();
  for (const id of model.grid.indices) {
    const name = model.palette[id];
    if (name === undefined) continue;
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return counts;
}
