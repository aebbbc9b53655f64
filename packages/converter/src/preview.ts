import { writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { PNG } from "pngjs";
import { WHITE, WriteError, type VoxelModel } from "@pixelschem/core";
import { ensureDir } from "./fs.js";

export interface PreviewOptions {
  /** Pixels per block edge. */
  scale?: number;
}

/**
 * Renders the converted grid top-down, one square per block, in the palette
 * color each cell matched. Fallback cells render white.
 */
export function renderPreviewPng(model: Pick<VoxelModel, "grid" | "matches">, options: PreviewOptions = {}): Buffer {
  const scale = Math.max(1, Math.trunc(options.scale ?? 1));
  const { width: gridWidth, height: gridHeight } = model.grid;
  const width = gridWidth * scale;
  const height = gridHeight * scale;
  const pixels = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const match = model.matches[Math.floor(y / scale) * gridWidth + Math.floor(x / scale)];
      const c = match?.color ?? WHITE;
      const idx = (y * width + x) * 4;
      pixels[idx] = c.r;
      pixels[idx + 1] = c.g;
      pixels[idx + 2] = c.b;
      pixels[idx + 3] = 255;
    }
  }

  const png = new PNG({ width, height });
  png.data = Buffer.from(pixels);
  return PNG.sync.write(png);
}

export function writePreview(path: string, model: Pick<VoxelModel, "grid" | "matches">, options: PreviewOptions = {}): string {
  const png = renderPreviewPng(model, options);
  try {
    ensureDir(dirname(path));
    writeFileSync(path, png);
  } catch (error) {
    throw new WriteError(path, { cause: error });
  }
  return path;
}
