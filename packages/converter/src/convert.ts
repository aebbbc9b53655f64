import { basename, resolve } from "node:path";
import {
  assembleVoxelModel,
  buildPaletteIndex,
  classifyCells,
  coerceTargetSize,
  countBlocks,
  downsample,
  fitAspectRatio,
  type ClosestMatch,
  type Diagnostic,
  type PaletteIndex,
  type PixelGrid,
  type TargetSize
} from "@pixelschem/core";
import { loadPaletteSources } from "@pixelschem/block-palette";
import { SCHEMATIC_EXTENSION, encodeSchematic, saveSchematic, type EncodeOptions } from "@pixelschem/schematic";
import { decodeImage } from "./image.js";
import { writePreview } from "./preview.js";
import type { ConvertOptions, ConvertSummary } from "./types.js";
import { classifyOnWorkers } from "./worker-pool.js";

export const DEFAULT_DESCRIPTION = "Generated by pixelschem";

export function resolveTargetSize(source: TargetSize, options: Pick<ConvertOptions, "width" | "height" | "keepAspect">): TargetSize {
  const width = options.width ?? source.width;
  const height = options.height ?? source.height;
  if (options.keepAspect) {
    return fitAspectRatio(source.width, source.height, width, height);
  }
  return coerceTargetSize(width, height);
}

function classifyInProcess(pixels: PixelGrid, size: TargetSize, index: PaletteIndex): ClosestMatch[] {
  return classifyCells(downsample(pixels, size.width, size.height), index);
}

function schematicName(outputPath: string): string {
  const name = basename(outputPath);
  return name.toLowerCase().endsWith(SCHEMATIC_EXTENSION) ? name.slice(0, -SCHEMATIC_EXTENSION.length) : name;
}

export async function convertImage(options: ConvertOptions): Promise<ConvertSummary> {
  const now = options.now ?? Date.now;
  const started = now();

  const palette = loadPaletteSources({ blocksDir: resolve(options.blocksDir), sources: options.sources });
  const warnings: Diagnostic[] = [...palette.diagnostics];
  const index = buildPaletteIndex(palette.entries);

  const pixels = await decodeImage(resolve(options.input));
  const sourceSize = { width: pixels.width, height: pixels.height };
  const size = resolveTargetSize(sourceSize, options);

  const workers = options.workers ?? 1;
  const matches =
    workers > 1 && size.height > 1
      ? await classifyOnWorkers(pixels, size, index.entries(), workers)
      : classifyInProcess(pixels, size, index);

  const model = assembleVoxelModel(size.width, size.height, matches);
  if (model.unmatched > 0) {
    warnings.push({
      code: "FALLBACK_BLOCK_USED",
      severity: "warning",
      message: `${model.unmatched} cell(s) had no palette match and use the fallback block.`
    });
  }

  const encodeOptions: EncodeOptions = {};
  if (options.dataVersion !== undefined) {
    encodeOptions.dataVersion = options.dataVersion;
  }
  if (options.metadata) {
    encodeOptions.metadata = {
      name: schematicName(options.output),
      author: options.author ?? "",
      description: DEFAULT_DESCRIPTION,
      date: now()
    };
  }
  const bytes = encodeSchematic(model, encodeOptions);
  const output = saveSchematic(resolve(options.output), bytes, { compress: options.compress });

  let previewPath: string | null = null;
  if (options.preview) {
    previewPath = writePreview(resolve(options.preview), model, { scale: options.previewScale });
  }

  return {
    input: resolve(options.input),
    output,
    sourceSize,
    size,
    blockCount: model.grid.indices.length,
    palette: model.palette,
    blockCounts: Object.fromEntries(countBlocks(model)),
    unmatched: model.unmatched,
    sourcesLoaded: palette.loaded,
    warnings,
    previewPath,
    elapsedMs: now() - started
  };
}
