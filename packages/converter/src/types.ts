import type { ClosestMatch, Diagnostic, PaletteEntry, TargetSize } from "@pixelschem/core";

export interface ConvertOptions {
  input: string;
  output: string;
  /** Both or neither; omitted means the native image size. */
  width?: number;
  height?: number;
  blocksDir: string;
  sources?: string[];
  workers?: number;
  keepAspect?: boolean;
  compress?: boolean;
  dataVersion?: number;
  metadata?: boolean;
  author?: string;
  preview?: string;
  previewScale?: number;
  now?: () => number;
}

export interface ConvertSummary {
  input: string;
  output: string;
  sourceSize: TargetSize;
  size: TargetSize;
  blockCount: number;
  palette: string[];
  blockCounts: Record<string, number>;
  unmatched: number;
  sourcesLoaded: string[];
  warnings: Diagnostic[];
  previewPath: string | null;
  elapsedMs: number;
}

export interface ClassifyBand {
  rowStart: number;
  rowEnd: number;
}

/** Everything a worker needs to classify one band of target rows. */
export interface ClassifyWorkerData {
  width: number;
  height: number;
  /** Packed RGB, backed by a SharedArrayBuffer when sent to workers. */
  data: Uint8Array;
  targetWidth: number;
  targetHeight: number;
  palette: PaletteEntry[];
  band: ClassifyBand;
}

export type ClassifyWorkerMessage = { ok: true; matches: ClosestMatch[] } | { ok: false; error: string };
