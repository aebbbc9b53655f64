import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { ClosestMatch, PaletteEntry, PixelGrid, TargetSize } from "@pixelschem/core";
import type { ClassifyBand, ClassifyWorkerData, ClassifyWorkerMessage } from "./types.js";

/**
 * Splits target rows into at most `workers` contiguous, non-empty bands of
 * near-equal height.
 */
export function planBands(targetHeight: number, workers: number): ClassifyBand[] {
  const wanted = Number.isFinite(workers) ? Math.trunc(workers) : 1;
  const count = Math.max(1, Math.min(targetHeight, wanted));
  const bands: ClassifyBand[] = [];
  for (let i = 0; i < count; i++) {
    bands.push({
      rowStart: Math.floor((i * targetHeight) / count),
      rowEnd: Math.floor(((i + 1) * targetHeight) / count)
    });
  }
  return bands;
}

function workerEntry(): URL {
  // Sources run through tsx need the loader registered inside each thread.
  const fromSources = fileURLToPath(import.meta.url).endsWith(".ts");
  return new URL(fromSources ? "./workers/bootstrap.mjs" : "./workers/classify-worker.js", import.meta.url);
}

function shareBytes(bytes: Uint8Array): Uint8Array {
  const shared = new Uint8Array(new SharedArrayBuffer(bytes.length));
  shared.set(bytes);
  return shared;
}

/** Settles on the worker's single reply, or rejects if it fails or exits first. */
export function awaitBandReply(worker: Worker, band: ClassifyBand, width: number): Promise<ClosestMatch[]> {
  return new Promise<ClosestMatch[]>((resolve, reject) => {
    const rows = `rows ${band.rowStart}-${band.rowEnd}`;
    worker.once("message", (message: ClassifyWorkerMessage) => {
      if (!message.ok) {
        reject(new Error(`${rows}: ${message.error}`));
        return;
      }
      const expected = (band.rowEnd - band.rowStart) * width;
      if (message.matches.length !== expected) {
        reject(new Error(`${rows}: got ${message.matches.length} cells, expected ${expected}`));
        return;
      }
      resolve(message.matches);
    });
    worker.once("error", reject);
    worker.once("exit", (code) => {
      reject(new Error(`${rows}: classify worker exited with code ${code} before replying`));
    });
  });
}

/**
 * Classifies the target grid on up to `workers` threads, one band of rows
 * each. Pixels go to every thread through one shared buffer. Matches land in
 * a pre-sized row-major array, so callers see the same order as the
 * single-threaded path. All threads are terminated before this settles.
 */
export async function classifyOnWorkers(
  pixels: PixelGrid,
  size: TargetSize,
  palette: PaletteEntry[],
  workers: number
): Promise<ClosestMatch[]> {
  const data = shareBytes(pixels.data);
  const matches = new Array<ClosestMatch>(size.width * size.height);
  const entry = workerEntry();
  const threads: Worker[] = [];

  try {
    await Promise.all(
      planBands(size.height, workers).map(async (band) => {
        const workerData: ClassifyWorkerData = {
          width: pixels.width,
          height: pixels.height,
          data,
          targetWidth: size.width,
          targetHeight: size.height,
          palette,
          band
        };
        const worker = new Worker(entry, { workerData });
        threads.push(worker);
        const bandMatches = await awaitBandReply(worker, band, size.width);
        const offset = band.rowStart * size.width;
        bandMatches.forEach((match, i) => {
          matches[offset + i] = match;
        });
      })
    );
  } finally {
    await Promise.all(threads.map((worker) => worker.terminate()));
  }
  return matches;
}
