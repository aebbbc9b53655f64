import { parentPort, workerData } from "node:worker_threads";
import { buildPaletteIndex, classifyCells, downsampleRows, errorMessage } from "@pixelschem/core";
import type { ClassifyWorkerData, ClassifyWorkerMessage } from "../types.js";

if (!parentPort) {
  throw new Error("classify-worker must run in worker context");
}

const job: ClassifyWorkerData = workerData;
let message: ClassifyWorkerMessage;
try {
  const pixels = { width: job.width, height: job.height, data: job.data };
  const cells = downsampleRows(pixels, job.targetWidth, job.targetHeight, job.band.rowStart, job.band.rowEnd);
  message = { ok: true, matches: classifyCells(cells, buildPaletteIndex(job.palette)) };
} catch (error) {
  message = { ok: false, error: errorMessage(error) };
}
parentPort.postMessage(message);
