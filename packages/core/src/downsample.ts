import { WHITE } from "./color.js";
import type { Color, DownsampledCell, PixelGrid, TargetSize } from "./types.js";

const ASPECT_TOLERANCE = 0.05;

function atLeastOne(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.max(1, Math.trunc(value));
}

export function coerceTargetSize(width: number, height: number): TargetSize {
  return { width: atLeastOne(width), height: atLeastOne(height) };
}

/**
 * Keeps the source aspect ratio: the limiting axis keeps its target size and
 * the other one is derived from the source ratio. Targets already within
 * tolerance of the source ratio are returned as given.
 */
export function fitAspectRatio(
  originalWidth: number,
  originalHeight: number,
  targetWidth: number,
  targetHeight: number
): TargetSize {
  const target = coerceTargetSize(targetWidth, targetHeight);
  if (originalWidth <= 0 || originalHeight <= 0) return target;
  const originalRatio = originalWidth / originalHeight;
  const targetRatio = target.width / target.height;
  if (Math.abs(originalRatio - targetRatio) < ASPECT_TOLERANCE) {
    return target;
  }
  if (originalRatio > targetRatio) {
    return coerceTargetSize(target.width, target.width / originalRatio);
  }
  return coerceTargetSize(target.height * originalRatio, target.height);
}

/**
 * Mean color of the source pixels in [x0, x1) × [y0, y1), each channel
 * truncated. An empty region is white.
 */
export function averageRegion(pixels: PixelGrid, x0: number, x1: number, y0: number, y1: number): Color {
  let r = 0;
  let g = 0;
  let b = 0;
  let count = 0;
  for (let py = y0; py < y1; py++) {
    let offset = (py * pixels.width + x0) * 3;
    for (let px = x0; px < x1; px++) {
      r += pixels.data[offset] ?? 0;
      g += pixels.data[offset + 1] ?? 0;
      b += pixels.data[offset + 2] ?? 0;
      offset += 3;
      count++;
    }
  }
  if (count === 0) {
    return { ...WHITE };
  }
  return { r: Math.trunc(r / count), g: Math.trunc(g / count), b: Math.trunc(b / count) };
}

export function downsampleRows(
  pixels: PixelGrid,
  targetWidth: number,
  targetHeight: number,
  rowStart: number,
  rowEnd: number
): DownsampledCell[] {
  const target = coerceTargetSize(targetWidth, targetHeight);
  const scaleX = pixels.width / target.width;
  const scaleY = pixels.height / target.height;
  const first = Math.max(0, rowStart);
  const last = Math.min(target.height, rowEnd);
  const out: DownsampledCell[] = [];

  for (let y = first; y < last; y++) {
    const y0 = Math.floor(y * scaleY);
    const y1 = Math.min(Math.floor((y + 1) * scaleY), pixels.height);
    for (let x = 0; x < target.width; x++) {
      const x0 = Math.floor(x * scaleX);
      const x1 = Math.min(Math.floor((x + 1) * scaleX), pixels.width);
      out.push({ x, y, color: averageRegion(pixels, x0, x1, y0, y1) });
    }
  }
  return out;
}

/**
 * Block-averages the source grid onto the target size. Cells come back in
 * row-major order.
 */
export function downsample(pixels: PixelGrid, targetWidth: number, targetHeight: number): DownsampledCell[] {
  const target = coerceTargetSize(targetWidth, targetHeight);
  return downsampleRows(pixels, target.width, target.height, 0, target.height);
}
