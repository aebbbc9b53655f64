import type { Color } from "./types.js";

export const WHITE: Color = { r: 255, g: 255, b: 255 };

/**
 * Redmean-weighted Euclidean distance in RGB space.
 */
export function colorDistance(a: Color, b: Color): number {
  const rMean = (a.r + b.r) / 2;
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return Math.sqrt((2 + rMean / 256) * dr * dr + 4 * dg * dg + (2 + (255 - rMean) / 256) * db * db);
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

export function packColor(c: Color): number {
  return (c.r << 16) | (c.g << 8) | c.b;
}

export function unpackColor(packed: number): Color {
  return { r: (packed >>> 16) & 0xff, g: (packed >>> 8) & 0xff, b: packed & 0xff };
}

export function colorKey(c: Color): string {
  return `(${c.r},${c.g},${c.b})`;
}

function parseChannel(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const trimmed = text.trim();
  if (!/^\d{1,3}$/.test(trimmed)) return undefined;
  const v = Number(trimmed);
  return v <= 255 ? v : undefined;
}

/**
 * Accepts "(R,G,B)" or "R,G,B"; components past the third are ignored.
 */
export function parseColorKey(text: string): Color | undefined {
  let body = text.trim();
  if (body.startsWith("(") && body.endsWith(")")) {
    body = body.slice(1, -1);
  }
  const parts = body.split(",");
  if (parts.length < 3) return undefined;
  const r = parseChannel(parts[0]);
  const g = parseChannel(parts[1]);
  const b = parseChannel(parts[2]);
  if (r === undefined || g === undefined || b === undefined) return undefined;
  return { r, g, b };
}
