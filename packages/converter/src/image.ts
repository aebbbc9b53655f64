import { readFileSync } from "node:fs";
import sharp from "sharp";
import { ImageDecodeError, errorMessage, type PixelGrid } from "@pixelschem/core";

export interface RawImageInfo {
  width: number;
  height: number;
  channels: number;
}

/**
 * Adapts raw interleaved decoder output to a PixelGrid, keeping the first
 * three channels of every pixel.
 */
export function toPixelGrid(data: Uint8Array, info: RawImageInfo): PixelGrid {
  const { width, height, channels } = info;
  if (width <= 0 || height <= 0) {
    throw new ImageDecodeError(`Image has no pixels (${width}x${height}).`);
  }
  if (channels < 3) {
    throw new ImageDecodeError(`Expected RGB data, got ${channels} channel(s).`);
  }
  const count = width * height;
  if (data.length < count * channels) {
    throw new ImageDecodeError(`Pixel data truncated: ${data.length} bytes for ${width}x${height}x${channels}.`);
  }
  const out = new Uint8Array(count * 3);
  for (let i = 0; i < count; i++) {
    const src = i * channels;
    const dst = i * 3;
    out[dst] = data[src] ?? 0;
    out[dst + 1] = data[src + 1] ?? 0;
    out[dst + 2] = data[src + 2] ?? 0;
  }
  return { width, height, data: out };
}

export async function decodeImageBuffer(bytes: Uint8Array): Promise<PixelGrid> {
  let decoded: { data: Buffer; info: RawImageInfo };
  try {
    decoded = await sharp(bytes).toColourspace("srgb").removeAlpha().raw().toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageDecodeError(`Unable to decode image: ${errorMessage(error)}`, { cause: error });
  }
  return toPixelGrid(decoded.data, decoded.info);
}

export async function decodeImage(path: string): Promise<PixelGrid> {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw new ImageDecodeError(`Unable to read image ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return decodeImageBuffer(bytes);
}
