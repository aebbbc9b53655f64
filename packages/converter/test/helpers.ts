import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PNG } from "pngjs";
import type { Color } from "@pixelschem/core";

export const RED: Color = { r: 255, g: 0, b: 0 };
export const BLUE: Color = { r: 0, g: 0, b: 255 };
export const GREEN: Color = { r: 0, g: 255, b: 0 };

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Writes an opaque RGBA PNG from row-major colors. */
export function writePng(path: string, width: number, height: number, colors: Color[]): string {
  const png = new PNG({ width, height });
  const data = Buffer.alloc(width * height * 4);
  colors.forEach((c, i) => {
    data[i * 4] = c.r;
    data[i * 4 + 1] = c.g;
    data[i * 4 + 2] = c.b;
    data[i * 4 + 3] = 255;
  });
  png.data = data;
  writeFileSync(path, PNG.sync.write(png));
  return path;
}

/** Blocks directory with one "art" source: red, blue and green concrete. */
export function writeArtBlocks(base: string): string {
  const dir = join(base, "blocks");
  mkdirSync(dir, { recursive: true });
  writeFileSync(
    join(dir, "art.json"),
    [
      "# Art",
      "{",
      '  "(255, 0, 0)": ["minecraft:red_concrete", 14],',
      '  "(0, 0, 255)": ["minecraft:blue_concrete", 11],',
      '  "(0, 255, 0)": ["minecraft:lime_concrete", 5]',
      "}"
    ].join("\n")
  );
  return dir;
}
