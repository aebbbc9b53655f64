import type { Color, PixelGrid } from "./types.js";

export function createPixelGrid(width: number, height: number, fill?: Color): PixelGrid {
  const data = new Uint8Array(width * height * 3);
  if (fill) {
    for (let i = 0; i < data.length; i += 3) {
      data[i] = fill.r;
      data[i + 1] = fill.g;
      data[i + 2] = fill.b;
    }
  }
  return { width, height, data };
}

export function pixelGridFromRows(rows: Color[][]): PixelGrid {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const grid = createPixelGrid(width, height);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new RangeError(`Row ${y} has ${row.length} pixels, expected ${width}`);
    }
    row.forEach((c, x) => setPixel(grid, x, y, c));
  });
  return grid;
}

export function pixelAt(grid: PixelGrid, x: number, y: number): Color {
  const offset = (y * grid.width + x) * 3;
  return {
    r: grid.data[offset] ?? 0,
    g: grid.data[offset + 1] ?? 0,
    b: grid.data[offset + 2] ?? 0
  };
}

export function setPixel(grid: PixelGrid, x: number, y: number, c: Color): void {
  const offset = (y * grid.width + x) * 3;
  grid.data[offset] = c.r;
  grid.data[offset + 1] = c.g;
  grid.data[offset + 2] = c.b;
}
