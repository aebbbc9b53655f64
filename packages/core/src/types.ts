export interface Color {
  r: number;
  g: number;
  b: number;
}

export interface BlockMapping {
  blockName: string;
  blockData: number;
}

export interface PaletteEntry {
  color: Color;
  block: BlockMapping;
}

/**
 * Decoded image, row-major, three bytes (R, G, B) per pixel.
 */
export interface PixelGrid {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Palette ids laid out z-major, then y, then x.
 */
export interface VoxelGrid {
  width: number;
  height: number;
  depth: number;
  indices: Uint32Array;
}

export interface ClosestMatch {
  block: BlockMapping;
  color: Color | undefined;
  distance: number;
  matched: boolean;
}

export interface DownsampledCell {
  x: number;
  y: number;
  color: Color;
}

export interface VoxelModel {
  grid: VoxelGrid;
  palette: string[];
  matches: ClosestMatch[];
  unmatched: number;
}

export interface TargetSize {
  width: number;
  height: number;
}

export interface Diagnostic {
  code: string;
  severity: "warning" | "error";
  message: string;
}
