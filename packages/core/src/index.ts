export * from "./types.js";
export * from "./errors.js";
export * from "./color.js";
export * from "./pixels.js";
export * from "./palette-index.js";
export * from "./downsample.js";
export * from "./voxel-grid.js";
