export * from "./nbt.js";
export * from "./encode.js";
export * from "./decode.js";
export * from "./save.js";
