export * from "./types.js";
export * from "./image.js";
export * from "./preview.js";
export * from "./config.js";
export * from "./args.js";
export * from "./report.js";
export * from "./convert.js";
export { awaitBandReply, classifyOnWorkers, planBands } from "./worker-pool.js";
