import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { PNG } from "pngjs";
import { decodeSchematic } from "../packages/schematic/src/index.js";
import { convertImage } from "../packages/converter/src/index.js";

function writeGradient(path: string, width: number, height: number): void {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = (y * width + x) * 4;
      png.data[idx] = Math.round((x / (width - 1)) * 255);
      png.data[idx + 1] = Math.round((y / (height - 1)) * 255);
      png.data[idx + 2] = 128;
      png.data[idx + 3] = 255;
    }
  }
  writeFileSync(path, PNG.sync.write(png));
}

async function main(): Promise<void> {
  const base = mkdtempSync(join(tmpdir(), "pixelschem-smoke-"));
  const input = join(base, "gradient.png");
  writeGradient(input, 96, 64);

  const workers = process.argv.includes("--single") ? 1 : 3;
  const summary = await convertImage({
    input,
    output: join(base, "gradient"),
    width: 48,
    height: 32,
    blocksDir: resolve("blocks"),
    sources: ["wool", "concrete"],
    workers,
    preview: join(base, "gradient-preview.png"),
    previewScale: 4
  });
  console.log(`[smoke] converted with ${workers} worker(s):`);
  console.log(JSON.stringify(summary, null, 2));

  const decoded = decodeSchematic(readFileSync(summary.output));
  if (decoded.blockData.length !== summary.blockCount || decoded.palette.length !== summary.palette.length) {
    throw new Error("decoded schematic does not match the conversion summary");
  }
  console.log(`[smoke] ok: ${decoded.width}x${decoded.height}x${decoded.length}, palette ${decoded.palette.length}`);
}

main().catch((error: unknown) => {
  console.error(`[smoke] failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
