#!/usr/bin/env -S node --import tsx
import { resolve } from "node:path";
import { errorMessage } from "@pixelschem/core";
import { listPaletteSources } from "@pixelschem/block-palette";
import { DEFAULT_BLOCKS_DIR, mergeOptions, parseCliArgs } from "./args.js";
import { readConverterConfig } from "./config.js";
import { convertImage } from "./convert.js";
import { formatDiagnostic, formatSummary } from "./report.js";

function printHelp(): void {
  console.log(`pixelschem

Usage:
  pixelschem <input-image> <output> [width height] [options]
  pixelschem blocks [--blocks-dir dir]

Options:
  --blocks-dir <dir>       Palette source directory (default: blocks)
  --sources <a,b>          Palette sources to load, in order (default: wool,concrete)
  --config <file>          YAML settings file
  --workers <n>            Classification worker threads (default: 1, in-process)
  --keep-aspect            Fit the target size to the image aspect ratio
  --preview <png>          Also write a top-down PNG preview
  --preview-scale <n>      Preview pixels per block (default: 1)
  --no-gzip                Write the tag tree uncompressed
  --data-version <n>       DataVersion written to the schematic (default: 3100)
  --metadata               Embed a Metadata compound
  --author <text>          Author for the Metadata compound
  --json                   Print the summary as JSON
`);
}

async function run(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === "help") {
    printHelp();
    return;
  }

  const config = command.flags.config ? readConverterConfig(command.flags.config) : {};

  if (command.kind === "blocks") {
    const blocksDir = resolve(command.flags.blocksDir ?? config.blocksDir ?? DEFAULT_BLOCKS_DIR);
    const sources = listPaletteSources(blocksDir);
    if (command.flags.json) {
      console.log(JSON.stringify(sources, null, 2));
      return;
    }
    for (const source of sources) {
      console.log(`${source.name}\t${source.displayName}`);
    }
    return;
  }

  const summary = await convertImage(mergeOptions(command, command.flags, config));
  if (command.flags.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  for (const warning of summary.warnings) {
    console.warn(formatDiagnostic(warning));
  }
  console.log(formatSummary(summary));
}

run().catch((error: unknown) => {
  console.error(`[pixelschem] ${errorMessage(error)}`);
  if (process.env.PIXELSCHEM_DEBUG && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
