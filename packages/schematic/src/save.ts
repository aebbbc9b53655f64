import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { gzipSync } from "node:zlib";
import { WriteError } from "@pixelschem/core";

export const SCHEMATIC_EXTENSION = ".schem";

export interface SaveOptions {
  /** Gzip the file. Defaults to true. */
  compress?: boolean;
}

export function ensureSchematicExtension(path: string): string {
  return path.toLowerCase().endsWith(SCHEMATIC_EXTENSION) ? path : `${path}${SCHEMATIC_EXTENSION}`;
}

/**
 * Writes the encoded tag tree, appending the extension when missing, and
 * returns the path written.
 */
export function saveSchematic(path: string, bytes: Uint8Array, options: SaveOptions = {}): string {
  const target = ensureSchematicExtension(path);
  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, options.compress === false ? bytes : gzipSync(bytes));
  } catch (error) {
    throw new WriteError(target, { cause: error });
  }
  return target;
}
