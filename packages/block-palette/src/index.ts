import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, extname, resolve } from "node:path";
import {
  BlockMappingParseError,
  PaletteSourceMissingError,
  colorKey,
  errorMessage,
  parseColorKey,
  type BlockMapping,
  type Diagnostic,
  type PaletteEntry
} from "@pixelschem/core";

export const PALETTE_SOURCE_EXTENSION = ".json";

export interface ParsedPaletteSource {
  name: string;
  displayName: string;
  entries: PaletteEntry[];
  diagnostics: Diagnostic[];
}

export interface PaletteSourceInfo {
  name: string;
  displayName: string;
  path: string;
}

export interface LoadPaletteOptions {
  blocksDir: string;
  /** Source names without extension, loaded in this order. Defaults to every source, sorted. */
  sources?: string[];
}

export interface LoadedPalette {
  entries: PaletteEntry[];
  loaded: string[];
  diagnostics: Diagnostic[];
}

function warning(code: string, message: string): Diagnostic {
  return { code, severity: "warning", message };
}

function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith("#");
}

function readDisplayName(text: string): string | undefined {
  const firstLine = text.split(/\r?\n/, 1)[0]?.trim() ?? "";
  if (!firstLine.startsWith("# ")) return undefined;
  const name = firstLine.slice(2).trim();
  return name.length > 0 ? name : undefined;
}

function toBlockMapping(value: unknown): BlockMapping | undefined {
  let blockName: unknown;
  let blockData: unknown;
  if (Array.isArray(value)) {
    if (value.length < 2) return undefined;
    [blockName, blockData] = value;
  } else if (value && typeof value === "object") {
    blockName = "block_name" in value ? value.block_name : undefined;
    blockData = "block_data" in value ? value.block_data : undefined;
  } else {
    return undefined;
  }
  if (typeof blockName !== "string" || blockName.trim().length === 0) return undefined;
  if (typeof blockData !== "number" || !Number.isInteger(blockData) || blockData < 0) return undefined;
  return { blockName: blockName.trim(), blockData };
}

/**
 * Parses one palette source. Lines starting with '#' are comments; a leading
 * "# Name" line names the source. Malformed entries are skipped and reported.
 */
export function parsePaletteSource(text: string, sourceName: string): ParsedPaletteSource {
  const diagnostics: Diagnostic[] = [];
  const displayName = readDisplayName(text) ?? sourceName;
  const body = text
    .split(/\r?\n/)
    .filter((line) => !isCommentLine(line))
    .join("\n");

  let parsed: unknown;
  try {
    parsed = body.trim().length > 0 ? JSON.parse(body) : {};
  } catch (error) {
    diagnostics.push(warning("PALETTE_JSON_INVALID", `${sourceName}: ${errorMessage(error)}`));
    return { name: sourceName, displayName, entries: [], diagnostics };
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    diagnostics.push(warning("PALETTE_JSON_INVALID", `${sourceName}: top level must be an object`));
    return { name: sourceName, displayName, entries: [], diagnostics };
  }

  const entries: PaletteEntry[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    const color = parseColorKey(key);
    if (!color) {
      diagnostics.push(warning("PALETTE_KEY_INVALID", `${sourceName}: unreadable color key ${JSON.stringify(key)}`));
      continue;
    }
    const block = toBlockMapping(value);
    if (!block) {
      diagnostics.push(warning("PALETTE_VALUE_INVALID", `${sourceName}: unusable mapping for ${colorKey(color)}`));
      continue;
    }
    entries.push({ color, block });
  }
  return { name: sourceName, displayName, entries, diagnostics };
}

function assertBlocksDir(blocksDir: string): string {
  const dir = resolve(blocksDir);
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new PaletteSourceMissingError(dir);
  }
  return dir;
}

function sourcePath(dir: string, name: string): string {
  return resolve(dir, `${name}${PALETTE_SOURCE_EXTENSION}`);
}

export function listPaletteSources(blocksDir: string): PaletteSourceInfo[] {
  const dir = assertBlocksDir(blocksDir);
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === PALETTE_SOURCE_EXTENSION)
    .map((entry) => {
      const path = resolve(dir, entry.name);
      const name = basename(entry.name, extname(entry.name));
      return { name, displayName: readDisplayName(readFileSync(path, "utf8")) ?? name, path };
    })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Loads the named sources from an explicit directory. Later sources overwrite
 * colors defined by earlier ones.
 */
export function loadPaletteSources(options: LoadPaletteOptions): LoadedPalette {
  const dir = assertBlocksDir(options.blocksDir);
  const names = options.sources ?? listPaletteSources(dir).map((s) => s.name);
  const diagnostics: Diagnostic[] = [];
  const entries: PaletteEntry[] = [];
  const loaded: string[] = [];

  for (const name of names) {
    const path = sourcePath(dir, name);
    if (!existsSync(path)) {
      diagnostics.push(warning("PALETTE_SOURCE_NOT_FOUND", `No palette source named ${name} in ${dir}`));
      continue;
    }
    const source = parsePaletteSource(readFileSync(path, "utf8"), name);
    diagnostics.push(...source.diagnostics);
    if (source.entries.length > 0) {
      entries.push(...source.entries);
      loaded.push(name);
    }
  }

  if (entries.length === 0) {
    throw new BlockMappingParseError(
      names.length === 0
        ? `No palette sources found in ${dir}`
        : `No usable block mappings in sources: ${names.join(", ")}`
    );
  }
  return { entries, loaded, diagnostics };
}
