import minimist from "minimist";
import { ConfigError } from "@pixelschem/core";
import { splitList, type ConverterConfig } from "./config.js";
import type { ConvertOptions } from "./types.js";

export const DEFAULT_BLOCKS_DIR = "blocks";
export const DEFAULT_SOURCES = ["wool", "concrete"];

/** Values given on the command line; absent keys fall back to config, then defaults. */
export interface CliFlags {
  blocksDir?: string;
  sources?: string[];
  config?: string;
  workers?: number;
  keepAspect?: boolean;
  preview?: string;
  previewScale?: number;
  compress?: boolean;
  dataVersion?: number;
  metadata?: boolean;
  author?: string;
  json: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "blocks"; flags: CliFlags }
  | ({ kind: "convert"; flags: CliFlags } & ConvertTarget);

function parseInteger(name: string, raw: unknown): number {
  const text = String(raw).trim();
  if (!/^[-+]?\d+$/.test(text)) {
    throw new ConfigError(`${name} must be an integer, got "${text}".`);
  }
  return Number.parseInt(text, 10);
}

function optionalInteger(name: string, raw: unknown): number | undefined {
  return raw === undefined ? undefined : parseInteger(name, raw);
}

function optionalString(raw: unknown): string | undefined {
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const args = minimist(argv, {
    boolean: ["keep-aspect", "gzip", "metadata", "json", "help"],
    string: ["blocks-dir", "sources", "config", "preview", "author", "workers", "data-version", "preview-scale"],
    alias: { h: "help" },
    default: { gzip: true }
  });

  if (args.help) {
    return { kind: "help" };
  }

  const flags: CliFlags = {
    blocksDir: optionalString(args["blocks-dir"]),
    sources: typeof args.sources === "string" ? splitList(args.sources) : undefined,
    config: optionalString(args.config),
    workers: optionalInteger("--workers", args.workers),
    keepAspect: args["keep-aspect"] ? true : undefined,
    preview: optionalString(args.preview),
    previewScale: optionalInteger("--preview-scale", args["preview-scale"]),
    compress: args.gzip === false ? false : undefined,
    dataVersion: optionalInteger("--data-version", args["data-version"]),
    metadata: args.metadata ? true : undefined,
    author: optionalString(args.author),
    json: Boolean(args.json)
  };

  const positional = args._.map(String);
  const first = positional[0];
  if (first === undefined || first === "help") {
    return { kind: "help" };
  }
  if (first === "blocks") {
    return { kind: "blocks", flags };
  }

  const [input, output, width, height, ...rest] = positional;
  if (input === undefined || output === undefined) {
    throw new ConfigError("Missing output argument.");
  }
  if (rest.length > 0) {
    throw new ConfigError(`Unexpected arguments: ${rest.join(" ")}`);
  }
  if (width !== undefined && height === undefined) {
    throw new ConfigError("Width and height must be given together.");
  }
  if (width === undefined || height === undefined) {
    return { kind: "convert", input, output, flags };
  }
  return {
    kind: "convert",
    input,
    output,
    width: parseInteger("width", width),
    height: parseInteger("height", height),
    flags
  };
}

export interface ConvertTarget {
  input: string;
  output: string;
  width?: number;
  height?: number;
}

/** CLI flag, then config file, then built-in default. */
export function mergeOptions(command: ConvertTarget, flags: CliFlags, config: ConverterConfig): ConvertOptions {
  return {
    input: command.input,
    output: command.output,
    width: command.width,
    height: command.height,
    blocksDir: flags.blocksDir ?? config.blocksDir ?? DEFAULT_BLOCKS_DIR,
    sources: flags.sources ?? config.sources ?? DEFAULT_SOURCES,
    workers: flags.workers ?? config.workers ?? 1,
    keepAspect: flags.keepAspect ?? config.keepAspect ?? false,
    compress: flags.compress ?? config.compress ?? true,
    dataVersion: flags.dataVersion ?? config.dataVersion,
    metadata: flags.metadata ?? config.metadata ?? false,
    author: flags.author ?? config.author,
    preview: flags.preview,
    previewScale: flags.previewScale
  };
}
