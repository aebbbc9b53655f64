import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import YAML from "js-yaml";
import { ConfigError, errorMessage } from "@pixelschem/core";

export interface ConverterConfig {
  blocksDir?: string;
  sources?: string[];
  workers?: number;
  compress?: boolean;
  dataVersion?: number;
  metadata?: boolean;
  author?: string;
  keepAspect?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Config key "${key}" must be a string.`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Config key "${key}" must be a boolean.`);
  }
  return value;
}

function optionalInteger(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigError(`Config key "${key}" must be an integer.`);
  }
  return value;
}

function optionalStringList(obj: Record<string, unknown>, key: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") {
    return splitList(value);
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`Config key "${key}" must be a list of strings.`);
  }
  return value;
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Reads converter settings from YAML text. Unknown keys are ignored.
 * `baseDir` anchors a relative `blocksDir`.
 */
export function parseConverterConfig(text: string, baseDir: string): ConverterConfig {
  let parsed: unknown;
  try {
    parsed = YAML.load(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${errorMessage(error)}`);
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("Config root must be a mapping.");
  }

  const config: ConverterConfig = {};
  const blocksDir = optionalString(parsed, "blocksDir");
  if (blocksDir !== undefined) {
    config.blocksDir = isAbsolute(blocksDir) ? blocksDir : resolve(baseDir, blocksDir);
  }
  const sources = optionalStringList(parsed, "sources");
  if (sources !== undefined) config.sources = sources;
  const workers = optionalInteger(parsed, "workers");
  if (workers !== undefined) config.workers = workers;
  const compress = optionalBoolean(parsed, "compress");
  if (compress !== undefined) config.compress = compress;
  const dataVersion = optionalInteger(parsed, "dataVersion");
  if (dataVersion !== undefined) config.dataVersion = dataVersion;
  const metadata = optionalBoolean(parsed, "metadata");
  if (metadata !== undefined) config.metadata = metadata;
  const author = optionalString(parsed, "author");
  if (author !== undefined) config.author = author;
  const keepAspect = optionalBoolean(parsed, "keepAspect");
  if (keepAspect !== undefined) config.keepAspect = keepAspect;
  return config;
}

export function readConverterConfig(path: string): ConverterConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read config ${path}: ${errorMessage(error)}`);
  }
  return parseConverterConfig(raw, dirname(resolve(path)));
}
