export type PixelSchemErrorCode =
  | "PALETTE_SOURCE_MISSING"
  | "BLOCK_MAPPING_PARSE"
  | "EMPTY_PALETTE"
  | "IMAGE_DECODE"
  | "WRITE_FAILED"
  | "CONFIG_INVALID";

export class PixelSchemError extends Error {
  public constructor(
    public readonly code: PixelSchemErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PaletteSourceMissingError extends PixelSchemError {
  public constructor(public readonly blocksDir: string) {
    super("PALETTE_SOURCE_MISSING", `Palette directory not found: ${blocksDir}`);
  }
}

export class BlockMappingParseError extends PixelSchemError {
  public constructor(message: string) {
    super("BLOCK_MAPPING_PARSE", message);
  }
}

export class EmptyPaletteError extends PixelSchemError {
  public constructor() {
    super("EMPTY_PALETTE", "Palette index holds no color mappings.");
  }
}

export class ImageDecodeError extends PixelSchemError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("IMAGE_DECODE", message, options);
  }
}

export class WriteError extends PixelSchemError {
  public constructor(public readonly path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("WRITE_FAILED", `Failed to write ${path}${reason}`, options);
  }
}

export class ConfigError extends PixelSchemError {
  public constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
